import * as _ from 'lodash'
import type {Environment} from './Environment'
import type {Stack} from './Frame'

/**
 * Symbols are interned: two symbols with the same name are the same object,
 * so they can be compared with `===`.
 */
export class Sym {
  private static readonly table = new Map<string, Sym>()

  private constructor(readonly name: string) {}

  /** Returns the unique symbol named `name`. */
  static of(name: string): Sym {
    let sym = Sym.table.get(name)
    if (sym === undefined) {
      sym = new Sym(name)
      Sym.table.set(name, sym)
    }
    return sym
  }

  toString() { return this.name }
}

/** The empty list. */
export type Nil = null
export const nil: Nil = null

/**
 * An indivisible expression. Every atom except a symbol evaluates to itself.
 */
export type Atom = Sym | number | boolean | string | Nil

/**
 * Expressions are produced by the reader and never mutated afterwards. A
 * composite is a non-empty list form; the empty list is the atom `nil`.
 */
export type Expression = Atom | Composite
export interface Composite extends ReadonlyArray<Expression> {}

export function isComposite(expr: Expression): expr is Composite {
  return Array.isArray(expr)
}

/** Number of arguments a procedure accepts; `max` may be `Infinity`. */
export interface Arity {
  readonly min: number
  readonly max: number
}

export function exactly(n: number): Arity {
  return {min: n, max: n}
}

export function atLeast(n: number): Arity {
  return {min: n, max: Infinity}
}

export function acceptsCount(arity: Arity, n: number): boolean {
  return n >= arity.min && n <= arity.max
}

/** Runtime list data. Pairs are immutable once built. */
export class Pair {
  constructor(readonly car: Value, readonly cdr: Value) {}
}

/** A procedure implemented by the host's builtin library. */
export class Builtin {
  constructor(
    readonly name: string,
    readonly arity: Arity,
    readonly fn: (args: Value[]) => Value
  ) {}
}

/**
 * What a control builtin asks the evaluator to do next, in place of the frame
 * that called it.
 */
export type Redirect =
  { readonly type: 'apply', readonly proc: Value, readonly args: Value[] } |
  { readonly type: 'eval', readonly expr: Expression, readonly env: Environment }

/**
 * A builtin that does not return a value directly but redirects evaluation
 * (`apply`, `eval`). It runs in the caller's frame, so it never grows the
 * stack either.
 */
export class ControlBuiltin {
  constructor(
    readonly name: string,
    readonly arity: Arity,
    readonly enter: (args: Value[]) => Redirect
  ) {}
}

/** A user-defined procedure: parameters, one body expression, and a closure. */
export class Lambda {
  constructor(
    readonly params: ReadonlyArray<Sym>,
    readonly body: Expression,
    readonly closureEnv: Environment,
    readonly name?: string
  ) {}

  get arity(): Arity { return exactly(this.params.length) }
}

/**
 * A reified continuation. `snapshot` is the stack that was below the
 * `call/cc` frame when it was captured (`null` if `call/cc` was the
 * outermost frame), and `targetSlot` is the index of the slot in the
 * snapshot's top frame that receives the value the continuation is called
 * with (`null` when there is no such slot).
 */
export class Continuation {
  constructor(
    readonly snapshot: Stack | null,
    readonly targetSlot: number | null
  ) {}

  get arity(): Arity { return exactly(1) }
}

/** The identity of a special form, as bound to its keyword. */
export class SpecialForm {
  constructor(readonly name: string) {}
}

/** The value of forms whose result is unspecified (`define`, `set!`, …). */
export class Unspecified {
  private readonly unspecified = true
  private constructor() {}
  static readonly instance = new Unspecified()
}
export const unspecified = Unspecified.instance

export type Procedure = Builtin | ControlBuiltin | Lambda | Continuation

export type Value =
  Atom | Pair | Procedure | SpecialForm | Unspecified

export function isProcedure(v: Value): v is Procedure {
  return v instanceof Builtin || v instanceof ControlBuiltin ||
         v instanceof Lambda || v instanceof Continuation
}

/** Only `#f` is false. */
export function isTruthy(v: Value): boolean {
  return v !== false
}

/** Well-known error kinds */
export type Err =
  'UnboundVariable' | 'ArityMismatch' | 'MalformedSpecialForm' |
  'NotApplicable' | 'BuiltinError'

/**
 * An evaluation error. `err` is the kind of error, `why` a human-readable
 * explanation, and `culprit` the name of the symbol, form, or procedure that
 * caused it.
 */
export class CairnError extends Error {
  readonly err: Err
  readonly why: string
  readonly culprit: string

  constructor(err: Err, why: string, culprit: string, options?: {cause?: unknown}) {
    super(`${err}: ${why}`, options)
    this.name = 'CairnError'
    this.err = err
    this.why = why
    this.culprit = culprit
  }
}

export function unboundVariable(name: string): CairnError {
  return new CairnError('UnboundVariable', `unbound variable ${name}`, name)
}

export function arityMismatch(name: string, arity: Arity, got: number): CairnError {
  const expected = arity.max === arity.min ? `${arity.min}`
    : arity.max === Infinity ? `at least ${arity.min}`
    : `${arity.min} to ${arity.max}`
  const plural = (arity.max === Infinity ? arity.min : arity.max) !== 1
  return new CairnError('ArityMismatch',
    `${name} expects ${expected} argument${plural ? 's' : ''}, got ${got}`,
    name)
}

export function malformed(form: string, why: string): CairnError {
  return new CairnError('MalformedSpecialForm', `bad ${form} form: ${why}`, form)
}

export function notApplicable(what: string): CairnError {
  return new CairnError('NotApplicable', `not a procedure: ${what}`, what)
}

export function builtinError(name: string, cause: unknown): CairnError {
  const why = cause instanceof Error ? cause.message : String(cause)
  return new CairnError('BuiltinError', `${name}: ${why}`, name, {cause})
}

/** Builds a proper list from an array. */
export function list(...items: Value[]): Value {
  return arrayToList(items)
}

function arrayToList(items: ReadonlyArray<Value>): Value {
  return _.reduceRight<Value, Value>(items, (tail, x) => new Pair(x, tail), nil)
}

/**
 * Converts a proper list to an array. Returns `undefined` for an improper
 * list or a non-list.
 */
export function listToArray(v: Value): Value[] | undefined {
  const out: Value[] = []
  let cell = v
  while (cell instanceof Pair) {
    out.push(cell.car)
    cell = cell.cdr
  }
  return cell === nil ? out : undefined
}

function isAtomValue(v: Value): v is Atom {
  return v === nil || v instanceof Sym || typeof v === 'number' ||
         typeof v === 'boolean' || typeof v === 'string'
}

/**
 * Reinterprets an expression as literal data, as `quote` does: composites
 * become lists, atoms stay as they are.
 *
 * Nested composites are converted from an explicit work stack, innermost
 * first, so nesting depth is not limited by the host call stack.
 */
export function quoteExpression(expr: Expression): Value {
  if (!isComposite(expr)) return expr
  const work: {expr: Composite, items: Value[]}[] = [{expr, items: []}]
  for (;;) {
    const top = work[work.length - 1]
    if (top.items.length < top.expr.length) {
      const next = top.expr[top.items.length]
      if (isComposite(next)) work.push({expr: next, items: []})
      else top.items.push(next)
      continue
    }
    work.pop()
    const done = arrayToList(top.items)
    if (work.length === 0) return done
    work[work.length - 1].items.push(done)
  }
}

/**
 * Converts data back into an expression, as `eval` does. Returns `undefined`
 * if `v` holds something that has no expression form (a procedure, an
 * improper list).
 */
export function valueToExpression(v: Value): Expression | undefined {
  if (!(v instanceof Pair)) return isAtomValue(v) ? v : undefined
  const work: {rest: Value, items: Expression[]}[] = [{rest: v, items: []}]
  for (;;) {
    const top = work[work.length - 1]
    if (top.rest instanceof Pair) {
      const item = top.rest.car
      top.rest = top.rest.cdr
      if (item instanceof Pair) work.push({rest: item, items: []})
      else if (isAtomValue(item)) top.items.push(item)
      else return undefined
      continue
    }
    if (top.rest !== nil) return undefined
    work.pop()
    if (work.length === 0) return top.items
    work[work.length - 1].items.push(top.items)
  }
}

/** `eq?`: identity; numbers, strings, and booleans compare by value. */
export function isEq(a: Value, b: Value): boolean {
  return a === b
}

/** `equal?`: structural equality on pairs, `eq?` on everything else. */
export function isEqual(a: Value, b: Value): boolean {
  // cdrs are pushed before cars, so cars are compared first
  const pending: [Value, Value][] = [[a, b]]
  for (let next = pending.pop(); next; next = pending.pop()) {
    const [x, y] = next
    if (x instanceof Pair && y instanceof Pair) {
      pending.push([x.cdr, y.cdr], [x.car, y.car])
    } else if (!isEq(x, y)) return false
  }
  return true
}

/** Name of a procedure, for error messages. */
export function procedureName(p: Procedure): string {
  if (p instanceof Continuation) return 'continuation'
  if (p instanceof Lambda) return p.name || 'lambda'
  return p.name
}
