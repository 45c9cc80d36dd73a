import {
  Value, Expression, Sym, Lambda, Continuation, SpecialForm, nil,
  isComposite, isTruthy, isProcedure, acceptsCount, quoteExpression,
  unspecified, malformed, notApplicable, arityMismatch, procedureName
} from './Cairn'
import type {Environment} from './Environment'
import type {Frame} from './Frame'
import * as Names from './ReservedNames'
import prettyPrint from './PrettyPrint'

/**
 * What a ready special-form frame turns into:
 *
 * - `value`: the frame is finished and `value` is its result
 * - `tail`: the frame's content becomes `expr`, evaluated in `env`, in the
 *   frame's own tail position
 * - `apply`: the frame becomes an application of `proc` to `args`
 */
export type Outcome =
  { readonly type: 'value', readonly value: Value } |
  { readonly type: 'tail', readonly expr: Expression, readonly env: Environment } |
  { readonly type: 'apply', readonly proc: Value, readonly args: Value[] }

/** Services the evaluator provides to special forms. */
export interface FormContext {
  /** Captures the continuation of the frame currently being applied. */
  captureContinuation(): Continuation
}

/**
 * The evaluation rules of one special form. Slot 0 of a frame holds the form
 * itself; the other slots hold the form's operands, which stay unevaluated
 * unless `next` selects them.
 */
export interface FormRule {
  readonly name: string
  /** Throws `MalformedSpecialForm` if the frame has the wrong shape. */
  check(frame: Frame): void
  /** Index of the next operand slot to evaluate, or `null` once ready. */
  next(frame: Frame): number | null
  /** The form's effect, once `next` has returned `null`. */
  apply(frame: Frame, ctx: FormContext): Outcome
}

function value(v: Value): Outcome {
  return {type: 'value', value: v}
}

function requireWidth(frame: Frame, name: string, min: number, max = min) {
  const operands = frame.width - 1
  if (operands < min - 1 || operands > max - 1) {
    const expected = min === max ? `${min - 1}`
      : max === Infinity ? `at least ${min - 1}`
      : `${min - 1} or ${max - 1}`
    const plural = (max === Infinity ? min : max) - 1 !== 1
    throw malformed(name, `expected ${expected} operand${plural ? 's' : ''}, got ${operands}`)
  }
}

function requireSymbol(frame: Frame, i: number, name: string): Sym {
  const target = frame.expressionAt(i)
  if (target instanceof Sym) return target
  throw malformed(name, `expected a symbol, got ${prettyPrint(quoteExpression(target), false)}`)
}

function parameterList(expr: Expression): Sym[] {
  if (expr === nil) return []
  if (isComposite(expr)) {
    const params: Sym[] = []
    for (let p of expr) {
      if (!(p instanceof Sym)) {
        throw malformed(Names.lambda, `parameter is not a symbol: ${prettyPrint(quoteExpression(p), false)}`)
      }
      if (params.indexOf(p) >= 0) {
        throw malformed(Names.lambda, `duplicate parameter ${p.name}`)
      }
      params.push(p)
    }
    return params
  }
  throw malformed(Names.lambda, 'parameters must be a list')
}

/** Evaluate slot `i` if it has not been evaluated yet. */
function only(i: number) {
  return (frame: Frame) => frame.hasValue(i) ? null : i
}

const quote: FormRule = {
  name: Names.quote,
  check(frame) { requireWidth(frame, this.name, 2) },
  next: () => null,
  apply(frame) { return value(quoteExpression(frame.expressionAt(1))) }
}

/** `define` and `set!` differ only in which environment operation they use. */
function binding(name: string, bind: (env: Environment, sym: Sym, v: Value) => void): FormRule {
  return {
    name,
    check(frame) {
      requireWidth(frame, name, 3)
      requireSymbol(frame, 1, name)
    },
    next: only(2),
    apply(frame) {
      const sym = requireSymbol(frame, 1, name)
      let v = frame.valueAt(2)
      if (v instanceof Lambda && v.name === undefined) {
        v = new Lambda(v.params, v.body, v.closureEnv, sym.name)
      }
      bind(frame.env, sym, v)
      return value(unspecified)
    }
  }
}

const define = binding(Names.define, (env, sym, v) => env.define(sym, v))
const set = binding(Names.set, (env, sym, v) => env.set(sym, v))

const lambda: FormRule = {
  name: Names.lambda,
  check(frame) {
    requireWidth(frame, this.name, 3)
    parameterList(frame.expressionAt(1))
  },
  next: () => null,
  apply(frame) {
    return value(new Lambda(
      parameterList(frame.expressionAt(1)), frame.expressionAt(2), frame.env))
  }
}

const if_: FormRule = {
  name: Names.if_,
  check(frame) { requireWidth(frame, this.name, 3, 4) },
  next: only(1),
  apply(frame) {
    if (isTruthy(frame.valueAt(1))) {
      return {type: 'tail', expr: frame.expressionAt(2), env: frame.env}
    } else if (frame.width === 4) {
      return {type: 'tail', expr: frame.expressionAt(3), env: frame.env}
    } else return value(unspecified)
  }
}

const begin: FormRule = {
  name: Names.begin,
  check(frame) { requireWidth(frame, this.name, 2, Infinity) },
  next(frame) {
    // The last expression is left for `apply`, which hands it back as a
    // tail expression instead of evaluating it in a child frame.
    const i = frame.firstPending(1)
    return i !== null && i < frame.width - 1 ? i : null
  },
  apply(frame) {
    return {type: 'tail', expr: frame.expressionAt(frame.width - 1), env: frame.env}
  }
}

/**
 * `and` stops at the first false value, `or` at the first true one. Either
 * way the result is the last value evaluated.
 */
function shortCircuit(name: string, stopOn: boolean, empty: boolean): FormRule {
  return {
    name,
    check() {},
    next(frame) {
      const i = frame.firstPending(1)
      if (i === null) return null
      if (i > 1 && isTruthy(frame.valueAt(i - 1)) === stopOn) return null
      return i
    },
    apply(frame) {
      if (frame.width === 1) return value(empty)
      const i = frame.firstPending(1)
      return value(frame.valueAt(i === null ? frame.width - 1 : i - 1))
    }
  }
}

const and = shortCircuit(Names.and, false, true)
const or = shortCircuit(Names.or, true, false)

const callCC: FormRule = {
  name: Names.callCC,
  check(frame) { requireWidth(frame, this.name, 2) },
  next: only(1),
  apply(frame, ctx) {
    const proc = frame.valueAt(1)
    if (!isProcedure(proc)) throw notApplicable(prettyPrint(proc, false))
    if (!acceptsCount(proc.arity, 1)) {
      throw arityMismatch(procedureName(proc), proc.arity, 1)
    }
    return {type: 'apply', proc, args: [ctx.captureContinuation()]}
  }
}

const rules = new Map<SpecialForm, FormRule>()

/** The special-form identities, by keyword. */
export const specialForms = new Map<string, SpecialForm>()

function register(rule: FormRule): SpecialForm {
  const form = new SpecialForm(rule.name)
  rules.set(form, rule)
  specialForms.set(rule.name, form)
  return form
}

for (let rule of [quote, define, set, lambda, if_, begin, and, or]) register(rule)
specialForms.set(Names.callWithCurrentContinuation, register(callCC))

/** Returns the evaluation rules of `form`. */
export function ruleFor(form: SpecialForm): FormRule {
  const rule = rules.get(form)
  if (rule === undefined) throw new Error(`no rules for special form ${form.name}`)
  return rule
}

/** Binds every special-form keyword in `env`. */
export function installSpecialForms(env: Environment): void {
  for (let [name, form] of specialForms) env.define(Sym.of(name), form)
}
