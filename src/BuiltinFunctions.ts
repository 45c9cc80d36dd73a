import {
  Value, Arity, Sym, Pair, Builtin, ControlBuiltin, Redirect, nil, exactly,
  atLeast, list, listToArray, isEq, isEqual, isProcedure, valueToExpression,
  unspecified
} from './Cairn'
import {Environment} from './Environment'
import {installSpecialForms} from './SpecialForms'
import prettyPrint from './PrettyPrint'
import * as _ from 'lodash'
import stringLength from 'string-length'

export type Fn = (args: Value[]) => Value

function show(v: Value): string {
  return prettyPrint(v, false)
}

function num(v: Value): number {
  if (typeof v !== 'number') throw new TypeError(`expected a number, got ${show(v)}`)
  return v
}

function str(v: Value): string {
  if (typeof v !== 'string') throw new TypeError(`expected a string, got ${show(v)}`)
  return v
}

function pair(v: Value): Pair {
  if (!(v instanceof Pair)) throw new TypeError(`expected a pair, got ${show(v)}`)
  return v
}

function properList(v: Value): Value[] {
  const items = listToArray(v)
  if (items === undefined) throw new TypeError(`expected a list, got ${show(v)}`)
  return items
}

/** A numeric comparison that holds for every adjacent pair of arguments. */
function chain(test: (a: number, b: number) => boolean): Fn {
  return args => {
    const ns = args.map(num)
    return _.every(_.zip(_.initial(ns), _.tail(ns)),
      ([a, b]) => a !== undefined && b !== undefined && test(a, b))
  }
}

function is(test: (v: Value) => boolean): [Arity, Fn] {
  return [exactly(1), ([x]) => test(x)]
}

const fns: {[name: string]: [Arity, Fn]} = {
  // arithmetic
  '+': [atLeast(0), args => _.sum(args.map(num))],
  '-': [atLeast(1), args => {
    const [first, ...rest] = args.map(num)
    return rest.length === 0 ? -first : rest.reduce((a, b) => a - b, first)
  }],
  '*': [atLeast(0), args => args.map(num).reduce((a, b) => a * b, 1)],
  '/': [atLeast(1), args => {
    const [first, ...rest] = args.map(num)
    const divisors = rest.length === 0 ? [first] : rest
    if (_.includes(divisors, 0)) throw new RangeError('division by zero')
    return rest.length === 0 ? 1 / first : rest.reduce((a, b) => a / b, first)
  }],
  'remainder': [exactly(2), ([a, b]) => {
    if (num(b) === 0) throw new RangeError('division by zero')
    return num(a) % num(b)
  }],
  '=': [atLeast(2), chain((a, b) => a === b)],
  '<': [atLeast(2), chain((a, b) => a < b)],
  '>': [atLeast(2), chain((a, b) => a > b)],
  '<=': [atLeast(2), chain((a, b) => a <= b)],
  '>=': [atLeast(2), chain((a, b) => a >= b)],

  // equivalence and type predicates
  'not': is(x => x === false),
  'eq?': [exactly(2), ([a, b]) => isEq(a, b)],
  'equal?': [exactly(2), ([a, b]) => isEqual(a, b)],
  'number?': is(x => typeof x === 'number'),
  'string?': is(x => typeof x === 'string'),
  'boolean?': is(x => typeof x === 'boolean'),
  'symbol?': is(x => x instanceof Sym),
  'procedure?': is(isProcedure),
  'null?': is(x => x === nil),
  'pair?': is(x => x instanceof Pair),

  // lists
  'cons': [exactly(2), ([a, b]) => new Pair(a, b)],
  'car': [exactly(1), ([p]) => pair(p).car],
  'cdr': [exactly(1), ([p]) => pair(p).cdr],
  'list': [atLeast(0), args => list(...args)],
  'length': [exactly(1), ([l]) => properList(l).length],

  // strings and symbols
  'string-length': [exactly(1), ([s]) => stringLength(str(s))],
  'string-append': [atLeast(0), args => args.map(str).join('')],
  'symbol->string': [exactly(1), ([s]) => {
    if (!(s instanceof Sym)) throw new TypeError(`expected a symbol, got ${show(s)}`)
    return s.name
  }],
  'string->symbol': [exactly(1), ([s]) => Sym.of(str(s))],
  'number->string': [exactly(1), ([n]) => '' + num(n)]
}

/**
 * `(apply proc arg ... list)` calls `proc` with the `arg`s followed by the
 * elements of `list`.
 */
const apply = new ControlBuiltin('apply', atLeast(2), (args): Redirect => {
  const [proc, ...rest] = args
  const spread = properList(rest[rest.length - 1])
  return {type: 'apply', proc, args: [..._.initial(rest), ...spread]}
})

/**
 * Returns the builtin procedures, keyed by name. `display` and `newline`
 * write to `output`.
 */
export function builtins(output: (text: string) => void): Map<string, Builtin> {
  const all = new Map<string, Builtin>()
  for (let name of Object.keys(fns)) {
    const [arity, fn] = fns[name]
    all.set(name, new Builtin(name, arity, fn))
  }
  all.set('display', new Builtin('display', exactly(1), ([x]) => {
    output(typeof x === 'string' ? x : show(x))
    return unspecified
  }))
  all.set('newline', new Builtin('newline', exactly(0), () => {
    output('\n')
    return unspecified
  }))
  return all
}

/**
 * Creates a global environment holding every special form and builtin
 * procedure.
 */
export function standardEnvironment(
  output: (text: string) => void = text => { process.stdout.write(text) }
): Environment {
  const env = new Environment()
  installSpecialForms(env)
  for (let [name, fn] of builtins(output)) env.define(Sym.of(name), fn)
  env.define(Sym.of('apply'), apply)
  env.define(Sym.of('eval'), new ControlBuiltin('eval', exactly(1), ([datum]) => {
    const expr = valueToExpression(datum)
    if (expr === undefined) throw new TypeError(`cannot evaluate ${show(datum)}`)
    return {type: 'eval', expr, env}
  }))
  return env
}
