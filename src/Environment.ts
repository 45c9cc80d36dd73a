import {
  Value, Sym, exactly, arityMismatch, unboundVariable
} from './Cairn'

/**
 * A lexical environment: a mapping from symbol names to values, plus a
 * reference to the enclosing environment (`null` for the global environment).
 *
 * Environments are shared, never copied. Any number of lambdas, frames, and
 * continuation snapshots may hold the same environment, and a mutation made
 * through one of them is visible through all of them.
 */
export class Environment {
  readonly parent: Environment | null
  private readonly bindings = new Map<string, Value>()

  constructor(parent: Environment | null = null) {
    this.parent = parent
  }

  /**
   * Looks `sym` up in this environment, then in each enclosing environment in
   * turn. Throws `UnboundVariable` if no environment in the chain binds it.
   */
  lookup(sym: Sym): Value {
    for (let env: Environment | null = this; env; env = env.parent) {
      const value = env.bindings.get(sym.name)
      if (value !== undefined) return value
    }
    throw unboundVariable(sym.name)
  }

  /** Creates or overwrites a binding in this environment only. */
  define(sym: Sym, value: Value): void {
    this.bindings.set(sym.name, value)
  }

  /**
   * Overwrites the nearest existing binding of `sym`, starting from this
   * environment. Throws `UnboundVariable` if no environment in the chain binds
   * it; never creates a binding.
   */
  set(sym: Sym, value: Value): void {
    for (let env: Environment | null = this; env; env = env.parent) {
      if (env.bindings.has(sym.name)) {
        env.bindings.set(sym.name, value)
        return
      }
    }
    throw unboundVariable(sym.name)
  }

  /** True if `sym` is bound in this environment itself (not a parent). */
  hasOwn(sym: Sym): boolean {
    return this.bindings.has(sym.name)
  }

  /**
   * Returns a new child environment of this one that binds each of `params`
   * to the argument at the same position. Throws `ArityMismatch` unless there
   * are exactly as many arguments as parameters.
   *
   * @param procName Name of the procedure being applied, for error messages.
   */
  childWithBindings(
    params: ReadonlyArray<Sym>,
    args: ReadonlyArray<Value>,
    procName = 'lambda'
  ): Environment {
    if (params.length !== args.length) {
      throw arityMismatch(procName, exactly(params.length), args.length)
    }
    const child = new Environment(this)
    params.forEach((p, i) => child.define(p, args[i]))
    return child
  }

  /** Names bound in this environment itself, in definition order. */
  names(): string[] {
    return [...this.bindings.keys()]
  }
}
