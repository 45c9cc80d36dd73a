import {
  Value, Expression, Sym, Arity, Builtin, ControlBuiltin, Lambda, Continuation,
  SpecialForm, Redirect, CairnError, unspecified, isComposite, acceptsCount,
  arityMismatch, notApplicable, builtinError, procedureName
} from './Cairn'
import {Environment} from './Environment'
import {Frame, Stack} from './Frame'
import {ruleFor} from './SpecialForms'
import {Resumption, returnTo, capture, resume} from './Continuation'
import {standardEnvironment} from './BuiltinFunctions'
import Parser from './Parser'
import prettyPrint from './PrettyPrint'

export interface InterpreterOptions {
  /** The global environment. Defaults to a fresh `standardEnvironment`. */
  env?: Environment
  /** Where `display` and `newline` write. Defaults to standard output. */
  output?: (text: string) => void
  /** Called with the stack before every step. */
  trace?: (stack: Stack) => void
}

/** Counters for the evaluation most recently started with `feed`. */
export interface Stats {
  /** Steps taken so far */
  steps: number
  /** Largest number of frames the stack has held */
  maxDepth: number
}

/** Evaluates an atom: symbols are looked up, everything else is itself. */
export function evalAtom(expr: Expression, env: Environment): Value {
  if (expr instanceof Sym) return env.lookup(expr)
  else if (isComposite(expr)) throw new Error('evalAtom called on a composite')
  else return expr
}

function checkArity(name: string, arity: Arity, count: number) {
  if (!acceptsCount(arity, count)) throw arityMismatch(name, arity, count)
}

function callBuiltin(proc: Builtin, args: Value[]): Value {
  try {
    return proc.fn(args)
  } catch (ex) {
    if (ex instanceof CairnError) throw ex
    throw builtinError(proc.name, ex)
  }
}

function enterControl(proc: ControlBuiltin, args: Value[]): Redirect {
  try {
    return proc.enter(args)
  } catch (ex) {
    if (ex instanceof CairnError) throw ex
    throw builtinError(proc.name, ex)
  }
}

/**
 * The stack machine. Nested expressions never recurse on the host's call
 * stack: each one becomes a {@link Frame} on an explicit {@link Stack}, and
 * `step` advances the top frame by one slot (or applies it, once every slot
 * it needs holds a value).
 *
 * An interpreter evaluates one top-level expression at a time. Its global
 * environment carries definitions from one top-level expression to the next.
 */
export class Interpreter {
  readonly global: Environment
  readonly output: (text: string) => void
  stats: Stats = {steps: 0, maxDepth: 0}
  private readonly trace?: (stack: Stack) => void
  private stack: Stack | null = null
  private start: {expr: Expression, env: Environment} | null = null

  constructor(options: InterpreterOptions = {}) {
    this.output = options.output || (text => { process.stdout.write(text) })
    this.global = options.env || standardEnvironment(this.output)
    this.trace = options.trace
  }

  /** The current stack, or `null` if no evaluation is in progress. */
  get currentStack(): Stack | null {
    return this.stack
  }

  /** True if an evaluation has been fed and has not finished yet. */
  get isRunning(): boolean {
    return this.stack !== null || this.start !== null
  }

  /**
   * Starts evaluating `expr` in `env`, discarding any evaluation that was in
   * progress. Nothing is evaluated until `step` or `run` is called.
   */
  feed(expr: Expression, env: Environment = this.global): void {
    this.stats = {steps: 0, maxDepth: 0}
    this.stack = null
    this.start = {expr, env}
  }

  /**
   * Advances the current evaluation by one step. Returns the final value if
   * that step finished the evaluation, or `undefined` if there is more to do.
   *
   * If the step fails, the whole stack is discarded and the error is
   * rethrown; side effects of earlier steps are kept.
   */
  step(): Value | undefined {
    try {
      if (this.start) {
        const {expr, env} = this.start
        this.start = null
        this.stats.steps++
        // The top-level frame is in tail position.
        return this.enter(null, expr, env, true)
      }
      if (this.stack === null) throw new Error('nothing to evaluate')
      this.stats.steps++
      if (this.trace) this.trace(this.stack)
      return this.advance(this.stack)
    } catch (ex) {
      this.stack = null
      throw ex
    }
  }

  /** Steps until the current evaluation finishes, and returns its value. */
  run(): Value {
    for (;;) {
      const result = this.step()
      if (result !== undefined) return result
    }
  }

  /** Evaluates `expr` in `env` to completion. */
  evaluate(expr: Expression, env: Environment = this.global): Value {
    this.feed(expr, env)
    return this.run()
  }

  /**
   * Reads every top-level form in `src` and evaluates them in order in the
   * global environment. Returns the value of the last one.
   */
  evalString(src: string, filename = '<input>'): Value {
    const parser = new Parser(filename)
    parser.read(src)
    let result: Value = unspecified
    for (let expr of parser.getManyResults()) result = this.evaluate(expr)
    return result
  }

  private setStack(stack: Stack): undefined {
    this.stack = stack
    if (stack.depth > this.stats.maxDepth) this.stats.maxDepth = stack.depth
    return undefined
  }

  private resumeWith(resumption: Resumption): Value | undefined {
    if (resumption.done) {
      this.stack = null
      return resumption.value
    }
    return this.setStack(resumption.stack)
  }

  /**
   * Makes `expr` the content of a new frame on top of `below`. An atom needs
   * no frame: its value goes straight to `below`.
   */
  private enter(
    below: Stack | null,
    expr: Expression,
    env: Environment,
    tail: boolean
  ): Value | undefined {
    if (isComposite(expr)) {
      return this.setStack(Stack.push(below, Frame.of(expr, env, tail)))
    }
    return this.resumeWith(returnTo(below, evalAtom(expr, env)))
  }

  private nextSlot(frame: Frame): number | null {
    const form = frame.form
    if (form === null) return 0
    else if (form === 'call') return frame.firstPending(1)
    else if (form === 'return') throw new Error('return frame on top of the stack')
    const rule = ruleFor(form)
    rule.check(frame)
    return rule.next(frame)
  }

  private advance(stack: Stack): Value | undefined {
    const frame = stack.top
    const i = this.nextSlot(frame)
    if (i === null) return this.applyFrame(stack, frame)
    const expr = frame.expressionAt(i)
    if (isComposite(expr)) {
      return this.setStack(Stack.push(
        stack.replaceTop(frame.withActive(i)),
        Frame.of(expr, frame.env, false)))
    }
    return this.setStack(
      stack.replaceTop(frame.withValue(i, evalAtom(expr, frame.env))))
  }

  private applyFrame(stack: Stack, frame: Frame): Value | undefined {
    if (frame.form instanceof SpecialForm) {
      const outcome = ruleFor(frame.form).apply(frame, {
        captureContinuation: () => capture(stack)
      })
      switch (outcome.type) {
        case 'value':
          return this.resumeWith(returnTo(stack.below, outcome.value))
        case 'tail':
          return this.enter(stack.below, outcome.expr, outcome.env, frame.tail)
        case 'apply':
          return this.apply(stack, frame, outcome.proc, outcome.args)
      }
    }
    const [proc, ...args] = frame.values()
    return this.apply(stack, frame, proc, args)
  }

  /**
   * Applies `proc` to `args` in place of `frame`, the top frame of `stack`.
   *
   * A lambda applied from a frame in tail position replaces that frame with
   * its body. Otherwise the frame stays on the stack, waiting, and the body
   * is pushed above it.
   */
  private apply(
    stack: Stack,
    frame: Frame,
    proc: Value,
    args: Value[]
  ): Value | undefined {
    for (;;) {
      if (proc instanceof Builtin) {
        checkArity(proc.name, proc.arity, args.length)
        return this.resumeWith(returnTo(stack.below, callBuiltin(proc, args)))
      } else if (proc instanceof Lambda) {
        const env = proc.closureEnv.childWithBindings(
          proc.params, args, procedureName(proc))
        const below = frame.tail
          ? stack.below
          : stack.replaceTop(frame.awaitingBody())
        return this.enter(below, proc.body, env, true)
      } else if (proc instanceof Continuation) {
        checkArity(procedureName(proc), proc.arity, args.length)
        return this.resumeWith(resume(proc, args[0]))
      } else if (proc instanceof ControlBuiltin) {
        checkArity(proc.name, proc.arity, args.length)
        const redirect = enterControl(proc, args)
        if (redirect.type === 'eval') {
          return this.enter(stack.below, redirect.expr, redirect.env, frame.tail)
        }
        proc = redirect.proc
        args = redirect.args
      } else {
        throw notApplicable(prettyPrint(proc, false))
      }
    }
  }
}
