import {
  Composite, Expression, SpecialForm, Value
} from './Cairn'
import type {Environment} from './Environment'

/**
 * One element of a frame. A slot starts out `pending` (holding the
 * unevaluated expression), may become `active` while a child frame computes
 * it, and ends up holding a `value`.
 */
export type Slot =
  { readonly state: 'pending', readonly expr: Expression } |
  { readonly state: 'active' } |
  { readonly state: 'value', readonly value: Value }

const active: Slot = {state: 'active'}

/**
 * What a frame turned out to be once its operator slot was evaluated:
 *
 * - `null`: not known yet (slot 0 has not been evaluated)
 * - a {@link SpecialForm}: the frame follows that form's evaluation rules
 * - `'call'`: an ordinary procedure application
 * - `'return'`: a procedure application whose body is running in the frame
 *   above; the frame only passes the body's value on to its own parent
 */
export type FormKind = SpecialForm | 'call' | 'return' | null

/**
 * A partially evaluated composite expression.
 *
 * Frames are immutable: every change produces a new frame, and the old one is
 * left untouched. A continuation can therefore hold on to any frame it
 * captured without copying it.
 */
export class Frame {
  readonly slots: ReadonlyArray<Slot>
  readonly env: Environment
  readonly form: FormKind
  /** True if this frame's value is the value of the frame below it */
  readonly tail: boolean
  private readonly active: number | null
  /** Lowest pending slot, or `width` if none is left */
  private readonly pending: number

  private constructor(
    slots: ReadonlyArray<Slot>,
    env: Environment,
    form: FormKind,
    tail: boolean,
    active: number | null,
    pending: number
  ) {
    this.slots = slots
    this.env = env
    this.form = form
    this.tail = tail
    this.active = active
    this.pending = pending
  }

  /** A fresh frame for `expr` with every slot pending. */
  static of(expr: Composite, env: Environment, tail: boolean): Frame {
    return new Frame(
      expr.map((e): Slot => ({state: 'pending', expr: e})), env, null, tail,
      null, 0)
  }

  get width(): number { return this.slots.length }

  /** Index of the active slot, or `null` if no child frame is running. */
  activeIndex(): number | null {
    return this.active
  }

  /** Index of the first pending slot at or after `from`, or `null`. */
  firstPending(from = 0): number | null {
    if (this.pending >= from) {
      return this.pending < this.slots.length ? this.pending : null
    }
    for (let i = from; i < this.slots.length; i++) {
      if (this.slots[i].state === 'pending') return i
    }
    return null
  }

  /**
   * Returns the unevaluated expression in slot `i`. Throws if the slot has
   * already been evaluated or is active.
   */
  expressionAt(i: number): Expression {
    const slot = this.slots[i]
    if (slot === undefined || slot.state !== 'pending') {
      throw new Error(`slot ${i} of frame holds no expression`)
    }
    return slot.expr
  }

  /** Returns the value in slot `i`. Throws if the slot holds no value. */
  valueAt(i: number): Value {
    const slot = this.slots[i]
    if (slot === undefined || slot.state !== 'value') {
      throw new Error(`slot ${i} of frame holds no value`)
    }
    return slot.value
  }

  /** True if slot `i` holds a value. */
  hasValue(i: number): boolean {
    const slot = this.slots[i]
    return slot !== undefined && slot.state === 'value'
  }

  /** The values of every slot, in order. Throws if any slot is unevaluated. */
  values(): Value[] {
    return this.slots.map((s, i) => this.valueAt(i))
  }

  /**
   * Stores `value` into slot `i`. Storing into the operator slot of a frame
   * whose form is still unknown also settles the form.
   */
  withValue(i: number, value: Value): Frame {
    const slots = this.slots.slice()
    slots[i] = {state: 'value', value}
    let form = this.form
    if (i === 0 && form === null) {
      form = value instanceof SpecialForm ? value : 'call'
    }
    return new Frame(slots, this.env, form, this.tail,
      i === this.active ? null : this.active, nextPending(slots, this.pending))
  }

  /** Marks slot `i` as being computed by a child frame. */
  withActive(i: number): Frame {
    if (this.active !== null) {
      throw new Error('frame already has an active slot')
    }
    const slots = this.slots.slice()
    slots[i] = active
    return new Frame(slots, this.env, this.form, this.tail,
      i, nextPending(slots, this.pending))
  }

  /** This frame, turned into a return frame waiting on a procedure body. */
  awaitingBody(): Frame {
    return new Frame(
      this.slots, this.env, 'return', this.tail, this.active, this.pending)
  }
}

/** Moves the pending cursor past slots that are no longer pending. */
function nextPending(slots: ReadonlyArray<Slot>, from: number): number {
  let i = from
  while (i < slots.length && slots[i].state !== 'pending') i++
  return i
}

/**
 * The explicit call stack, as a persistent linked list of frames. `top` is
 * the innermost, currently active frame.
 *
 * Pushing, popping, and replacing the top frame all return a new stack and
 * share everything below with the old one, so a snapshot of the stack is
 * just a reference to it.
 */
export class Stack {
  readonly top: Frame
  readonly below: Stack | null
  readonly depth: number

  private constructor(top: Frame, below: Stack | null) {
    this.top = top
    this.below = below
    this.depth = below ? below.depth + 1 : 1
  }

  static push(stack: Stack | null, frame: Frame): Stack {
    return new Stack(frame, stack)
  }

  /** A stack with `frame` in place of the current top frame. */
  replaceTop(frame: Frame): Stack {
    return new Stack(frame, this.below)
  }

  /** The frames of this stack, bottom first. */
  frames(): Frame[] {
    const out: Frame[] = []
    for (let s: Stack | null = this; s; s = s.below) out.push(s.top)
    return out.reverse()
  }
}
