import {Value, Continuation} from './Cairn'
import type {Stack} from './Frame'

/**
 * Where evaluation stands after a value has been handed to a stack: either
 * there are frames left to run, or the stack was used up and `value` is the
 * final result.
 */
export type Resumption =
  { readonly done: false, readonly stack: Stack } |
  { readonly done: true, readonly value: Value }

/**
 * Hands `value` to the stack, as the result of the frame that was just popped
 * off it. The value goes into the active slot of the top frame; return
 * frames, which only wait for their procedure body, pass it further down.
 */
export function returnTo(stack: Stack | null, value: Value): Resumption {
  return fill(stack, stack ? stack.top.activeIndex() : null, value)
}

function fill(stack: Stack | null, slot: number | null, value: Value): Resumption {
  let s = stack, i = slot
  while (s && s.top.form === 'return') {
    s = s.below
    i = s ? s.top.activeIndex() : null
  }
  if (s === null) return {done: true, value}
  if (i === null) throw new Error('frame below a finished frame has no active slot')
  return {done: false, stack: s.replaceTop(s.top.withValue(i, value))}
}

/**
 * Captures the continuation of the top frame of `stack`, which must be the
 * `call/cc` frame. The snapshot is the stack below that frame; since stacks
 * and frames are immutable, holding the reference is enough to preserve it.
 */
export function capture(stack: Stack): Continuation {
  const snapshot = stack.below
  return new Continuation(snapshot, snapshot ? snapshot.top.activeIndex() : null)
}

/**
 * Invokes `k` with `value`. Whatever stack is current is abandoned: the
 * returned resumption starts from the snapshot, with `value` stored in the
 * slot that was waiting for the `call/cc` result. A continuation can be
 * resumed any number of times; each resumption starts from the same
 * snapshot.
 */
export function resume(k: Continuation, value: Value): Resumption {
  return fill(k.snapshot, k.targetSlot, value)
}
