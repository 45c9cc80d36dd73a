export const version = '0.1.0'

export const quote = 'quote'
export const define = 'define'
export const set = 'set!'
export const lambda = 'lambda'
export const if_ = 'if'
export const begin = 'begin'
export const and = 'and'
export const or = 'or'
export const callCC = 'call/cc'
export const callWithCurrentContinuation = 'call-with-current-continuation'

/** Printed in place of a slot whose value a child frame is computing */
export const activeSlot = '●'

/** Printed after a frame that is waiting for its procedure body to return */
export const awaitingBody = '⇐'
