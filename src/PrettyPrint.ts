import {
  Value, Sym, Pair, Builtin, ControlBuiltin, Lambda, Continuation, SpecialForm,
  Unspecified, nil, quoteExpression
} from './Cairn'
import type {Frame, Slot, Stack} from './Frame'
import {activeSlot, awaitingBody} from './ReservedNames'
import chalk from 'chalk'
import {join, sum, identity} from 'lodash'

const defaultIndent = 2
const maxLength = 80
const maxEntries = 64
const maxDepth = 36

function spaces(n: number) {
  let s = ''
  for (let i = 0; i < n; i++) s += ' '
  return s
}

const escapes: {[e: string]: string} = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '"': '\\"',
  '\\': '\\\\'
}

function quoteString(
  str: string,
  quoteColor: (s: string) => string = identity,
  escapeColor: (s: string) => string = identity
): string {
  let out = quoteColor('"')
  for (let c of str) {
    out += escapes.hasOwnProperty(c) ? escapeColor(escapes[c]) : c
  }
  return out + quoteColor('"')
}

abstract class Form {
  abstract length(): number
  abstract toStringInline(color?: boolean): string
  abstract toStringBlock(color?: boolean, offset?: number, hanging?: number): string
  toString(color = true, offset = 0, hanging?: number) {
    if (this.length() < maxLength - offset) {
      return this.toStringInline(color)
    } else {
      return this.toStringBlock(color, offset, hanging)
    }
  }
}

/**
 * A parenthesized list. `tail` is the form after the dot of an improper
 * list, and `suffix` is printed after the closing paren.
 */
class ListForm extends Form {
  elements: Form[]
  tail?: Form
  suffix: string

  constructor(elements: Form[], tail?: Form, suffix = '') {
    super()
    this.elements = elements
    this.tail = tail
    this.suffix = suffix
  }

  private all(): Form[] {
    return this.tail
      ? [...this.elements, new ConstantForm('.'), this.tail]
      : this.elements
  }

  length() {
    const all = this.all()
    return 2 + sum(all.map(x => x.length())) +
           (all.length > 0 ? all.length - 1 : 0) +
           (this.suffix ? this.suffix.length + 1 : 0)
  }

  private close(color: boolean) {
    const paren = color ? chalk.cyan(')') : ')'
    if (!this.suffix) return paren
    return paren + ' ' + (color ? chalk.magenta(this.suffix) : this.suffix)
  }

  toStringInline(color = true) {
    return (color ? chalk.cyan('(') : '(') +
           join(this.all().map(x => x.toStringInline(color)), ' ') +
           this.close(color)
  }

  /** Block layout: the head stays on the first line, the rest hang below. */
  toStringBlock(color = true, offset = 0, hanging = offset) {
    const [head, ...rest] = this.all()
    if (head === undefined) return this.toStringInline(color)
    const indent = hanging + defaultIndent
    return (color ? chalk.cyan('(') : '(') +
      head.toString(color, offset + 1, indent) +
      join(rest.map(x => '\n' + spaces(indent) + x.toString(color, indent, indent)), '') +
      this.close(color)
  }
}

class ConstantForm extends Form {
  str: string
  color: (s: string) => string

  constructor(str: string, color: (s: string) => string = identity) {
    super()
    this.str = str
    this.color = color
  }

  length() { return this.str.length }
  toStringInline(color = true) { return color ? this.color(this.str) : this.str }
  toStringBlock(color = true) { return this.toStringInline(color) }
}

class StringForm extends Form {
  str: string
  len: number

  constructor(str: string) {
    super()
    this.str = str
    this.len = quoteString(str).length
  }

  length() { return this.len }

  toStringInline(color = true) {
    return quoteString(this.str,
      color ? chalk.green : identity,
      color ? chalk.yellow : identity)
  }

  toStringBlock(color = true) { return this.toStringInline(color) }
}

function paramList(params: ReadonlyArray<Sym>) {
  return '(' + join(params.map(p => p.name), ' ') + ')'
}

function buildForms(it: Value, depth = 0): Form {
  if (depth >= maxDepth) {
    return new ConstantForm('...', chalk.gray)
  } else if (it === nil) {
    return new ConstantForm('()', chalk.magentaBright)
  } else if (it === true) {
    return new ConstantForm('#t', chalk.greenBright)
  } else if (it === false) {
    return new ConstantForm('#f', chalk.redBright)
  } else if (typeof it === 'number') {
    return new ConstantForm('' + it, chalk.cyanBright)
  } else if (typeof it === 'string') {
    return new StringForm(it)
  } else if (it instanceof Sym) {
    return new ConstantForm(it.name)
  } else if (it instanceof Pair) {
    const elements: Form[] = []
    let cell: Value = it
    while (cell instanceof Pair) {
      if (elements.length >= maxEntries) {
        return new ListForm([...elements, new ConstantForm('...', chalk.gray)])
      }
      elements.push(buildForms(cell.car, depth + 1))
      cell = cell.cdr
    }
    return new ListForm(elements,
      cell === nil ? undefined : buildForms(cell, depth + 1))
  } else if (it instanceof Builtin || it instanceof ControlBuiltin) {
    return new ConstantForm(`#<procedure ${it.name}>`, chalk.yellow)
  } else if (it instanceof Lambda) {
    return new ConstantForm(`#<lambda ${paramList(it.params)}>`, chalk.yellow)
  } else if (it instanceof Continuation) {
    return new ConstantForm('#<continuation>', chalk.yellow)
  } else if (it instanceof SpecialForm) {
    return new ConstantForm(`#<special-form ${it.name}>`, chalk.yellowBright)
  } else if (it instanceof Unspecified) {
    return new ConstantForm('#<unspecified>', chalk.gray)
  }
  return new ConstantForm('' + it, chalk.yellow)
}

/** Renders a value in Scheme notation. */
export default function prettyPrint(it: Value, color = true) {
  return buildForms(it).toString(color)
}

function slotForm(slot: Slot): Form {
  switch (slot.state) {
    case 'pending': return buildForms(quoteExpression(slot.expr))
    case 'active': return new ConstantForm(activeSlot, chalk.bold.yellow)
    case 'value': return buildForms(slot.value)
  }
}

/**
 * Renders a frame as its list of slots: unevaluated operands as source, the
 * values computed so far, and the slot a child frame is computing as `●`.
 */
export function frameToString(frame: Frame, color = true): string {
  return new ListForm(frame.slots.map(slotForm), undefined,
    frame.form === 'return' ? awaitingBody : '').toStringInline(color)
}

/** Renders every frame of a stack, bottom first, on one line. */
export function stackToString(stack: Stack, color = true): string {
  return join(stack.frames().map(f => frameToString(f, color)), ' ')
}
