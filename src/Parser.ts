/* *
 * --- Cairn Source Parser ---
 *
 * Reads Scheme source text into expressions: lists in () or [], symbols,
 * numbers, strings, booleans, ' for quote, ; line comments, and #| |#
 * block comments (which may nest).
 */

import * as _ from 'lodash'
import XRegExp from 'xregexp'
import {Expression, Sym, nil} from './Cairn'
import {quote} from './ReservedNames'

const number = XRegExp(`^
  ([+-])?            # sign
  ([0-9]*)           # before decimal point
  (\\.)?             # decimal point
  ([0-9]+)           # after decimal point (or before, if missing)
  ([eE][+-]?[0-9]+)? # exponent
$`, 'x')

function charClass(chars: Iterable<string>, not = false) {
  return (not ? '[^' : '[') + _.join([...chars].map(c => XRegExp.escape(c)), '') + ']'
}

const whitespaceChars = new Set([
  ' ', '\t', '\n', '\r', '\f', '\v', ' ', ' ', ' ', '﻿'
])

const parenChars = new Map([
  ['(', ')'],
  ['[', ']']
])

const closeChars = new Set(parenChars.values())

const escapes = new Map<string, string>([
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['\\', '\\'],
  ['"', '"']
])

const booleans = new Map<string, boolean>([
  ['#t', true],
  ['#true', true],
  ['#f', false],
  ['#false', false]
])

const reservedChars = new Set(whitespaceChars)
for (let [open, close] of parenChars) {
  reservedChars.add(open)
  reservedChars.add(close)
}
for (let c of ['"', ';', "'"]) reservedChars.add(c)

const whitespace = XRegExp(charClass(whitespaceChars))
const openParen = XRegExp(charClass(parenChars.keys()))
const bareToken = XRegExp('^(' + charClass(reservedChars, true) + '+)')

/**
 * The Cairn reader. Pass it source text one chunk at a time via `read`, then
 * retrieve the parsed expressions via `getOneResult` or `getManyResults`.
 * A form may be split across chunks; `isDone` tells whether every form read
 * so far is complete.
 */
class Parser {
  filename?: string
  line: number = 0
  column: number = 0
  stack: Parser.Frame[] = []
  frame: Parser.Frame = {
    type: T.Root,
    contents: [],
    location: {line: 0, column: 0}
  }
  /** Depth of the unterminated block comment, if one spans chunks */
  commentDepth = 0

  constructor(filename?: string) {
    this.filename = filename
  }

  /**
   * Reads and parses another chunk of source. Throws a `Parser.ParseError` if
   * the chunk is malformed.
   */
  read(str: string) {
    let i = 0, lastNewline = 0 - this.column
    const end = str.length
    const loc = (): Parser.Location =>
      ({filename: this.filename, line: this.line, column: i - lastNewline})

    parsing: while (i < end) {
      let expr: Expression
      const c = str.charAt(i)

      // Block comments
      // ───────────────────────────────────────────────────────────────────
      if (this.commentDepth > 0 || (this.frame.type !== T.String &&
          c === '#' && str.charAt(i + 1) === '|')) {
        if (this.commentDepth === 0) {
          this.commentDepth = 1
          i += 2
        }
        while (this.commentDepth > 0 && i < end) {
          const d = str.charAt(i)
          if (d === '\n') {
            this.line++; lastNewline = i
          }
          if (d === '|' && str.charAt(i + 1) === '#') {
            this.commentDepth--
            i += 2
          } else if (d === '#' && str.charAt(i + 1) === '|') {
            this.commentDepth++
            i += 2
          } else i++
        }
        continue parsing
      }

      // String contents
      // ───────────────────────────────────────────────────────────────────
      if (this.frame.type === T.String) {
        if (c === '"') {
          expr = this.frame.text || ''
          this.pop(loc)
          i++
        } else {
          if (c === '\\') {
            const escape = str.charAt(++i)
            const result = escapes.get(escape)
            if (result === undefined) throw new Parser.ParseError(
              `invalid escape: \\${escape}`, loc())
            this.frame.text = (this.frame.text || '') + result
          } else {
            if (c === '\n') {
              this.line++; lastNewline = i
            }
            this.frame.text = (this.frame.text || '') + c
          }
          i++
          continue parsing
        }
      }

      // Line comments
      // ───────────────────────────────────────────────────────────────────
      else if (c === ';') {
        const eol = str.indexOf('\n', i)
        i = eol < 0 ? end : eol
        continue parsing
      }

      // Whitespace
      // ───────────────────────────────────────────────────────────────────
      else if (whitespace.test(c)) {
        if (c === '\n') {
          this.line++; lastNewline = i
        }
        i++
        continue parsing
      }

      // Quote prefix: 'x reads as (quote x)
      // ───────────────────────────────────────────────────────────────────
      else if (c === "'") {
        this.stack.push(this.frame)
        this.frame = {type: T.Quote, contents: [Sym.of(quote)], location: loc()}
        i++
        continue parsing
      }

      // Opening a list
      // ───────────────────────────────────────────────────────────────────
      else if (openParen.test(c)) {
        this.stack.push(this.frame)
        this.frame = {
          type: T.List, contents: [], location: loc(),
          open: c, close: parenChars.get(c)
        }
        i++
        continue parsing
      }

      // Closing a list
      // ───────────────────────────────────────────────────────────────────
      else if (closeChars.has(c)) {
        if (this.frame.type !== T.List) {
          throw new Parser.ParseError(`unexpected ${c}`, loc())
        } else if (this.frame.close !== c) {
          throw new Parser.ParseError(
            `expected ${this.frame.close} to close ${this.frame.open}, got ${c}`,
            loc())
        }
        expr = this.frame.contents.length === 0 ? nil : this.frame.contents
        this.pop(loc)
        i++
      }

      // Opening a string
      // ───────────────────────────────────────────────────────────────────
      else if (c === '"') {
        this.stack.push(this.frame)
        this.frame = {type: T.String, contents: [], text: '', location: loc()}
        i++
        continue parsing
      }

      // Bare tokens: numbers, booleans, symbols
      // ───────────────────────────────────────────────────────────────────
      else {
        const match = bareToken.exec(str.slice(i))
        if (match == null) throw new Parser.ParseError(`unexpected ${c}`, loc())
        const token = match[0]
        i += token.length
        const bool = booleans.get(token.toLowerCase())
        if (bool !== undefined) expr = bool
        else if (number.test(token)) expr = parseFloat(token)
        else if (token.startsWith('#')) {
          throw new Parser.ParseError(`unknown syntax ${token}`, loc())
        } else expr = Sym.of(token)
      }

      // Adding the finished expression to the structure below it. A quote
      // prefix closes as soon as its one expression is complete, which may
      // in turn complete another quote prefix.
      // ───────────────────────────────────────────────────────────────────
      while (this.frame.type === T.Quote) {
        expr = [...this.frame.contents, expr]
        this.pop(loc)
      }
      this.frame.contents.push(expr)
    }
    this.column = i - lastNewline
  }

  private pop(loc: () => Parser.Location) {
    const popped = this.stack.pop()
    if (popped) this.frame = popped
    else throw new Parser.ParseError('stack underflow', loc())
  }

  /**
   * If the parser has completely parsed *exactly one* expression, returns
   * it. Otherwise, throws a `Parser.ParseError`.
   */
  getOneResult(): Expression {
    this.checkComplete()
    if (this.frame.contents.length === 0) {
      throw new Parser.ParseError('no top-level expression found', this)
    } else if (this.frame.contents.length > 1) {
      throw new Parser.ParseError('more than 1 top-level expression', this)
    }
    return this.frame.contents[0]
  }

  /**
   * If the parser has completely parsed zero or more top-level expressions,
   * returns all of them. Otherwise, throws a `Parser.ParseError`.
   */
  getManyResults(): Expression[] {
    this.checkComplete()
    return this.frame.contents
  }

  /**
   * True if the parser has parsed 1 or more expressions, and does not
   * currently have any unclosed structures.
   */
  isDone(): boolean {
    return this.stack.length === 0 && this.commentDepth === 0 &&
           this.frame.contents.length > 0
  }

  private checkComplete() {
    if (this.stack.length > 0) {
      throw new Parser.ParseError(
        this.frame.open
          ? `unclosed ${this.frame.open}`
          : 'form unterminated due to EOF',
        this.frame.location)
    } else if (this.commentDepth > 0) {
      throw new Parser.ParseError('unclosed block comment', this)
    }
  }
}

namespace Parser {

  export class ParseError extends Error {
    readonly location: Location
    constructor(message: string, location: Location) {
      super(`${message} (${locationToString(location)})`)
      this.name = 'ParseError'
      this.location = location
    }
  }

  export interface Location {
    readonly filename?: string
    readonly line: number
    readonly column: number
  }

  export function locationToString({filename, line, column}: Location) {
    return `${filename || '<no filename>'}, line ${line + 1}, col ${column}`
  }

  export interface Frame {
    type: Frame.Type
    contents: Expression[]
    readonly location: Location
    readonly open?: string
    readonly close?: string
    text?: string
  }

  export namespace Frame {
    export enum Type {
      Root, List, String, Quote
    }
  }
}

const T = Parser.Frame.Type

export default Parser
