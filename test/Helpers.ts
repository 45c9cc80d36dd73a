import {Value, Err, CairnError} from '../src/Cairn'
import {Interpreter} from '../src/Interpreter'
import prettyPrint from '../src/PrettyPrint'
import * as assert from 'assert'
import {expect} from 'chai'

/**
 * A fresh interpreter, plus assertions about what it makes of source text.
 * Everything `display` writes is collected in `output`.
 */
export class TestCase {
  readonly interp: Interpreter
  readonly output: string[] = []

  constructor() {
    this.interp = new Interpreter({output: text => { this.output.push(text) }})
  }

  /** Evaluates every form in `src`, returning the last value. */
  eval(src: string): Value {
    return this.interp.evalString(src, '<test>')
  }

  /** Evaluates `src` and prints the result without color. */
  print(src: string): string {
    return prettyPrint(this.eval(src), false)
  }

  equal(src: string, value: Value): void {
    expect(this.eval(src)).to.deep.equal(value)
  }

  printed(src: string, text: string): void {
    expect(this.print(src)).to.equal(text)
  }

  /**
   * Asserts that evaluating `src` raises a `CairnError` of kind `err`, and
   * returns the error for further checks.
   */
  raise(err: Err, src: string): CairnError {
    try {
      const result = this.eval(src)
      throw new assert.AssertionError({
        message: `no error was raised; got ${prettyPrint(result, false)}`,
        expected: {err}
      })
    } catch (ex) {
      if (ex instanceof assert.AssertionError) throw ex
      expect(ex).to.be.an.instanceof(CairnError)
      if (!(ex instanceof CairnError)) throw ex
      expect(ex.err).to.equal(err, 'wrong error type')
      return ex
    }
  }

  /** Everything written by `display` and `newline` so far. */
  get displayed(): string {
    return this.output.join('')
  }
}

export const withInterpreter = (body: (should: TestCase) => void) => () =>
  body(new TestCase())
