import chalk from 'chalk'
import * as ReadLine from 'readline'
import stringLength from 'string-length'
import {Expression} from './Cairn'
import Parser from './Parser'

export interface ReplOptions {
  /** The prompt; receives the number of the next input. */
  prompt: (counter: number) => string
  /** Displayed once, before the first prompt */
  message?: string
  /** Called when the input stream ends */
  onClose?: () => void
}

function blank(text: string) {
  let s = ''
  for (let i = stringLength(text); i > 0; i--) s += ' '
  return s
}

/**
 * Displays a prompt, waits for a complete top-level form, parses it, and
 * passes it to `cb`, then prompts again. A line that leaves a form unclosed
 * gets a `…` continuation prompt; a blank line discards whatever was typed
 * so far. Parse errors are printed and the prompt starts over.
 *
 * Several forms on one line are passed to `cb` one at a time, and share one
 * input number.
 */
export default function repl(
  options: ReplOptions,
  cb: (input: Expression, counter: number) => void
): ReadLine.Interface {
  let counter = 1
  let parser = new Parser('REPL Input')
  const rl = ReadLine.createInterface({
    input: process.stdin,
    output: process.stdout
  })

  function prompt() {
    parser = new Parser('REPL Input')
    rl.setPrompt(options.prompt(counter) + ' ')
    rl.prompt()
  }

  rl.on('line', input => {
    if (input.trim() === '') {
      prompt()
      return
    }
    let results: Expression[] = []
    try {
      parser.read(input + '\n')
      if (parser.stack.length > 0 || parser.commentDepth > 0) {
        rl.setPrompt(chalk.gray('…') + blank(options.prompt(counter)))
        rl.prompt()
        return
      }
      results = parser.getManyResults()
    } catch (ex) {
      console.error(chalk.redBright(ex instanceof Error ? ex.message : String(ex)))
      prompt()
      return
    }
    for (let expr of results) cb(expr, counter)
    if (results.length > 0) counter++
    prompt()
  }).on('close', () => {
    if (options.onClose) options.onClose()
  })

  if (options.message) console.log(options.message)
  prompt()
  return rl
}
