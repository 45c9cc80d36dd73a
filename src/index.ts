#!/usr/bin/env node
import commandLineArgs from 'command-line-args'
import commandLineUsage from 'command-line-usage'
import {mapSeries} from 'async'
import * as _ from 'lodash'
import chalk from 'chalk'
import {readFile} from 'fs'
import {Value, Expression, CairnError, Unspecified} from './Cairn'
import {Interpreter} from './Interpreter'
import Parser from './Parser'
import prettyPrint, {stackToString} from './PrettyPrint'
import {version} from './ReservedNames'
import repl from './Repl'

const optionDefs = [
  {name: 'eval', alias: 'e', type: String},
  {name: 'repl', alias: 'r', type: Boolean},
  {name: 'trace', alias: 't', type: Boolean},
  {name: 'no-color', type: Boolean},
  {name: 'help', type: Boolean},
  {name: 'src', type: String, multiple: true, defaultOption: true}
]

const options = commandLineArgs(optionDefs)
const color = !options['no-color']
if (!color) chalk.level = 0

const files: string[] = options.src || []

const interp = new Interpreter({
  trace: options.trace
    ? stack => console.log(chalk.gray(stackToString(stack, false)))
    : undefined
})

/** Prints an error raised while reading or evaluating a form. */
function report(ex: unknown) {
  if (ex instanceof CairnError) {
    console.error(chalk.redBright(`${ex.err}: ${ex.why}`))
  } else if (ex instanceof Parser.ParseError) {
    console.error(chalk.redBright(`ParseError: ${ex.message}`))
  } else {
    console.error(ex)
  }
}

/**
 * Evaluates one top-level form. Returns its value, or `undefined` if it
 * failed (after reporting the error).
 */
function evalForm(expr: Expression): Value | undefined {
  try {
    const result = interp.evaluate(expr)
    if (options.trace) {
      console.log(chalk.gray('⇒ ') + prettyPrint(result, color))
    }
    return result
  } catch (ex) {
    report(ex)
    return undefined
  }
}

/**
 * Reads and evaluates every form in `src`, continuing past forms that fail.
 * Returns the values of the forms, with `undefined` for each failure, or
 * `undefined` if the source could not be read at all.
 */
function evalSource(src: string, filename: string): (Value | undefined)[] | undefined {
  let exprs: Expression[]
  try {
    const parser = new Parser(filename)
    parser.read(src)
    exprs = parser.getManyResults()
  } catch (ex) {
    report(ex)
    return undefined
  }
  return exprs.map(evalForm)
}

function succeeded(results: (Value | undefined)[] | undefined): boolean {
  return results !== undefined && _.every(results, r => r !== undefined)
}

function startRepl() {
  console.log(chalk.greenBright('Cairn') + ' ' + chalk.yellow('version ' + version))
  console.log(chalk.gray('Use CTRL-D to quit'))
  console.log()
  repl({
    prompt: counter => chalk.green('cairn') + ' ' + chalk.cyan('№' + counter) + '>'
  }, (input, counter) => {
    const result = evalForm(input)
    if (result !== undefined && !(result instanceof Unspecified)) {
      console.log(chalk.green(`№${counter} ⇒`) + ' ' + prettyPrint(result, color))
    }
  })
}

function usage() {
  console.log(commandLineUsage([{
    header: `Cairn ${version}`,
    content: `
      A Scheme interpreter that evaluates on an explicit, inspectable stack,
      with proper tail calls and re-entrant first-class continuations.
    `.trim().replace(/\s+/gm, ' ')
  }, {
    header: 'Examples',
    content: `
{bold     cairn}

Starts a REPL

{bold     cairn foo.scm bar.scm}

Evaluates foo.scm, then bar.scm

{bold     cairn -t -e "(+ 1 (call/cc (lambda (k) (k 2))))"}

Evaluates an expression, printing the stack before every step
    `.trim()
  }, {
    header: 'Options',
    optionList: [{
      name: 'help',
      description: 'Display this usage guide'
    }, {
      name: 'src',
      typeLabel: '{underline file} ...',
      description: 'Source files to evaluate, in order'
    }, {
      name: 'eval',
      alias: 'e',
      typeLabel: '{underline expr}',
      description: 'Evaluate the given forms and print the last result'
    }, {
      name: 'repl',
      alias: 'r',
      description: 'Start a REPL even if source files are given'
    }, {
      name: 'trace',
      alias: 't',
      description: 'Print the stack before every step, and every result'
    }, {
      name: 'no-color',
      description: 'Disable colored output'
    }]
  }]))
}

if (options.help) usage()
else {
  mapSeries<string, string>(files, (file, cb) => readFile(file, 'utf8', cb), (err, sources) => {
    if (err) {
      console.error(chalk.redBright(err.message))
      process.exitCode = 1
      return
    }
    let ok = true
    _.zip(files, sources || []).forEach(([file, src]) => {
      if (file !== undefined && src !== undefined) {
        ok = succeeded(evalSource(src, file)) && ok
      }
    })
    if (options.eval !== undefined) {
      const results = evalSource(options.eval, '<eval>')
      ok = succeeded(results) && ok
      const last = results && _.last(results)
      if (last !== undefined && !(last instanceof Unspecified)) {
        console.log(prettyPrint(last, color))
      }
    }
    if (!ok) process.exitCode = 1
    if (options.repl || (files.length === 0 && options.eval === undefined)) {
      startRepl()
    }
  })
}
