/**
 * Console driver: reads lines, evaluates them in one session and reports
 * each outcome the way a Forth console does.
 *
 *   > 5 6 +
 *   11 Ok
 *   > 1 foo
 *   ? Error: Unknown word: foo
 *   1 foo
 *     ^^^
 */

import * as readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import { formatNumber } from './builtins'
import { isStackError, type StackError } from './errors'
import { UserQuit } from './eval/quit'
import { Session, type SessionOptions } from './session'
import { pointAt } from './span'

export interface ReplOptions {
  input: Readable
  output: Writable
  /** Use readline's terminal handling (line editing, history). */
  terminal?: boolean
  prompt?: string
  /** Session configuration; the output sink is always the REPL's output stream. */
  session?: Omit<SessionOptions, 'output'>
}

export const formatResult = (value: number | undefined): string =>
  value === undefined ? ' Ok' : `${formatNumber(value)} Ok`

export const formatError = (error: StackError, line: string): string => {
  const message = `? Error: ${error.message}`
  return error.span ? `${message}\n${pointAt(line, error.span)}` : message
}

/**
 * Evaluates one line and writes its outcome.
 *
 * @returns `false` once the line asked to quit.
 */
export const evaluateLine = (session: Session, line: string, write: (text: string) => void): boolean => {
  try {
    const value = session.eval(line)
    write(`${formatResult(value)}\n`)
    return true
  } catch (error) {
    if (error instanceof UserQuit) return false
    if (isStackError(error)) {
      write(`${formatError(error, line)}\n`)
      return true
    }
    throw error
  }
}

/**
 * Runs the read-eval-print loop until the input ends or `bye`/`quit` is evaluated.
 */
export const startRepl = async (options: ReplOptions): Promise<void> => {
  const { input, output } = options
  const terminal = options.terminal ?? false
  const prompt = options.prompt ?? '> '
  const write = (text: string) => {
    output.write(text)
  }
  const session = new Session({ ...options.session, output: { write } })

  const rl = readline.createInterface({
    input,
    output: terminal ? output : undefined,
    terminal,
    crlfDelay: Number.POSITIVE_INFINITY,
  })

  write(prompt)
  try {
    for await (const line of rl) {
      if (!evaluateLine(session, line, write)) return
      write(prompt)
    }
    write('\n')
  } finally {
    rl.close()
  }
}
