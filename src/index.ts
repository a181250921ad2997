import { Session, type SessionOptions } from './session'
import { lex, parseNumber } from './lexer'
import { compile } from './compiler'
import { runTokens, type Machine, type OutputSink } from './eval'
import { Dictionary, type DictionaryEntry } from './dictionary'
import { Stack } from './stack'
import { UserQuit } from './eval/quit'
import { LimitTracker, resolveLimits, type LimitsConfig, type ResolvedLimits } from './limits'
import {
  DivisionByZeroError,
  StackUnderflowError,
  UnknownWordError,
  InvalidWordError,
  UnterminatedError,
  InvalidOperandError,
  LimitError,
  isStackError,
  type ErrorKind,
  type StackError,
} from './errors'
import type { Span } from './span'
import type { Lexeme, Token, ResolvedToken, BuiltinKind, OperatorKind } from './tokens'

export { Session, lex, parseNumber, compile, runTokens, Dictionary, Stack, LimitTracker, resolveLimits }
export type { SessionOptions, Machine, OutputSink, DictionaryEntry, LimitsConfig, ResolvedLimits }
export type { Span, Lexeme, Token, ResolvedToken, BuiltinKind, OperatorKind, ErrorKind, StackError }
export { DivisionByZeroError, StackUnderflowError, UnknownWordError, InvalidWordError, UnterminatedError }
export { InvalidOperandError, LimitError, UserQuit, isStackError }

/**
 * Evaluates each line of `source` in a fresh session.
 *
 * @param source - One or more lines of input.
 * @param options - Session options including limits and the output sink.
 * @returns The final stack, bottom to top. Evaluation stops early at `bye` or `quit`.
 * @throws {StackError} If any line fails.
 */
export const run = (source: string, options: SessionOptions = {}): number[] => {
  const session = new Session(options)
  for (const line of source.split(/\r?\n/)) {
    try {
      session.eval(line)
    } catch (error) {
      if (error instanceof UserQuit) break
      throw error
    }
  }
  return session.stack
}
