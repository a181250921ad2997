import type { Span } from './span'

/**
 * Categories of errors that can abort an evaluation.
 * - `DivisionByZero`: `/`, `mod` or `/mod` with a zero divisor.
 * - `StackUnderflow`: an operation needed more operands than the stack holds.
 * - `UnknownWord`: a name that is neither defined nor a builtin.
 * - `InvalidWord`: a malformed definition or dictionary entry.
 * - `Unterminated`: a definition opened with `:` but never closed with `;`.
 * - `InvalidOperand`: an operand outside the range an operation accepts.
 * - `LimitExceeded`: a configured execution limit was hit.
 */
export type ErrorKind =
  | 'DivisionByZero'
  | 'StackUnderflow'
  | 'UnknownWord'
  | 'InvalidWord'
  | 'Unterminated'
  | 'InvalidOperand'
  | 'LimitExceeded'

/**
 * Common interface for all errors thrown by the evaluator.
 */
export interface StackError extends Error {
  /** The category of the error. */
  kind: ErrorKind
  /** The span of the lexeme the error refers to, when one is known. */
  span: Span | undefined
}

class BaseError extends Error implements StackError {
  kind: ErrorKind
  span: Span | undefined

  constructor(kind: ErrorKind, message: string, span?: Span) {
    super(message)
    this.kind = kind
    this.span = span
    this.name = `${kind}Error`
  }
}

export class DivisionByZeroError extends BaseError {
  constructor(span?: Span) {
    super('DivisionByZero', 'Division by zero', span)
  }
}

/**
 * Thrown when an operation needs more operands than the stack holds.
 * The stack is left untouched when this is raised.
 */
export class StackUnderflowError extends BaseError {
  constructor(
    public readonly needed: number,
    public readonly available: number,
    span?: Span
  ) {
    super('StackUnderflow', `Stack underflow: needed ${needed}, found ${available}`, span)
  }
}

export class UnknownWordError extends BaseError {
  constructor(
    public readonly word: string,
    span?: Span
  ) {
    super('UnknownWord', `Unknown word: ${word}`, span)
  }
}

/**
 * Thrown for malformed definitions, e.g. `: 1 2 ;`.
 */
export class InvalidWordError extends BaseError {
  constructor(message: string, span?: Span) {
    super('InvalidWord', `Invalid word: ${message}`, span)
  }
}

export class UnterminatedError extends BaseError {
  constructor(span?: Span) {
    super('Unterminated', 'Unterminated definition: missing ;', span)
  }
}

/**
 * Thrown when an operand is outside what an operation accepts, e.g. `-1 emit`.
 * The operand stays on the stack.
 */
export class InvalidOperandError extends BaseError {
  constructor(message: string, span?: Span) {
    super('InvalidOperand', `Invalid operand: ${message}`, span)
  }
}

/**
 * Thrown when execution exceeds a limit from {@link LimitsConfig}.
 */
export class LimitError extends BaseError {
  constructor(message: string, span?: Span) {
    super('LimitExceeded', message, span)
  }
}

export const isStackError = (error: unknown): error is StackError => error instanceof BaseError
