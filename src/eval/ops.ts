import { DivisionByZeroError } from '../errors'
import type { Span } from '../span'
import type { OperatorKind } from '../tokens'

/**
 * Applies an arithmetic operator to `a` (deeper) and `b` (nearer the top).
 *
 * @throws {DivisionByZeroError} If `op` is `Divide` and `b` is zero.
 */
export const applyOperator = (op: OperatorKind, a: number, b: number, span: Span): number => {
  switch (op) {
    case 'Add':
      return a + b
    case 'Subtract':
      return a - b
    case 'Multiply':
      return a * b
    case 'Divide':
      return divide(a, b, span)
  }
}

export const divide = (a: number, b: number, span: Span): number => {
  if (b === 0) throw new DivisionByZeroError(span)
  return a / b
}

/**
 * Floating-point remainder; the result takes the sign of `a`.
 */
export const modulo = (a: number, b: number, span: Span): number => {
  if (b === 0) throw new DivisionByZeroError(span)
  return a % b
}
