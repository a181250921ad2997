import type { Span } from '../span'
import type { Stack } from '../stack'
import type { BuiltinKind } from '../tokens'
import type { OutputSink } from '../eval/types'

export interface BuiltinContext {
  stack: Stack
  output: OutputSink
  span: Span
}

export interface BuiltinSpec {
  /** Operands the builtin pops; checked by the evaluator before `apply` runs. */
  arity: number
  /**
   * Runs the builtin. A returned number is pushed by the evaluator and
   * becomes the value of the token.
   */
  apply: (ctx: BuiltinContext) => number | undefined
}

export type BuiltinTable = Partial<Record<BuiltinKind, BuiltinSpec>>
