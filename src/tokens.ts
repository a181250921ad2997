import type { Span } from './span'

/**
 * A whitespace-separated, lower-cased fragment of an input line.
 */
export interface Lexeme {
  readonly text: string
  readonly span: Span
}

export type OperatorKind = 'Add' | 'Subtract' | 'Multiply' | 'Divide'

export type BuiltinKind =
  | 'Drop'
  | 'Dup'
  | 'Swap'
  | 'Over'
  | 'Rot'
  | 'TwoDrop'
  | 'TwoDup'
  | 'TwoOver'
  | 'TwoSwap'
  | 'Emit'
  | 'CR'
  | 'Space'
  | 'Spaces'
  | 'Display'
  | 'Show'
  | 'Bye'
  | 'Mod'
  | 'SlashMod'

export interface NumberToken {
  kind: 'Number'
  value: number
  span: Span
}

export interface OperatorToken {
  kind: 'Operator'
  op: OperatorKind
  span: Span
}

export interface BuiltinToken {
  kind: 'Builtin'
  builtin: BuiltinKind
  span: Span
}

/**
 * A top-level reference looked up in the dictionary when it executes.
 */
export interface WordToken {
  kind: 'Word'
  name: string
  span: Span
}

/**
 * A snapshot of a dictionary definition, embedded in another body.
 * Its body never contains a {@link WordToken}.
 */
export interface DefinitionToken {
  kind: 'Definition'
  name: string
  body: readonly ResolvedToken[]
  span: Span
}

/** Tokens allowed inside a stored definition body. */
export type ResolvedToken = NumberToken | OperatorToken | BuiltinToken | DefinitionToken

/** Tokens the compiler hands to the evaluator. */
export type Token = ResolvedToken | WordToken

/**
 * The raw capture between `:` and `;`, consumed once by the compiler when `;` is seen.
 */
export interface DefinitionBlock {
  name: Lexeme
  body: Lexeme[]
  open: Span
}

export const DEFINITION_OPEN = ':'
export const DEFINITION_CLOSE = ';'

export const operatorKinds: Record<string, OperatorKind | undefined> = {
  '+': 'Add',
  '-': 'Subtract',
  '*': 'Multiply',
  '/': 'Divide',
}

export const builtinKinds: Record<string, BuiltinKind | undefined> = {
  drop: 'Drop',
  dup: 'Dup',
  swap: 'Swap',
  over: 'Over',
  rot: 'Rot',
  '2drop': 'TwoDrop',
  '2dup': 'TwoDup',
  '2over': 'TwoOver',
  '2swap': 'TwoSwap',
  emit: 'Emit',
  cr: 'CR',
  space: 'Space',
  spaces: 'Spaces',
  '.': 'Display',
  '.s': 'Show',
  bye: 'Bye',
  quit: 'Bye',
  mod: 'Mod',
  '/mod': 'SlashMod',
}

/**
 * Resolves a lexeme to an operator or builtin token, ignoring the dictionary.
 *
 * @returns The token, or `undefined` if the text names neither.
 */
export const primitiveToken = (
  text: string,
  span: Span
): OperatorToken | BuiltinToken | undefined => {
  const op = Object.hasOwn(operatorKinds, text) ? operatorKinds[text] : undefined
  if (op) return { kind: 'Operator', op, span }
  const builtin = Object.hasOwn(builtinKinds, text) ? builtinKinds[text] : undefined
  if (builtin) return { kind: 'Builtin', builtin, span }
  return undefined
}
