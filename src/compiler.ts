import type { Dictionary, DictionaryEntry } from './dictionary'
import { InvalidWordError, UnknownWordError, UnterminatedError } from './errors'
import { parseNumber } from './lexer'
import {
  DEFINITION_CLOSE,
  DEFINITION_OPEN,
  primitiveToken,
  type DefinitionBlock,
  type Lexeme,
  type ResolvedToken,
  type Token,
} from './tokens'

/**
 * Compiles lexemes into the top-level tokens to execute.
 *
 * Each `: name ... ;` block is resolved against the dictionary as it closes
 * and installed under `name`; it contributes no top-level tokens. Other
 * lexemes compile to numbers, operators or builtins, and anything else to a
 * {@link WordToken} looked up when it runs.
 *
 * @param lexemes - The lexemes of one input line.
 * @param dictionary - The session dictionary, updated for every closed block.
 * @returns The top-level tokens in input order.
 * @throws {InvalidWordError} If a block is named with a number, has no name or is nested.
 * @throws {UnknownWordError} If a block body refers to an undefined word.
 * @throws {UnterminatedError} If the input ends inside a block.
 */
export const compile = (lexemes: readonly Lexeme[], dictionary: Dictionary): Token[] => {
  const tokens: Token[] = []
  let pos = 0

  const next = (): Lexeme | undefined => {
    while (pos < lexemes.length) {
      const lexeme = lexemes[pos++]
      if (lexeme && lexeme.text !== '') return lexeme
    }
    return undefined
  }

  for (let lexeme = next(); lexeme; lexeme = next()) {
    if (lexeme.text === DEFINITION_OPEN) {
      install(readBlock(lexeme), dictionary)
      continue
    }
    tokens.push(compileLexeme(lexeme))
  }
  return tokens

  function readBlock(open: Lexeme): DefinitionBlock {
    const name = next()
    if (!name) throw new UnterminatedError(open.span)
    if (name.text === DEFINITION_CLOSE) {
      throw new InvalidWordError('missing definition name', name.span)
    }
    if (name.text === DEFINITION_OPEN) {
      throw new InvalidWordError('nested definitions are not supported', name.span)
    }
    if (parseNumber(name.text) !== undefined) {
      throw new InvalidWordError(`cannot redefine number ${name.text}`, name.span)
    }

    const body: Lexeme[] = []
    for (let lexeme = next(); lexeme; lexeme = next()) {
      if (lexeme.text === DEFINITION_CLOSE) {
        return { name, body, open: open.span }
      }
      if (lexeme.text === DEFINITION_OPEN) {
        throw new InvalidWordError('nested definitions are not supported', lexeme.span)
      }
      body.push(lexeme)
    }
    throw new UnterminatedError(open.span)
  }
}

const compileLexeme = (lexeme: Lexeme): Token => {
  const value = parseNumber(lexeme.text)
  if (value !== undefined) return { kind: 'Number', value, span: lexeme.span }
  return primitiveToken(lexeme.text, lexeme.span) ?? { kind: 'Word', name: lexeme.text, span: lexeme.span }
}

/**
 * Resolves a block body against the dictionary as it is now and stores the result.
 * A body that is a single number is stored as a number entry.
 */
const install = (block: DefinitionBlock, dictionary: Dictionary): void => {
  const body = block.body.map((lexeme) => resolve(lexeme, dictionary))
  const [only] = body
  const entry: DictionaryEntry =
    body.length === 1 && only?.kind === 'Number'
      ? { kind: 'Number', value: only.value }
      : { kind: 'Definition', body }
  dictionary.define(block.name.text, entry)
}

/**
 * Resolves one body lexeme. Dictionary entries shadow builtins and operators.
 */
export const resolve = (lexeme: Lexeme, dictionary: Dictionary): ResolvedToken => {
  const { text, span } = lexeme
  const value = parseNumber(text)
  if (value !== undefined) return { kind: 'Number', value, span }

  const entry = dictionary.lookup(text)
  if (entry) {
    return entry.kind === 'Number'
      ? { kind: 'Number', value: entry.value, span }
      : { kind: 'Definition', name: text, body: entry.body, span }
  }

  const primitive = primitiveToken(text, span)
  if (primitive) return primitive
  throw new UnknownWordError(text, span)
}
