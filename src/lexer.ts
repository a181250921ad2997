import { makeSpan } from './span'
import type { Lexeme } from './tokens'

const isWhitespace = (ch: string | undefined) =>
  ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v'

/**
 * Splits an input line into lower-cased lexemes.
 *
 * Every whitespace character is a separator, so a run of whitespace yields
 * empty lexemes between its characters. An empty line yields no lexemes.
 *
 * @param text - The input line.
 * @param offset - Added to every span, for lines the caller has trimmed.
 * @returns The lexemes in input order.
 */
export const lex = (text: string, offset = 0): Lexeme[] => {
  const lexemes: Lexeme[] = []
  if (text.length === 0) return lexemes

  let start = 0
  for (let pos = 0; pos <= text.length; pos += 1) {
    if (pos === text.length || isWhitespace(text[pos])) {
      lexemes.push({
        text: text.slice(start, pos).toLowerCase(),
        span: makeSpan(start + offset, pos + offset),
      })
      start = pos + 1
    }
  }
  return lexemes
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/
const SPECIAL = /^[+-]?(inf|infinity|nan)$/

/**
 * Parses a lower-cased lexeme as a 64-bit float literal.
 * Accepts decimal notation with optional sign, fraction and exponent, plus `inf`, `infinity` and `nan`.
 *
 * @returns The number, or `undefined` if the text is not a literal.
 */
export const parseNumber = (text: string): number | undefined => {
  if (DECIMAL.test(text)) return Number(text)
  const special = SPECIAL.exec(text)
  if (!special) return undefined
  if (special[1] === 'nan') return Number.NaN
  return text.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
}
