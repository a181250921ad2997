/**
 * Represents a range of characters in an input line.
 */
export interface Span {
  start: number
  end: number
}

export const makeSpan = (start: number, end: number): Span => ({ start, end })

/**
 * Renders a caret line underneath the spanned characters of `line`.
 * Used by the console driver to point at the lexeme an error refers to.
 *
 * @param line - The input line the span was taken from.
 * @param span - The span to underline.
 * @returns The line followed by a newline and the caret marker.
 */
export const pointAt = (line: string, span: Span): string => {
  const start = Math.max(0, Math.min(span.start, line.length))
  const width = Math.max(1, Math.min(span.end, line.length) - start)
  return `${line}\n${' '.repeat(start)}${'^'.repeat(width)}`
}
