import { InvalidOperandError, LimitError } from '../errors'
import type { BuiltinTable } from './types'
import { formatNumber } from './utils'

const MAX_CHAR_CODE = 127
export const MAX_SPACES = 65_536

export const outputBuiltins = {
  // Codes are checked before the operand is popped.
  Emit: {
    arity: 1,
    apply: ({ stack, output, span }) => {
      const code = Math.trunc(stack.peek(0, span))
      if (!(code >= 0 && code <= MAX_CHAR_CODE)) {
        throw new InvalidOperandError(`emit expects a character code 0-${MAX_CHAR_CODE}`, span)
      }
      stack.pop(span)
      output.write(String.fromCharCode(code))
      return undefined
    },
  },
  CR: {
    arity: 0,
    apply: ({ output }) => {
      output.write('\n')
      return undefined
    },
  },
  Space: {
    arity: 0,
    apply: ({ output }) => {
      output.write(' ')
      return undefined
    },
  },
  Spaces: {
    arity: 1,
    apply: ({ stack, output, span }) => {
      const count = Math.trunc(stack.peek(0, span))
      if (Number.isNaN(count)) {
        throw new InvalidOperandError('spaces expects a count', span)
      }
      if (count > MAX_SPACES) {
        throw new LimitError(`Spaces count exceeds ${MAX_SPACES}`, span)
      }
      stack.pop(span)
      if (count > 0) output.write(' '.repeat(count))
      return undefined
    },
  },
  Display: {
    arity: 1,
    apply: ({ stack, output, span }) => {
      output.write(`${formatNumber(stack.pop(span))} `)
      return undefined
    },
  },
  // Non-destructive: <depth> followed by each value, bottom to top.
  Show: {
    arity: 0,
    apply: ({ stack, output }) => {
      const values = stack.values()
      output.write(`<${values.length}> ${values.map((v) => `${formatNumber(v)} `).join('')}`)
      return undefined
    },
  },
} satisfies BuiltinTable
