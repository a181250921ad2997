import { divide, modulo } from '../eval/ops'
import type { BuiltinTable } from './types'

export const arithmeticBuiltins = {
  // ( a b -- a%b )
  Mod: {
    arity: 2,
    apply: ({ stack, span }) => {
      const b = stack.peek(0, span)
      const a = stack.peek(1, span)
      const result = modulo(a, b, span)
      stack.pop(span)
      stack.pop(span)
      return result
    },
  },
  // ( a b -- a%b a/b )
  SlashMod: {
    arity: 2,
    apply: ({ stack, span }) => {
      const b = stack.peek(0, span)
      const a = stack.peek(1, span)
      const remainder = modulo(a, b, span)
      const quotient = divide(a, b, span)
      stack.pop(span)
      stack.pop(span)
      stack.push(remainder, span)
      return quotient
    },
  },
} satisfies BuiltinTable
