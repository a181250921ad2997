import type { BuiltinTable } from './types'

// Stack effects are written bottom to top: ( before -- after ).
export const stackBuiltins = {
  // ( a -- )
  Drop: {
    arity: 1,
    apply: ({ stack, span }) => {
      stack.pop(span)
      return undefined
    },
  },
  // ( a -- a a )
  Dup: {
    arity: 1,
    apply: ({ stack, span }) => stack.peek(0, span),
  },
  // ( a b -- b a )
  Swap: {
    arity: 2,
    apply: ({ stack, span }) => {
      const b = stack.pop(span)
      const a = stack.pop(span)
      stack.push(b, span)
      return a
    },
  },
  // ( a b -- a b a )
  Over: {
    arity: 2,
    apply: ({ stack, span }) => stack.peek(1, span),
  },
  // ( a b c -- b c a )
  Rot: {
    arity: 3,
    apply: ({ stack, span }) => {
      const c = stack.pop(span)
      const b = stack.pop(span)
      const a = stack.pop(span)
      stack.pushAll([b, c], span)
      return a
    },
  },
  // ( a b -- )
  TwoDrop: {
    arity: 2,
    apply: ({ stack, span }) => {
      stack.pop(span)
      stack.pop(span)
      return undefined
    },
  },
  // ( a b -- a b a b )
  TwoDup: {
    arity: 2,
    apply: ({ stack, span }) => {
      const a = stack.peek(1, span)
      const b = stack.peek(0, span)
      stack.pushAll([a, b], span)
      return undefined
    },
  },
  // ( a b c d -- a b c d a b )
  TwoOver: {
    arity: 4,
    apply: ({ stack, span }) => {
      const a = stack.peek(3, span)
      const b = stack.peek(2, span)
      stack.pushAll([a, b], span)
      return undefined
    },
  },
  // ( a b c d -- c d a b )
  TwoSwap: {
    arity: 4,
    apply: ({ stack, span }) => {
      const d = stack.pop(span)
      const c = stack.pop(span)
      const b = stack.pop(span)
      const a = stack.pop(span)
      stack.pushAll([c, d, a, b], span)
      return undefined
    },
  },
} satisfies BuiltinTable
