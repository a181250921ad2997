import { UserQuit } from '../eval/quit'
import type { BuiltinTable } from './types'

export const controlBuiltins = {
  Bye: {
    arity: 0,
    apply: () => {
      throw new UserQuit()
    },
  },
} satisfies BuiltinTable
