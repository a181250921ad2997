import type { BuiltinKind } from '../tokens'
import { arithmeticBuiltins } from './arithmetic'
import { controlBuiltins } from './control'
import { outputBuiltins } from './output'
import { stackBuiltins } from './stack'
import type { BuiltinSpec } from './types'

export const builtins: Record<BuiltinKind, BuiltinSpec> = {
  ...stackBuiltins,
  ...arithmeticBuiltins,
  ...outputBuiltins,
  ...controlBuiltins,
}
