export { builtins } from './registry'
export * from './types'
export { formatNumber } from './utils'
export { stackBuiltins } from './stack'
export { arithmeticBuiltins } from './arithmetic'
export { outputBuiltins } from './output'
export { controlBuiltins } from './control'
