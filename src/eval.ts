import { UnknownWordError } from './errors'
import type { Span } from './span'
import { primitiveToken, type ResolvedToken, type Token } from './tokens'
import { builtins } from './builtins'
import { applyOperator } from './eval/ops'
import type { Machine } from './eval/types'

export type { Machine, OutputSink } from './eval/types'

/**
 * Executes top-level tokens in order against the machine.
 *
 * Every value a token produces is pushed before the next token runs. An
 * error stops execution at the failing token; effects of earlier tokens
 * are kept.
 *
 * @param tokens - Compiled tokens of one input line.
 * @param machine - Session state plus the per-call limit tracker.
 * @returns The value produced by the last token, or `undefined` if it produced none.
 */
export const runTokens = (tokens: readonly Token[], machine: Machine): number | undefined => {
  let last: number | undefined
  for (const token of tokens) {
    last = execute(token, machine, token.span)
  }
  return last
}

/**
 * Executes one token. `site` is the span of the top-level token being run,
 * which errors inside definition bodies report.
 */
const execute = (token: Token, machine: Machine, site: Span): number | undefined => {
  machine.tracker.step(site)
  const value = produce(token, machine, site)
  if (value !== undefined) {
    machine.stack.push(value, site)
  }
  return value
}

const produce = (token: Token, machine: Machine, site: Span): number | undefined => {
  switch (token.kind) {
    case 'Number':
      return token.value
    case 'Operator': {
      const { stack } = machine
      stack.require(2, site)
      const result = applyOperator(token.op, stack.peek(1, site), stack.peek(0, site), site)
      stack.pop(site)
      stack.pop(site)
      return result
    }
    case 'Builtin': {
      const spec = builtins[token.builtin]
      machine.stack.require(spec.arity, site)
      return spec.apply({ stack: machine.stack, output: machine.output, span: site })
    }
    case 'Definition':
      runBody(token.body, machine, site)
      return undefined
    case 'Word':
      return callWord(token.name, machine, site)
  }
}

const callWord = (name: string, machine: Machine, site: Span): number | undefined => {
  const entry = machine.dictionary.lookup(name)
  if (entry?.kind === 'Number') return entry.value
  if (entry?.kind === 'Definition') {
    runBody(entry.body, machine, site)
    return undefined
  }
  const primitive = primitiveToken(name, site)
  if (primitive) return produce(primitive, machine, site)
  throw new UnknownWordError(name, site)
}

const runBody = (body: readonly ResolvedToken[], machine: Machine, site: Span): void => {
  machine.tracker.enter(site)
  try {
    for (const token of body) {
      execute(token, machine, site)
    }
  } finally {
    machine.tracker.exit()
  }
}
