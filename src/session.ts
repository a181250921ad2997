import { compile } from './compiler'
import { Dictionary } from './dictionary'
import { runTokens, type OutputSink } from './eval'
import { lex } from './lexer'
import { LimitTracker, resolveLimits, type LimitsConfig, type ResolvedLimits } from './limits'
import { Stack } from './stack'

/**
 * Options for a {@link Session}.
 */
export interface SessionOptions {
  /**
   * Limit configuration to stop runaway definitions and unbounded stacks.
   */
  limits?: LimitsConfig
  /**
   * Where printing builtins write. Defaults to standard output.
   */
  output?: OutputSink
}

const stdout: OutputSink = {
  write: (text) => {
    process.stdout.write(text)
  },
}

/**
 * One interpreter session: a stack and a dictionary that live across `eval` calls.
 */
export class Session {
  private readonly limits: ResolvedLimits
  private readonly output: OutputSink
  private readonly data: Stack
  readonly dictionary = new Dictionary()

  constructor(options: SessionOptions = {}) {
    this.limits = resolveLimits(options.limits)
    this.output = options.output ?? stdout
    this.data = new Stack(this.limits.maxStack)
  }

  /**
   * Evaluates one input line.
   *
   * Definitions in the line are installed while it compiles, before any of
   * its other tokens run. A failure leaves the effects of the tokens that
   * ran before it.
   *
   * @param line - The input line; surrounding whitespace is ignored.
   * @returns The value produced by the last token, or `undefined` if it produced none.
   * @throws {StackError} If compiling or running the line fails.
   * @throws {UserQuit} If the line runs `bye` or `quit`.
   */
  eval(line: string): number | undefined {
    const text = line.trim()
    if (text === '') return undefined
    const offset = line.length - line.trimStart().length
    const tokens = compile(lex(text, offset), this.dictionary)
    return runTokens(tokens, {
      stack: this.data,
      dictionary: this.dictionary,
      output: this.output,
      tracker: new LimitTracker(this.limits),
    })
  }

  /** The stack contents, bottom to top. */
  get stack(): number[] {
    return this.data.values()
  }

  /** Defined word names, oldest definition first. */
  words(): string[] {
    return this.dictionary.names()
  }
}
