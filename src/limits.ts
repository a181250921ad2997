import { LimitError } from './errors'
import type { Span } from './span'

/**
 * Configuration options for execution limits.
 * All fields are optional and default to safe values if strictly undefined.
 */
export interface LimitsConfig {
  /** Maximum number of tokens executed by a single `eval` call, including definition bodies. Default: 1,000,000. */
  maxSteps?: number
  /** Maximum nesting depth of definition bodies during execution. Default: 1,000. */
  maxDepth?: number
  /** Maximum number of values the stack may hold. Default: 10,000. */
  maxStack?: number
}

/**
 * Fully resolved limits with defaults applied.
 */
export interface ResolvedLimits {
  maxSteps: number
  maxDepth: number
  maxStack: number
}

const DEFAULT_LIMITS: ResolvedLimits = {
  maxSteps: 1_000_000,
  maxDepth: 1_000,
  maxStack: 10_000,
}

/**
 * Resolves a partial limits configuration into a complete one with defaults.
 *
 * @param config - The user-provided configuration.
 * @returns The resolved limits.
 */
export const resolveLimits = (config: LimitsConfig = {}): ResolvedLimits => ({
  maxSteps: config.maxSteps ?? DEFAULT_LIMITS.maxSteps,
  maxDepth: config.maxDepth ?? DEFAULT_LIMITS.maxDepth,
  maxStack: config.maxStack ?? DEFAULT_LIMITS.maxStack,
})

/**
 * Tracks execution usage of one `eval` call against the step and depth limits.
 * Throws {@link LimitError} if either is exceeded.
 */
export class LimitTracker {
  private steps = 0
  private depth = 0

  constructor(private readonly limits: ResolvedLimits) {}

  /**
   * Records a single executed token.
   * @param span - The source span for error reporting.
   */
  step(span: Span): void {
    this.steps += 1
    if (this.steps > this.limits.maxSteps) {
      throw new LimitError('Step limit exceeded', span)
    }
  }

  /**
   * Enters a definition body, incrementing the depth counter.
   * @param span - The source span for error reporting.
   */
  enter(span: Span): void {
    this.depth += 1
    if (this.depth > this.limits.maxDepth) {
      throw new LimitError('Max depth exceeded', span)
    }
  }

  exit(): void {
    this.depth = Math.max(0, this.depth - 1)
  }
}
