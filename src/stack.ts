import { LimitError, StackUnderflowError } from './errors'
import type { Span } from './span'

/**
 * The session's LIFO stack of 64-bit floats.
 *
 * Operations needing several operands call {@link Stack.require} before
 * popping anything, so a failing operation leaves the stack as it found it.
 */
export class Stack {
  private readonly items: number[] = []

  constructor(private readonly maxSize: number = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.items.length
  }

  push(value: number, span?: Span): void {
    this.pushAll([value], span)
  }

  /** Pushes every value or, when the size limit would be passed, none. */
  pushAll(values: readonly number[], span?: Span): void {
    if (this.items.length + values.length > this.maxSize) {
      throw new LimitError('Stack limit exceeded', span)
    }
    this.items.push(...values)
  }

  pop(span?: Span): number {
    const value = this.items.pop()
    if (value === undefined) {
      throw new StackUnderflowError(1, 0, span)
    }
    return value
  }

  /**
   * Reads the value `depth` places below the top (0 is the top) without removing it.
   */
  peek(depth: number, span?: Span): number {
    const value = this.items[this.items.length - 1 - depth]
    if (value === undefined) {
      throw new StackUnderflowError(depth + 1, this.items.length, span)
    }
    return value
  }

  /**
   * Asserts that at least `count` values are present.
   * @throws {StackUnderflowError} If fewer are present.
   */
  require(count: number, span?: Span): void {
    if (this.items.length < count) {
      throw new StackUnderflowError(count, this.items.length, span)
    }
  }

  /** A copy of the contents, bottom to top. */
  values(): number[] {
    return [...this.items]
  }
}
