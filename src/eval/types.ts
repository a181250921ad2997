import type { Dictionary } from '../dictionary'
import type { LimitTracker } from '../limits'
import type { Stack } from '../stack'

/**
 * Receives the characters written by `emit`, `cr`, `space`, `spaces`, `.` and `.s`.
 */
export interface OutputSink {
  write(text: string): void
}

/**
 * The state one `eval` call runs against.
 * `stack` and `dictionary` belong to the session; `tracker` is fresh per call.
 */
export interface Machine {
  stack: Stack
  dictionary: Dictionary
  output: OutputSink
  tracker: LimitTracker
}
