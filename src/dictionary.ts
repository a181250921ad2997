import type { ResolvedToken } from './tokens'

/**
 * A value stored under a word name.
 * A `Definition` body is fully resolved: it never refers to another name.
 */
export type DictionaryEntry =
  | { kind: 'Number'; value: number }
  | { kind: 'Definition'; body: readonly ResolvedToken[] }

/**
 * Case-insensitive mapping from word names to their entries.
 * Entries are inserted or overwritten, never removed.
 */
export class Dictionary {
  private readonly entries = new Map<string, DictionaryEntry>()

  /**
   * Binds `name` to `entry`, replacing any earlier binding.
   * Bodies that captured the earlier binding keep it.
   */
  define(name: string, entry: DictionaryEntry): void {
    const key = name.toLowerCase()
    // Re-insert so `names()` reports the latest definition order.
    this.entries.delete(key)
    this.entries.set(key, entry)
  }

  lookup(name: string): DictionaryEntry | undefined {
    return this.entries.get(name.toLowerCase())
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase())
  }

  /** Defined names, oldest first. */
  names(): string[] {
    return Array.from(this.entries.keys())
  }

  get size(): number {
    return this.entries.size
  }
}
