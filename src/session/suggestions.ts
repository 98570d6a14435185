/**
 * Live suggestion list with a wrap-around cursor (the carousel).
 *
 * Only input changes recompute the list; cursor movement never does.
 */

import type { WordCatalog } from '../catalog/index.ts'
import { normalizeQuery } from '../lookup/resolver.ts'

export type CursorDirection = 'left' | 'right'

export class SuggestionEngine {
  private readonly catalog: WordCatalog
  private suggestions: readonly string[]
  private index = 0

  constructor(catalog: WordCatalog) {
    this.catalog = catalog
    this.suggestions = catalog.words
  }

  get items(): readonly string[] {
    return this.suggestions
  }

  /** 0 when the list is empty, otherwise a valid position. */
  get cursor(): number {
    return this.index
  }

  setInput(text: string): void {
    const normalized = normalizeQuery(text)
    this.suggestions = normalized === ''
      ? this.catalog.words
      : this.catalog.entriesWithPrefix(normalized)

    if (this.suggestions.length === 0 || this.index >= this.suggestions.length) {
      this.index = 0
    }
  }

  moveCursor(direction: CursorDirection): void {
    const len = this.suggestions.length
    if (len === 0) return

    if (direction === 'left') {
      this.index = this.index > 0 ? this.index - 1 : len - 1
    } else {
      this.index = this.index < len - 1 ? this.index + 1 : 0
    }
  }

  current(): string | undefined {
    return this.suggestions[this.index]
  }
}
