/**
 * Accepted-word history.
 *
 * Entries live in a fixed-capacity slot array; the review cursor is an
 * optional index into it. `null` means the live-input view is showing.
 *
 * Normal mode keeps up to 20 words and drops further accepts silently.
 * Paper mode keeps only the latest word.
 */

export const HISTORY_CAPACITY = 20
export const PAPER_CAPACITY = 1

export interface HistoryEntry {
  readonly word: string
  /** Session-wide insertion sequence, starting at 0 */
  readonly order: number
}

export class HistoryStore {
  readonly paperMode: boolean
  readonly capacity: number
  private readonly slots: Array<HistoryEntry | undefined>
  private length = 0
  private cursor: number | null = null
  private sequence = 0

  constructor(paperMode = false) {
    this.paperMode = paperMode
    this.capacity = paperMode ? PAPER_CAPACITY : HISTORY_CAPACITY
    this.slots = new Array<HistoryEntry | undefined>(this.capacity).fill(undefined)
  }

  get size(): number {
    return this.length
  }

  get reviewCursor(): number | null {
    return this.cursor
  }

  get isFull(): boolean {
    return this.length >= this.capacity
  }

  /** Returns false when the word was dropped because the store is full. */
  accept(word: string): boolean {
    const entry: HistoryEntry = { word, order: this.sequence }

    if (this.paperMode) {
      this.slots.fill(undefined)
      this.slots[0] = entry
      this.length = 1
      this.cursor = 0
    } else if (this.length < this.capacity) {
      this.slots[this.length] = entry
      this.length++
      this.cursor = this.length - 1
    } else {
      return false
    }

    this.sequence++
    return true
  }

  reviewUp(): void {
    if (this.length === 0) return
    if (this.cursor === null) {
      this.cursor = this.length - 1
    } else if (this.cursor > 0) {
      this.cursor--
    }
  }

  reviewDown(): void {
    if (this.length === 0) return
    if (this.cursor === null) {
      this.cursor = 0
    } else if (this.cursor < this.length - 1) {
      this.cursor++
    } else {
      this.cursor = null
    }
  }

  clearReview(): void {
    this.cursor = null
  }

  /** The word under the review cursor, if reviewing. */
  current(): string | undefined {
    if (this.cursor === null) return undefined
    return this.slots[this.cursor]?.word
  }

  entries(): readonly HistoryEntry[] {
    const out: HistoryEntry[] = []
    for (let i = 0; i < this.length; i++) {
      const entry = this.slots[i]
      if (entry !== undefined) out.push(entry)
    }
    return out
  }
}
