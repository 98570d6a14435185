/**
 * Interactive session controller.
 *
 * Owns the input buffer and the startup/running state, and composes the
 * suggestion carousel and the history store. One event is applied per call
 * to `handle()`; `snapshot()` is the read-only projection the renderer draws.
 *
 * No event can fail: input that cannot be used yet leaves the state as is.
 */

import { BITS_PER_WORD } from '../catalog/index.ts'
import type { WordCatalog } from '../catalog/index.ts'
import { decode, toBits } from '../codec.ts'
import { logger } from '../logger.ts'
import { HistoryStore } from './history.ts'
import type { HistoryEntry } from './history.ts'
import { SuggestionEngine } from './suggestions.ts'
import type { CursorDirection } from './suggestions.ts'

export type InputMode = 'word' | 'binary'

export type SessionState =
  | { readonly phase: 'startup'; readonly modalSelection: InputMode }
  | { readonly phase: 'running'; readonly mode: InputMode }

export type SessionEvent =
  | { readonly type: 'char'; readonly char: string }
  | { readonly type: 'backspace' }
  | { readonly type: 'cursor'; readonly direction: CursorDirection }
  | { readonly type: 'review'; readonly direction: 'up' | 'down' }
  | { readonly type: 'confirm' }
  | { readonly type: 'terminate' }

export type Transition = 'continue' | 'terminate'

export interface SessionOptions {
  readonly paperMode?: boolean
  /** Skip mode selection and start running in this mode. */
  readonly mode?: InputMode
}

/** What the detail panel shows: a reviewed word, live bits, or the current suggestion. */
export interface FocusDetail {
  readonly source: 'history' | 'suggestion' | 'bits'
  readonly bits: string
  readonly word: string | null
  readonly index: number | null
}

export interface SessionSnapshot {
  readonly state: SessionState
  readonly input: string
  readonly paperMode: boolean
  readonly suggestions: {
    readonly items: readonly string[]
    readonly cursor: number
  }
  readonly history: {
    readonly entries: readonly HistoryEntry[]
    readonly reviewCursor: number | null
    readonly capacity: number
  }
  readonly focus: FocusDetail | null
  /** Binary mode only: the word a complete, valid bit string decodes to. */
  readonly liveWord: string | null
}

const BINARY_CHARS: ReadonlySet<string> = new Set(['0', '1'])

export class SessionStateMachine {
  private readonly catalog: WordCatalog
  private readonly suggestions: SuggestionEngine
  private readonly history: HistoryStore
  private state: SessionState
  private input = ''

  constructor(catalog: WordCatalog, options: SessionOptions = {}) {
    this.catalog = catalog
    this.suggestions = new SuggestionEngine(catalog)
    this.history = new HistoryStore(options.paperMode ?? false)
    this.state = options.mode !== undefined
      ? { phase: 'running', mode: options.mode }
      : { phase: 'startup', modalSelection: 'word' }
  }

  handle(event: SessionEvent): Transition {
    if (event.type === 'terminate') {
      logger.debug('Session terminated', { phase: this.state.phase })
      return 'terminate'
    }

    if (this.state.phase === 'startup') {
      this.handleStartup(event, this.state.modalSelection)
    } else if (this.state.mode === 'word') {
      this.handleWord(event)
    } else {
      this.handleBinary(event)
    }
    return 'continue'
  }

  // ── Startup ──────────────────────────────────────────────────────────────

  private handleStartup(event: SessionEvent, selection: InputMode): void {
    switch (event.type) {
      case 'cursor':
        this.state = { phase: 'startup', modalSelection: selection === 'word' ? 'binary' : 'word' }
        return
      case 'confirm':
        this.state = { phase: 'running', mode: selection }
        logger.debug('Session running', { mode: selection })
        return
      default:
        return
    }
  }

  // ── Word mode ────────────────────────────────────────────────────────────

  private handleWord(event: SessionEvent): void {
    switch (event.type) {
      case 'char':
        this.history.clearReview()
        this.input += event.char
        this.suggestions.setInput(this.input)
        return
      case 'backspace':
        this.history.clearReview()
        this.input = this.input.slice(0, -1)
        this.suggestions.setInput(this.input)
        return
      case 'cursor':
        this.history.clearReview()
        this.suggestions.moveCursor(event.direction)
        return
      case 'review':
        this.review(event.direction)
        return
      case 'confirm': {
        const word = this.suggestions.current()
        if (word === undefined) return
        this.accept(word)
        this.suggestions.setInput(this.input)
        return
      }
      default:
        return
    }
  }

  // ── Binary mode ──────────────────────────────────────────────────────────

  private handleBinary(event: SessionEvent): void {
    switch (event.type) {
      case 'char':
        if (!BINARY_CHARS.has(event.char) || this.input.length >= BITS_PER_WORD) return
        this.history.clearReview()
        this.input += event.char
        return
      case 'backspace':
        this.history.clearReview()
        this.input = this.input.slice(0, -1)
        return
      case 'review':
        this.review(event.direction)
        return
      case 'confirm': {
        if (this.input.length !== BITS_PER_WORD) return
        const decoded = decode(this.catalog, this.input)
        if (!decoded.ok) return
        this.accept(decoded.value)
        return
      }
      default:
        return
    }
  }

  // ── Shared ───────────────────────────────────────────────────────────────

  private review(direction: 'up' | 'down'): void {
    if (direction === 'up') this.history.reviewUp()
    else this.history.reviewDown()
  }

  private accept(word: string): void {
    const stored = this.history.accept(word)
    if (!stored) {
      logger.debug('History full, word dropped', { capacity: this.history.capacity })
    }
    this.input = ''
  }

  // ── Snapshot ─────────────────────────────────────────────────────────────

  snapshot(): SessionSnapshot {
    return {
      state: this.state,
      input: this.input,
      paperMode: this.history.paperMode,
      suggestions: {
        items: this.suggestions.items,
        cursor: this.suggestions.cursor,
      },
      history: {
        entries: this.history.entries(),
        reviewCursor: this.history.reviewCursor,
        capacity: this.history.capacity,
      },
      focus: this.focus(),
      liveWord: this.liveWord(),
    }
  }

  private liveWord(): string | null {
    if (this.state.phase !== 'running' || this.state.mode !== 'binary') return null
    if (this.input.length !== BITS_PER_WORD) return null
    const decoded = decode(this.catalog, this.input)
    return decoded.ok ? decoded.value : null
  }

  private focus(): FocusDetail | null {
    const reviewed = this.history.current()
    if (reviewed !== undefined) {
      return this.detailFor('history', reviewed)
    }
    if (this.state.phase !== 'running') return null

    if (this.state.mode === 'binary') {
      if (this.input === '') return null
      const word = this.liveWord()
      if (word !== null) return this.detailFor('bits', word)
      return { source: 'bits', bits: this.input, word: null, index: null }
    }

    const suggestion = this.suggestions.current()
    return suggestion === undefined ? null : this.detailFor('suggestion', suggestion)
  }

  private detailFor(source: FocusDetail['source'], word: string): FocusDetail {
    const index = this.catalog.lookupExact(word)
    if (index === undefined) {
      return { source, bits: '', word, index: null }
    }
    return { source, bits: toBits(index), word, index }
  }
}
