/**
 * Pure projection of a session snapshot into the text of each screen panel.
 * The terminal layer only positions and colours these strings.
 */

import { BITS_PER_WORD } from '../catalog/index.ts'
import type { InputMode, SessionSnapshot } from './machine.ts'

export const CAROUSEL_WINDOW = 7

const CELL_WIDTH = 5
const PLACE_VALUES: readonly number[] = Array.from(
  { length: BITS_PER_WORD },
  (_, i) => 1 << (BITS_PER_WORD - 1 - i),
)

export const HELP_TEXT = 'Esc: Exit | Enter: Select | ←→: Suggest | ↑↓: History'

export const DISCLAIMER: readonly string[] = [
  'Note: Stateless mode encodes data using the SLIP-39 format,',
  'but generated phrases are independent and cannot be combined for recovery.',
]

export interface ModalOption {
  readonly mode: InputMode
  readonly label: string
  readonly selected: boolean
}

export interface ModalView {
  readonly title: string
  readonly options: readonly ModalOption[]
  readonly help: string
}

export interface SessionView {
  readonly carouselTitle: string
  readonly carousel: string
  readonly grid: readonly string[]
  readonly detail: string
  readonly counter: string
  readonly prompt: string
  readonly help: string
  readonly footer: readonly string[]
  readonly modal: ModalView | null
}

function center(text: string, width: number): string {
  const pad = Math.max(0, width - text.length)
  const left = Math.floor(pad / 2)
  return ' '.repeat(left) + text + ' '.repeat(pad - left)
}

function border(left: string, joint: string, right: string): string {
  return left + Array.from({ length: BITS_PER_WORD }, () => '─'.repeat(CELL_WIDTH)).join(joint) + right
}

function row(cells: readonly string[]): string {
  return '│' + cells.map((c) => center(c, CELL_WIDTH)).join('│') + '│'
}

/** Indices [start, end) of the suggestions visible around the cursor. */
export function carouselWindow(length: number, cursor: number): { start: number; end: number } {
  let start = Math.max(0, cursor - Math.floor(CAROUSEL_WINDOW / 2))
  const end = Math.min(start + CAROUSEL_WINDOW, length)
  if (end === length) {
    start = Math.max(0, end - CAROUSEL_WINDOW)
  }
  return { start, end }
}

function currentMode(snapshot: SessionSnapshot): InputMode | null {
  return snapshot.state.phase === 'running' ? snapshot.state.mode : null
}

function renderCarousel(snapshot: SessionSnapshot): string {
  if (currentMode(snapshot) === 'binary') {
    if (snapshot.input.length !== BITS_PER_WORD) return 'Enter 10 bits...'
    return snapshot.liveWord !== null ? `[ ${snapshot.liveWord.toUpperCase()} ]` : 'Invalid Binary'
  }

  const { items, cursor } = snapshot.suggestions
  if (items.length === 0) return 'No matches'

  const { start, end } = carouselWindow(items.length, cursor)
  return items
    .slice(start, end)
    .map((word, i) => (start + i === cursor ? `[ ${word} ]` : word))
    .join('   ')
}

export function renderGrid(bits: string | null): string[] {
  const cells = Array.from({ length: BITS_PER_WORD }, (_, i) => bits?.[i] ?? '#')
  return [
    border('┌', '┬', '┐'),
    row(PLACE_VALUES.map(String)),
    border('├', '┼', '┤'),
    row(cells),
    border('└', '┴', '┘'),
  ]
}

function renderCounter(snapshot: SessionSnapshot): string {
  if (snapshot.paperMode) return '< Paper Mode >'
  const { entries, reviewCursor, capacity } = snapshot.history
  if (reviewCursor !== null) {
    return `Word #${reviewCursor + 1}/${entries.length} [${capacity}]`
  }
  return `Word #${entries.length + 1}/${capacity}`
}

function renderPrompt(snapshot: SessionSnapshot): string {
  const label = currentMode(snapshot) === 'binary' ? 'Bits' : 'Word'
  const prefix = snapshot.paperMode
    ? `${label}/> `
    : `${label} #${snapshot.history.entries.length + 1}/> `
  return `${prefix}${snapshot.input}_`
}

function renderModal(snapshot: SessionSnapshot): ModalView | null {
  if (snapshot.state.phase !== 'startup') return null
  const selection = snapshot.state.modalSelection
  return {
    title: 'Select Input Mode',
    options: [
      { mode: 'word', label: 'Word Input', selected: selection === 'word' },
      { mode: 'binary', label: 'Binary Input', selected: selection === 'binary' },
    ],
    help: 'Use ←/→ to select, Enter to confirm',
  }
}

export function renderView(snapshot: SessionSnapshot): SessionView {
  const focus = snapshot.focus
  const detail = focus !== null && focus.word !== null && focus.index !== null
    ? `Word: ${focus.word.toUpperCase()} | Index: ${focus.index}`
    : 'Select a word to view details'

  return {
    carouselTitle: currentMode(snapshot) === 'binary' ? 'Decoded Word' : 'Suggestions',
    carousel: renderCarousel(snapshot),
    grid: renderGrid(focus?.bits ?? null),
    detail,
    counter: renderCounter(snapshot),
    prompt: renderPrompt(snapshot),
    help: HELP_TEXT,
    footer: DISCLAIMER,
    modal: renderModal(snapshot),
  }
}
