/**
 * Terminal front end for the interactive session.
 *
 * Reads keys through terminal-kit, feeds them to the session state machine
 * one at a time and redraws the whole screen from a fresh snapshot after
 * each transition.
 */

import termKit from 'terminal-kit'
import type { WordCatalog } from './catalog/index.ts'
import { logger } from './logger.ts'
import { SessionStateMachine } from './session/machine.ts'
import type { SessionEvent, SessionOptions, SessionSnapshot } from './session/machine.ts'
import { renderView } from './session/view.ts'
import type { ModalView } from './session/view.ts'

type Terminal = typeof termKit.terminal

interface KeyData {
  readonly isCharacter?: boolean
}

/** Maps a terminal-kit key name to a session event; null for keys the session ignores. */
export function keyToEvent(name: string, isCharacter: boolean): SessionEvent | null {
  switch (name) {
    case 'ESCAPE':
    case 'CTRL_C':
      return { type: 'terminate' }
    case 'ENTER':
    case 'KP_ENTER':
      return { type: 'confirm' }
    case 'BACKSPACE':
      return { type: 'backspace' }
    case 'LEFT':
      return { type: 'cursor', direction: 'left' }
    case 'RIGHT':
      return { type: 'cursor', direction: 'right' }
    case 'UP':
      return { type: 'review', direction: 'up' }
    case 'DOWN':
      return { type: 'review', direction: 'down' }
    default:
      return isCharacter ? { type: 'char', char: name } : null
  }
}

function centerX(term: Terminal, text: string): number {
  return Math.max(1, Math.floor((term.width - text.length) / 2) + 1)
}

function drawModal(term: Terminal, modal: ModalView): void {
  const top = Math.max(1, Math.floor(term.height / 2) - 2)
  const buttons = modal.options.map((o) => `  ${o.label}  `)
  const line = buttons.join('    ')

  term.moveTo(centerX(term, modal.title), top)
  term.bold.cyan(modal.title)
  let x = centerX(term, line)
  for (const [i, option] of modal.options.entries()) {
    const label = buttons[i] ?? option.label
    term.moveTo(x, top + 2)
    if (option.selected) term.bgCyan.black.bold(label)
    else term.cyan(label)
    x += label.length + 4
  }
  term.moveTo(centerX(term, modal.help), top + 4)
  term.brightBlack(modal.help)
}

export function draw(term: Terminal, snapshot: SessionSnapshot): void {
  const view = renderView(snapshot)
  const accent = snapshot.paperMode ? term.red : term.cyan

  term.clear()

  term.moveTo(1, 1)
  term.bold.cyan(` ${view.carouselTitle} `)
  term.moveTo(centerX(term, view.carousel), 2)
  term.cyan(view.carousel)

  term.moveTo(1, 4)
  accent.bold(' Memory Grid ')
  term.moveTo(Math.max(1, term.width - view.counter.length), 4)
  accent(view.counter)
  for (const [i, line] of view.grid.entries()) {
    term.moveTo(centerX(term, line), 5 + i)
    accent(line)
  }
  term.moveTo(centerX(term, view.detail), 11)
  term.bold.white(view.detail)

  term.moveTo(1, 13)
  term.bold.cyan(' Search ')
  term.moveTo(2, 14)
  term.bold.cyan(view.prompt)
  term.moveTo(Math.max(1, term.width - view.help.length), 15)
  term.cyan(view.help)

  for (const [i, line] of view.footer.entries()) {
    term.moveTo(centerX(term, line), 17 + i)
    term.yellow(line)
  }

  if (view.modal !== null) drawModal(term, view.modal)
}

/**
 * Runs the session until the user terminates it. The terminal is restored
 * before the returned promise resolves.
 */
export function runInteractive(catalog: WordCatalog, options: SessionOptions = {}): Promise<void> {
  const term = termKit.terminal
  const session = new SessionStateMachine(catalog, options)

  return new Promise((resolve, reject) => {
    let finished = false

    const onKey = (name: string, _matches: string[], data: KeyData): void => {
      if (finished) return
      try {
        const event = keyToEvent(name, data.isCharacter === true)
        if (event === null) return
        if (session.handle(event) === 'terminate') {
          restore()
          resolve()
          return
        }
        draw(term, session.snapshot())
      } catch (error) {
        restore()
        reject(error)
      }
    }

    const restore = (): void => {
      finished = true
      term.off('key', onKey)
      term.grabInput(false)
      term.hideCursor(false)
      term.fullscreen(false)
    }

    logger.debug('Interactive session starting', {
      paperMode: options.paperMode ?? false,
      mode: options.mode ?? null,
    })

    term.fullscreen(true)
    term.hideCursor(true)
    term.grabInput(true)
    term.on('key', onKey)
    try {
      draw(term, session.snapshot())
    } catch (error) {
      restore()
      reject(error)
    }
  })
}
