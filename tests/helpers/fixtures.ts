/**
 * Shared test data and utilities.
 */

import { CATALOG_SIZE, WordCatalog, loadCatalog } from '../../src/catalog/index.ts'
import type { SessionEvent, SessionStateMachine } from '../../src/session/machine.ts'

/** The bundled wordlist. Throws if it fails to load. */
export function standardCatalog(): WordCatalog {
  const result = loadCatalog()
  if (!result.ok) throw result.error
  return result.value
}

/**
 * A full-size catalog made of `extra` plus generated filler words
 * (`qaaa`, `qaab`, ...) so prefix edge cases can be set up freely.
 */
export function syntheticWords(extra: readonly string[]): string[] {
  const letter = (n: number): string => String.fromCharCode(97 + n)
  const filler: string[] = []
  for (let i = 0; filler.length < CATALOG_SIZE - extra.length; i++) {
    filler.push('q' + letter(Math.floor(i / 676)) + letter(Math.floor(i / 26) % 26) + letter(i % 26))
  }
  return [...extra, ...filler].sort()
}

export function syntheticCatalog(extra: readonly string[]): WordCatalog {
  const result = WordCatalog.fromWords(syntheticWords(extra))
  if (!result.ok) throw result.error
  return result.value
}

/** Feeds each character of `text` to the session as a key press. */
export function typeText(session: SessionStateMachine, text: string): void {
  for (const char of text) session.handle({ type: 'char', char })
}

export function press(session: SessionStateMachine, ...events: SessionEvent[]): void {
  for (const event of events) session.handle(event)
}
