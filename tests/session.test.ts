/**
 * Tests for the interactive session state machine.
 */

import { describe, it, expect } from 'vitest'
import { SessionStateMachine } from '../src/session/machine.ts'
import { press, standardCatalog, typeText } from './helpers/fixtures.ts'

const catalog = standardCatalog()

function running(mode: 'word' | 'binary', paperMode = false): SessionStateMachine {
  return new SessionStateMachine(catalog, { mode, paperMode })
}

describe('startup', () => {
  it('starts on the mode modal with word selected', () => {
    const session = new SessionStateMachine(catalog)
    expect(session.snapshot().state).toEqual({ phase: 'startup', modalSelection: 'word' })
    expect(session.snapshot().focus).toBeNull()
  })

  it('left and right toggle the selection', () => {
    const session = new SessionStateMachine(catalog)
    press(session, { type: 'cursor', direction: 'right' })
    expect(session.snapshot().state).toEqual({ phase: 'startup', modalSelection: 'binary' })
    press(session, { type: 'cursor', direction: 'left' })
    expect(session.snapshot().state).toEqual({ phase: 'startup', modalSelection: 'word' })
  })

  it('confirm enters the selected mode', () => {
    const session = new SessionStateMachine(catalog)
    press(session, { type: 'cursor', direction: 'left' }, { type: 'confirm' })
    expect(session.snapshot().state).toEqual({ phase: 'running', mode: 'binary' })
  })

  it('ignores typing, backspace and review before a mode is chosen', () => {
    const session = new SessionStateMachine(catalog)
    typeText(session, 'ab')
    press(session, { type: 'backspace' }, { type: 'review', direction: 'up' })
    const snapshot = session.snapshot()
    expect(snapshot.input).toBe('')
    expect(snapshot.state.phase).toBe('startup')
  })

  it('terminate ends the session from startup', () => {
    const session = new SessionStateMachine(catalog)
    expect(session.handle({ type: 'terminate' })).toBe('terminate')
  })

  it('an initial mode skips the modal', () => {
    const session = running('binary')
    expect(session.snapshot().state).toEqual({ phase: 'running', mode: 'binary' })
  })
})

describe('word mode', () => {
  it('typing "zer" then confirming accepts "zero" and clears input', () => {
    const session = running('word')
    typeText(session, 'zer')
    expect(session.snapshot().suggestions.items).toEqual(['zero'])

    expect(session.handle({ type: 'confirm' })).toBe('continue')

    const snapshot = session.snapshot()
    expect(snapshot.history.entries).toEqual([{ word: 'zero', order: 0 }])
    expect(snapshot.input).toBe('')
    expect(snapshot.suggestions.items).toHaveLength(1024)
  })

  it('shows the accepted word under review after confirming', () => {
    const session = running('word')
    typeText(session, 'zer')
    press(session, { type: 'confirm' })
    expect(session.snapshot().history.reviewCursor).toBe(0)
    expect(session.snapshot().focus).toEqual({ source: 'history', bits: '1111111111', word: 'zero', index: 1023 })
  })

  it('backspace recomputes suggestions', () => {
    const session = running('word')
    typeText(session, 'zx')
    expect(session.snapshot().suggestions.items).toEqual([])
    press(session, { type: 'backspace' })
    expect(session.snapshot().input).toBe('z')
    expect(session.snapshot().suggestions.items).toEqual(['zero'])
  })

  it('backspace on empty input keeps the input empty', () => {
    const session = running('word')
    press(session, { type: 'backspace' })
    expect(session.snapshot().input).toBe('')
  })

  it('confirm with no matching suggestion changes nothing', () => {
    const session = running('word')
    typeText(session, 'xyz')
    press(session, { type: 'confirm' })
    const snapshot = session.snapshot()
    expect(snapshot.input).toBe('xyz')
    expect(snapshot.history.entries).toEqual([])
  })

  it('carousel movement selects the word that confirm accepts', () => {
    const session = running('word')
    typeText(session, 'y')
    press(session, { type: 'cursor', direction: 'left' }, { type: 'confirm' })
    expect(session.snapshot().history.entries).toEqual([{ word: 'yoga', order: 0 }])
  })

  it('typing and carousel movement leave history review', () => {
    const session = running('word')
    typeText(session, 'zer')
    press(session, { type: 'confirm' })
    expect(session.snapshot().history.reviewCursor).toBe(0)

    typeText(session, 'a')
    expect(session.snapshot().history.reviewCursor).toBeNull()

    press(session, { type: 'review', direction: 'up' })
    expect(session.snapshot().history.reviewCursor).toBe(0)
    press(session, { type: 'cursor', direction: 'right' })
    expect(session.snapshot().history.reviewCursor).toBeNull()
  })

  it('backspace leaves history review', () => {
    const session = running('word')
    typeText(session, 'zer')
    press(session, { type: 'confirm' }, { type: 'backspace' })
    expect(session.snapshot().history.reviewCursor).toBeNull()
    expect(session.snapshot().suggestions.items).toHaveLength(1024)
  })

  it('drops accepts past twenty words but still clears the input', () => {
    const session = running('word')
    for (let i = 0; i < 20; i++) press(session, { type: 'confirm' })
    typeText(session, 'zer')
    press(session, { type: 'confirm' })

    const snapshot = session.snapshot()
    expect(snapshot.history.entries).toHaveLength(20)
    expect(snapshot.history.entries.every((e) => e.word === 'academic')).toBe(true)
    expect(snapshot.input).toBe('')
  })

  it('paper mode keeps only the last accepted word', () => {
    const session = running('word', true)
    typeText(session, 'aci')
    press(session, { type: 'confirm' })
    typeText(session, 'zer')
    press(session, { type: 'confirm' })

    const snapshot = session.snapshot()
    expect(snapshot.paperMode).toBe(true)
    expect(snapshot.history.entries).toEqual([{ word: 'zero', order: 1 }])
    expect(snapshot.history.capacity).toBe(1)
  })

  it('focuses the current suggestion while typing', () => {
    const session = running('word')
    typeText(session, 'bea')
    expect(session.snapshot().focus).toEqual({ source: 'suggestion', bits: '0001000011', word: 'beam', index: 67 })
  })
})

describe('binary mode', () => {
  it('entering 1111111111 and confirming accepts "zero"', () => {
    const session = running('binary')
    typeText(session, '1111111111')
    press(session, { type: 'confirm' })

    const snapshot = session.snapshot()
    expect(snapshot.history.entries).toEqual([{ word: 'zero', order: 0 }])
    expect(snapshot.input).toBe('')
  })

  it('confirming an incomplete bit string is a no-op', () => {
    const session = running('binary')
    typeText(session, '111')
    press(session, { type: 'confirm' })

    const snapshot = session.snapshot()
    expect(snapshot.input).toBe('111')
    expect(snapshot.history.entries).toEqual([])
  })

  it('accepts only 0 and 1', () => {
    const session = running('binary')
    typeText(session, '1a2 0')
    expect(session.snapshot().input).toBe('10')
  })

  it('stops at ten bits', () => {
    const session = running('binary')
    typeText(session, '000000000011')
    expect(session.snapshot().input).toBe('0000000000')
  })

  it('backspace drops the last bit', () => {
    const session = running('binary')
    typeText(session, '101')
    press(session, { type: 'backspace' })
    expect(session.snapshot().input).toBe('10')
  })

  it('ignores carousel movement', () => {
    const session = running('binary')
    press(session, { type: 'cursor', direction: 'right' })
    expect(session.snapshot().suggestions.cursor).toBe(0)
  })

  it('keeps the review cursor on carousel movement', () => {
    const session = running('binary')
    typeText(session, '1111111111')
    press(session, { type: 'confirm' })
    expect(session.snapshot().history.reviewCursor).toBe(0)

    press(session, { type: 'cursor', direction: 'left' })
    expect(session.snapshot().history.reviewCursor).toBe(0)
    press(session, { type: 'cursor', direction: 'right' })
    expect(session.snapshot().history.reviewCursor).toBe(0)
  })

  it('backspace leaves history review', () => {
    const session = running('binary')
    typeText(session, '1111111111')
    press(session, { type: 'confirm' }, { type: 'backspace' })
    expect(session.snapshot().history.reviewCursor).toBeNull()
    expect(session.snapshot().input).toBe('')
  })

  it('reviews history like word mode', () => {
    const session = running('binary')
    typeText(session, '0000000001')
    press(session, { type: 'confirm' })
    typeText(session, '0001000011')
    press(session, { type: 'confirm' })

    press(session, { type: 'review', direction: 'up' })
    expect(session.snapshot().history.reviewCursor).toBe(0)
    expect(session.snapshot().focus).toEqual({ source: 'history', bits: '0000000001', word: 'acid', index: 1 })

    press(session, { type: 'review', direction: 'down' }, { type: 'review', direction: 'down' })
    expect(session.snapshot().history.reviewCursor).toBeNull()
  })

  it('typing a bit leaves history review', () => {
    const session = running('binary')
    typeText(session, '1111111111')
    press(session, { type: 'confirm' })
    typeText(session, '0')
    expect(session.snapshot().history.reviewCursor).toBeNull()
  })

  it('projects partial and complete bit strings', () => {
    const session = running('binary')
    typeText(session, '101')
    expect(session.snapshot().focus).toEqual({ source: 'bits', bits: '101', word: null, index: null })
    expect(session.snapshot().liveWord).toBeNull()

    session.handle({ type: 'backspace' })
    session.handle({ type: 'backspace' })
    session.handle({ type: 'backspace' })
    typeText(session, '0001000011')
    expect(session.snapshot().liveWord).toBe('beam')
    expect(session.snapshot().focus).toEqual({ source: 'bits', bits: '0001000011', word: 'beam', index: 67 })
  })

  it('has no focus before any bit is typed', () => {
    expect(running('binary').snapshot().focus).toBeNull()
  })
})

describe('snapshot', () => {
  it('is stable between transitions', () => {
    const session = running('word')
    typeText(session, 'sh')
    expect(session.snapshot()).toEqual(session.snapshot())
  })

  it('terminate ends the session from any mode', () => {
    expect(running('word').handle({ type: 'terminate' })).toBe('terminate')
    expect(running('binary').handle({ type: 'terminate' })).toBe('terminate')
  })
})
