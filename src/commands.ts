/**
 * Command layer for non-interactive lookups.
 *
 *   slip39c                               interactive session (default)
 *   slip39c tui [--paper] [--mode word|binary]
 *   slip39c encode-word <word> [--prefix]
 *   slip39c decode-bits <bits>
 *   slip39c word-to-index <word> [--prefix]
 *   slip39c index-to-word <index>
 *   slip39c explain <word> [--prefix]
 */

import type { WordCatalog } from './catalog/index.ts'
import { decode, explain, findWord, indexToWord, toBits } from './codec.ts'
import { PrefixResolver } from './lookup/resolver.ts'
import type { InputMode } from './session/machine.ts'
import { err, ok } from './types.ts'
import type { LookupError, Result, WordEntry } from './types.ts'

export const VERSION = '0.1.0'

export const USAGE = `SLIP-39 Wordlist Calculator

Usage:
  slip39c [tui] [--paper|-p] [--mode word|binary]
  slip39c encode-word <word> [--prefix|-p]
  slip39c decode-bits <bits>
  slip39c word-to-index <word> [--prefix|-p]
  slip39c index-to-word <index>
  slip39c explain <word> [--prefix|-p]

Without a command the interactive session starts.
--prefix accepts any unambiguous prefix of a word.`

type WordCommandName = 'encode-word' | 'word-to-index' | 'explain'

export type LookupCommand =
  | { readonly name: WordCommandName; readonly word: string; readonly prefix: boolean }
  | { readonly name: 'decode-bits'; readonly bits: string }
  | { readonly name: 'index-to-word'; readonly index: number }

export type Command =
  | { readonly name: 'tui'; readonly paper: boolean; readonly mode?: InputMode }
  | { readonly name: 'help' }
  | { readonly name: 'version' }
  | LookupCommand

const WORD_COMMANDS: ReadonlySet<string> = new Set<WordCommandName>(['encode-word', 'word-to-index', 'explain'])

function isWordCommand(name: string): name is WordCommandName {
  return WORD_COMMANDS.has(name)
}

function isInputMode(value: string): value is InputMode {
  return value === 'word' || value === 'binary'
}

function parseTui(args: readonly string[]): Result<Command> {
  let paper = false
  let mode: InputMode | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''
    if (arg === '--paper' || arg === '-p') {
      paper = true
      continue
    }
    if (arg === '--mode' || arg.startsWith('--mode=')) {
      const value = arg === '--mode' ? args[++i] : arg.slice('--mode='.length)
      if (value === undefined || !isInputMode(value)) {
        return err(new Error(`--mode must be 'word' or 'binary', got: ${value ?? '(missing)'}`))
      }
      mode = value
      continue
    }
    return err(new Error(`Unexpected argument for tui: ${arg}`))
  }

  return ok({ name: 'tui', paper, ...(mode !== undefined ? { mode } : {}) })
}

/** Splits `--prefix`/`-p` from the positional arguments. */
function splitPrefixFlag(args: readonly string[]): { prefix: boolean; positional: string[] } {
  const positional: string[] = []
  let prefix = false
  for (const arg of args) {
    if (arg === '--prefix' || arg === '-p') prefix = true
    else positional.push(arg)
  }
  return { prefix, positional }
}

function single(name: string, placeholder: string, args: readonly string[]): Result<string> {
  const [value, ...rest] = args
  if (value === undefined) {
    return err(new Error(`Missing ${placeholder} argument for ${name}`))
  }
  if (rest.length > 0) {
    return err(new Error(`Unexpected argument for ${name}: ${rest.join(' ')}`))
  }
  return ok(value)
}

export function parseCommand(argv: readonly string[]): Result<Command> {
  const [name, ...args] = argv

  if (name === undefined) return ok({ name: 'tui', paper: false })
  if (name === '--help' || name === '-h' || name === 'help') return ok({ name: 'help' })
  if (name === '--version' || name === '-V') return ok({ name: 'version' })
  if (name === 'tui' || name.startsWith('-')) {
    return parseTui(name === 'tui' ? args : argv)
  }

  if (isWordCommand(name)) {
    const { prefix, positional } = splitPrefixFlag(args)
    const word = single(name, '<word>', positional)
    if (!word.ok) return word
    return ok({ name, word: word.value, prefix })
  }

  if (name === 'decode-bits') {
    const bits = single(name, '<bits>', args)
    if (!bits.ok) return bits
    return ok({ name, bits: bits.value })
  }

  if (name === 'index-to-word') {
    const raw = single(name, '<index>', args)
    if (!raw.ok) return raw
    if (!/^\d+$/.test(raw.value)) {
      return err(new Error(`Index must be a non-negative integer, got: ${raw.value}`))
    }
    return ok({ name, index: parseInt(raw.value, 10) })
  }

  return err(new Error(`Unknown command: ${name}`))
}

function lookupWord(catalog: WordCatalog, word: string, prefix: boolean): Result<WordEntry, LookupError> {
  return prefix ? new PrefixResolver(catalog).resolve(word) : findWord(catalog, word)
}

/** Runs a single lookup and returns the line to print. */
export function runLookup(command: LookupCommand, catalog: WordCatalog): Result<string, LookupError> {
  switch (command.name) {
    case 'decode-bits':
      return decode(catalog, command.bits)
    case 'index-to-word':
      return indexToWord(catalog, command.index)
    default: {
      const found = lookupWord(catalog, command.word, command.prefix)
      if (!found.ok) return found
      const entry = found.value
      if (command.name === 'encode-word') return ok(toBits(entry.index))
      if (command.name === 'word-to-index') return ok(String(entry.index))
      return ok(explain(entry))
    }
  }
}
