/**
 * Word catalog.
 *
 * Immutable, sorted view over the 1024-word SLIP-39 wordlist. Built once at
 * start-up and handed to every component that needs it; nothing mutates it
 * afterwards.
 */

import { createHash } from 'node:crypto'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { err, ok } from '../types.ts'
import type { Result, WordEntry } from '../types.ts'

export type { WordEntry }

/** Bits per word. */
export const BITS_PER_WORD = 10

export const CATALOG_SIZE = 1 << BITS_PER_WORD

export const DEFAULT_WORDLIST_PATH = fileURLToPath(new URL('./wordlist.txt', import.meta.url))

/** SHA-256 of the bundled wordlist file (one word per line, trailing newline). */
export const WORDLIST_SHA256 = 'bcc4555340332d169718aed8bf31dd9d5248cb7da6e5d355140ef4f1e601eec3'

const WORD_PATTERN = /^[a-z]+$/

export function parseWordlist(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

export function wordlistChecksum(words: readonly string[]): string {
  const content = words.map((w) => w + '\n').join('')
  return createHash('sha256').update(content).digest('hex')
}

export class WordCatalog {
  private readonly list: readonly string[]
  private readonly positions: ReadonlyMap<string, number>

  private constructor(words: readonly string[]) {
    this.list = Object.freeze([...words])
    this.positions = new Map(words.map((w, i) => [w, i]))
  }

  /**
   * Validates and wraps a wordlist. The list must hold exactly CATALOG_SIZE
   * lower-case words in strictly ascending order.
   */
  static fromWords(words: readonly string[]): Result<WordCatalog> {
    if (words.length !== CATALOG_SIZE) {
      return err(new Error(`Wordlist must contain exactly ${CATALOG_SIZE} words, got ${words.length}`))
    }
    for (let i = 0; i < words.length; i++) {
      const word = words[i] ?? ''
      if (!WORD_PATTERN.test(word)) {
        return err(new Error(`Invalid word at index ${i}: '${word}'`))
      }
      const prev = words[i - 1]
      if (prev !== undefined && prev >= word) {
        return err(new Error(`Wordlist not in strict alphabetical order at index ${i}: '${prev}' >= '${word}'`))
      }
    }
    return ok(new WordCatalog(words))
  }

  get size(): number {
    return this.list.length
  }

  get words(): readonly string[] {
    return this.list
  }

  get checksum(): string {
    return wordlistChecksum(this.list)
  }

  lookupExact(word: string): number | undefined {
    return this.positions.get(word)
  }

  byIndex(index: number): string | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined
    return this.list[index]
  }

  entry(index: number): WordEntry | undefined {
    const word = this.byIndex(index)
    return word === undefined ? undefined : { word, index }
  }

  /**
   * Half-open index range [start, end) of the words starting with `prefix`.
   * Matches are contiguous because the list is sorted.
   */
  prefixRange(prefix: string): { readonly start: number; readonly end: number } {
    let lo = 0
    let hi = this.list.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      const word = this.list[mid] ?? ''
      if (word < prefix) lo = mid + 1
      else hi = mid
    }

    let end = lo
    while (end < this.list.length && (this.list[end] ?? '').startsWith(prefix)) end++
    return { start: lo, end }
  }

  /** Matching words in catalog order. The empty prefix matches everything. */
  entriesWithPrefix(prefix: string): readonly string[] {
    if (prefix === '') return this.list
    const { start, end } = this.prefixRange(prefix)
    return this.list.slice(start, end)
  }
}

export function loadCatalog(path: string = DEFAULT_WORDLIST_PATH): Result<WordCatalog> {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return err(new Error(`Cannot read wordlist ${path}: ${reason}`))
  }
  return WordCatalog.fromWords(parseWordlist(text))
}

export function isStandardWordlist(catalog: WordCatalog): boolean {
  return catalog.checksum === WORDLIST_SHA256
}
