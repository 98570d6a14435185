/**
 * Word ↔ index ↔ bits codec.
 *
 *   encode(word) → 10-character bit string, index in big-endian binary
 *   decode(bits) → word at that index
 *
 * Pure lookups over the catalog; failures come back as Result values.
 */

import { BITS_PER_WORD } from './catalog/index.ts'
import type { WordCatalog } from './catalog/index.ts'
import { normalizeQuery } from './lookup/resolver.ts'
import { err, ok } from './types.ts'
import type { DecodeError, IndexOutOfRange, Result, WordEntry, WordNotFound } from './types.ts'

const BINARY_PATTERN = /^[01]+$/

export function toBits(index: number): string {
  return index.toString(2).padStart(BITS_PER_WORD, '0')
}

/** Exact lookup after trimming and lower-casing. */
export function findWord(catalog: WordCatalog, word: string): Result<WordEntry, WordNotFound> {
  const normalized = normalizeQuery(word)
  const index = catalog.lookupExact(normalized)
  if (index === undefined) {
    return err({ kind: 'WordNotFound', query: word })
  }
  return ok({ word: normalized, index })
}

export function encode(catalog: WordCatalog, word: string): Result<string, WordNotFound> {
  const found = findWord(catalog, word)
  if (!found.ok) return found
  return ok(toBits(found.value.index))
}

export function decode(catalog: WordCatalog, bits: string): Result<string, DecodeError> {
  if (bits.length !== BITS_PER_WORD) {
    return err({ kind: 'InvalidBinaryLength', length: bits.length })
  }
  if (!BINARY_PATTERN.test(bits)) {
    return err({ kind: 'InvalidBinary', reason: "Binary string must only contain '0' and '1'" })
  }

  const index = parseInt(bits, 2)
  const word = catalog.byIndex(index)
  if (word === undefined) {
    return err({
      kind: 'InvalidBinary',
      reason: `Index ${index} out of wordlist range (0-${catalog.size - 1})`,
    })
  }
  return ok(word)
}

export function indexToWord(catalog: WordCatalog, index: number): Result<string, IndexOutOfRange> {
  const word = catalog.byIndex(index)
  if (word === undefined) {
    return err({ kind: 'IndexOutOfRange', index })
  }
  return ok(word)
}

/** Renders `word -> index -> bits`. */
export function explain(entry: WordEntry): string {
  return `${entry.word} -> ${entry.index} -> ${toBits(entry.index)}`
}
