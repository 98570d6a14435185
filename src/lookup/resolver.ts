/**
 * Prefix resolution.
 *
 * Turns a typed fragment into exactly one catalog entry, or reports that the
 * fragment matches nothing or more than one word.
 */

import type { WordCatalog } from '../catalog/index.ts'
import { err, ok } from '../types.ts'
import type { ResolveError, Result, WordEntry } from '../types.ts'

export interface Query {
  readonly raw: string
  readonly normalized: string
}

export function normalizeQuery(raw: string): string {
  return raw.trim().toLowerCase()
}

export function toQuery(raw: string): Query {
  return { raw, normalized: normalizeQuery(raw) }
}

export class PrefixResolver {
  private readonly catalog: WordCatalog

  constructor(catalog: WordCatalog) {
    this.catalog = catalog
  }

  resolve(input: string): Result<WordEntry, ResolveError> {
    const query = toQuery(input)

    // An exact word wins even when it also prefixes longer entries.
    const exact = this.catalog.lookupExact(query.normalized)
    if (exact !== undefined) {
      return ok({ word: query.normalized, index: exact })
    }

    const { start, end } = this.catalog.prefixRange(query.normalized)
    const count = end - start
    if (count === 0) {
      return err({ kind: 'WordNotFound', query: query.raw })
    }

    const matches = this.catalog.words.slice(start, end)
    if (count > 1) {
      return err({
        kind: 'AmbiguousPrefix',
        prefix: query.normalized,
        count,
        examples: matches.join(', '),
      })
    }
    return ok({ word: matches[0] ?? query.normalized, index: start })
  }
}
