/**
 * Core shared types for the SLIP-39 lookup tool.
 */

// ── Result<T, E> ────────────────────────────────────────────────────────────

type Ok<T> = { readonly ok: true; readonly value: T }
type Err<E> = { readonly ok: false; readonly error: E }
export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

// ── Catalog ─────────────────────────────────────────────────────────────────

export interface WordEntry {
  readonly word: string
  /** Position in the sorted wordlist, 0..1023 */
  readonly index: number
}

// ── Lookup errors ───────────────────────────────────────────────────────────

export interface WordNotFound {
  readonly kind: 'WordNotFound'
  /** The query exactly as the caller supplied it */
  readonly query: string
}

export interface AmbiguousPrefix {
  readonly kind: 'AmbiguousPrefix'
  readonly prefix: string
  readonly count: number
  /** Every matching word, in catalog order, joined with ", " */
  readonly examples: string
}

export interface InvalidBinaryLength {
  readonly kind: 'InvalidBinaryLength'
  readonly length: number
}

export interface InvalidBinary {
  readonly kind: 'InvalidBinary'
  readonly reason: string
}

export interface IndexOutOfRange {
  readonly kind: 'IndexOutOfRange'
  readonly index: number
}

export type ResolveError = WordNotFound | AmbiguousPrefix
export type DecodeError = InvalidBinaryLength | InvalidBinary
export type LookupError = ResolveError | DecodeError | IndexOutOfRange

export function describeError(error: LookupError): string {
  switch (error.kind) {
    case 'WordNotFound':
      return `Word '${error.query}' not found in SLIP-39 wordlist`
    case 'AmbiguousPrefix':
      return `Ambiguous prefix '${error.prefix}' matches ${error.count} words: ${error.examples}`
    case 'InvalidBinaryLength':
      return `Binary must be exactly 10 bits, got ${error.length} bits`
    case 'InvalidBinary':
      return `Invalid binary string: ${error.reason}`
    case 'IndexOutOfRange':
      return `Index ${error.index} out of wordlist range (0-1023)`
  }
}
