/**
 * Configuration loader.
 *
 * Optional env vars:
 *   LOG_LEVEL        – debug | info | warn | error (default warn)
 *   SLIP39_WORDLIST  – path to an alternative wordlist file
 *   SLIP39_PAPER     – start the interactive session in paper mode (1/0, true/false, yes/no)
 */

import { err, ok } from './types.ts'
import type { Result } from './types.ts'

export interface Config {
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error'
  /** Absent means the bundled wordlist. */
  readonly wordlistPath?: string
  readonly paperMode: boolean
}

type LogLevel = Config['logLevel']
const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error'])

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value)
}

const TRUE_VALUES: ReadonlySet<string> = new Set(['1', 'true', 'yes'])
const FALSE_VALUES: ReadonlySet<string> = new Set(['0', 'false', 'no'])

function parseFlag(name: string, raw: string | undefined): Result<boolean> {
  if (raw === undefined || raw === '') return ok(false)
  const value = raw.trim().toLowerCase()
  if (TRUE_VALUES.has(value)) return ok(true)
  if (FALSE_VALUES.has(value)) return ok(false)
  return err(new Error(`${name} must be one of 1/0, true/false, yes/no, got: ${raw}`))
}

export function loadConfig(): Result<Config> {
  const rawLevel = process.env.LOG_LEVEL ?? 'warn'
  const logLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'warn'

  const wordlistPath = process.env.SLIP39_WORDLIST
  if (wordlistPath !== undefined && wordlistPath.trim() === '') {
    return err(new Error('SLIP39_WORDLIST must not be empty when set'))
  }

  const paper = parseFlag('SLIP39_PAPER', process.env.SLIP39_PAPER)
  if (!paper.ok) return paper

  return ok({
    logLevel,
    paperMode: paper.value,
    ...(wordlistPath !== undefined ? { wordlistPath } : {}),
  })
}
