/**
 * Command dispatch behind the slip39c executable.
 *
 * Help and version are answered before the environment or the wordlist is
 * read, so they work even when either is broken.
 */

import { isStandardWordlist, loadCatalog } from './catalog/index.ts'
import { USAGE, VERSION, parseCommand, runLookup } from './commands.ts'
import { loadConfig } from './config.ts'
import { logger, setLogLevel } from './logger.ts'
import { runInteractive } from './tui.ts'
import { describeError } from './types.ts'

export interface Output {
  readonly stdout: (text: string) => void
  readonly stderr: (text: string) => void
}

const processOutput: Output = {
  stdout: (text) => {
    process.stdout.write(text)
  },
  stderr: (text) => {
    process.stderr.write(text)
  },
}

/** Runs one invocation and returns its exit status. */
export async function main(argv: readonly string[], out: Output = processOutput): Promise<number> {
  // ── Command ──────────────────────────────────────────────────────────────

  const commandResult = parseCommand(argv)
  if (!commandResult.ok) {
    out.stderr(`Error: ${commandResult.error.message}\n\n${USAGE}\n`)
    return 1
  }

  const command = commandResult.value
  if (command.name === 'help') {
    out.stdout(USAGE + '\n')
    return 0
  }
  if (command.name === 'version') {
    out.stdout(VERSION + '\n')
    return 0
  }

  // ── Config ───────────────────────────────────────────────────────────────

  const configResult = loadConfig()
  if (!configResult.ok) {
    logger.error('Configuration error', { error: configResult.error.message })
    return 1
  }

  const config = configResult.value
  setLogLevel(config.logLevel)
  logger.debug('Command parsed', { command: command.name })

  // ── Catalog ──────────────────────────────────────────────────────────────

  const catalogResult = loadCatalog(config.wordlistPath)
  if (!catalogResult.ok) {
    logger.error('Wordlist load failed', { error: catalogResult.error.message })
    return 1
  }

  const catalog = catalogResult.value
  if (!isStandardWordlist(catalog)) {
    logger.warn('Wordlist differs from the standard SLIP-39 list', {
      path: config.wordlistPath,
      checksum: catalog.checksum,
    })
  }

  // ── Dispatch ─────────────────────────────────────────────────────────────

  if (command.name === 'tui') {
    await runInteractive(catalog, {
      paperMode: command.paper || config.paperMode,
      ...(command.mode !== undefined ? { mode: command.mode } : {}),
    })
    return 0
  }

  const result = runLookup(command, catalog)
  if (!result.ok) {
    out.stderr(`Error: ${describeError(result.error)}\n`)
    return 1
  }
  out.stdout(result.value + '\n')
  return 0
}
