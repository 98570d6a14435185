/**
 * slip39c entry point.
 *
 * Run with:
 *   npx tsx src/cli.ts explain academic
 *   LOG_LEVEL=debug npx tsx src/cli.ts tui --paper
 *
 * Lookup commands print their result on stdout. Any lookup error prints
 * `Error: <message>` on stderr and exits with status 1.
 */

import { main } from './main.ts'

process.exit(await main(process.argv.slice(2)))
