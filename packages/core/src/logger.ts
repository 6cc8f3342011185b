/**
 * Logging
 *
 * JSON lines on stderr; stdout carries the MCP stdio channel.
 *
 * @module logger
 */

import { pino, destination, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

export function createLogger(level: LevelWithSilent = 'warn'): Logger {
  return pino({ name: 'caldav-mcp', level }, destination(2))
}

/**
 * Map `-v` count and MCP_VERBOSE to a level: warn, info (`-v`), debug (`-vv`).
 */
export function levelFromVerbosity(verbosity: number, verboseEnv = false): LevelWithSilent {
  if (verboseEnv || verbosity >= 2) return 'debug'
  if (verbosity === 1) return 'info'
  return 'warn'
}
