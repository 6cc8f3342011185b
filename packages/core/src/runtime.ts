/**
 * Server Runtime
 *
 * Wires configuration, logging, the CalDAV client and the tool server
 * together. One runtime per process: the client is created here, connected
 * by the caller at startup and closed at shutdown.
 *
 * @module runtime
 */

import type { Logger } from 'pino'
import { CalDAVClient, type CalDAVClientOptions } from './calendar/caldav-client.js'
import { isVerboseEnv, loadConnectionSettings, type ConfigOverrides } from './calendar/config.js'
import { ConfigurationError } from './calendar/errors.js'
import { createLogger, levelFromVerbosity } from './logger.js'
import { createCalendarServer } from './mcp/calendar-server.js'

export const VERSION = '0.1.0'

export interface RuntimeOptions extends ConfigOverrides {
  /** Number of `-v` flags */
  verbosity?: number
  env?: Record<string, string | undefined>
  logger?: Logger
  connect?: CalDAVClientOptions['connect']
  now?: CalDAVClientOptions['now']
}

export interface Runtime {
  logger: Logger
  /** Null when the connection settings are missing or invalid */
  client: CalDAVClient | null
  server: ReturnType<typeof createCalendarServer>
}

function openClient(
  options: RuntimeOptions,
  env: Record<string, string | undefined>,
  logger: Logger,
): CalDAVClient | ConfigurationError {
  try {
    const settings = loadConnectionSettings(options, env)
    return new CalDAVClient(settings, {
      connect: options.connect,
      logger,
      now: options.now,
    })
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err
    // Tools report this error until the server is restarted with settings
    logger.warn({ missing: err.missing }, err.message)
    return err
  }
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const env = options.env ?? process.env
  const logger =
    options.logger ?? createLogger(levelFromVerbosity(options.verbosity ?? 0, isVerboseEnv(env)))

  const repository = openClient(options, env, logger)
  const server = createCalendarServer({ repository, logger, version: VERSION })

  return {
    logger,
    client: repository instanceof ConfigurationError ? null : repository,
    server,
  }
}
