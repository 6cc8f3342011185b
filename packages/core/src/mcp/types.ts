/**
 * MCP Server Types
 *
 * @module mcp/types
 */

import type { Logger } from 'pino'
import type { ConfigurationError } from '../calendar/errors.js'
import type { CalendarRepository } from '../calendar/types.js'

/**
 * Dependencies needed by the calendar MCP server.
 */
export interface CalendarServerDeps {
  /**
   * The connected repository, or the error explaining why there is none.
   * Every tool reports that error until the server is restarted with settings.
   */
  repository: CalendarRepository | ConfigurationError
  logger?: Logger
  version?: string
}
