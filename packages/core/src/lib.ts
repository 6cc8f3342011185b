// Public API for embedding the calendar tools in another agent or server

export * from './calendar/index.js'
export {
  decodeCalendar,
  encodeCalendar,
  encodeEvent,
  escapeText,
  unescapeText,
} from './calendar/ical/index.js'
export type { DecodedCalendar, DecodedEvent, DecodeFailure } from './calendar/ical/index.js'

export { createCalendarServer, toEventRecord } from './mcp/index.js'
export type { CalendarServerDeps, EventRecord } from './mcp/index.js'

export { createRuntime, VERSION } from './runtime.js'
export type { Runtime, RuntimeOptions } from './runtime.js'
export { createLogger, levelFromVerbosity } from './logger.js'
