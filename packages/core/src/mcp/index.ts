/**
 * MCP Server Infrastructure
 *
 * @module mcp
 */

export { createCalendarServer } from './calendar-server.js'
export { toEventRecord } from './records.js'
export type { EventRecord, AttendeeRecord, ReminderRecord, RecurrenceRecord } from './records.js'
export type { CalendarServerDeps } from './types.js'
