/**
 * Calendar System
 *
 * CalDAV-backed event operations over tsdav.
 */

// Types
export type {
  CalendarEvent,
  EventTime,
  RecurrenceRule,
  Attendee,
  Reminder,
  Frequency,
  AttendeeStatus,
  ReminderAction,
  EventStatus,
  AttendeeInput,
  ReminderInput,
  RecurrenceInput,
  CreateEventInput,
  UpdateEventInput,
  GetEventsOptions,
  SearchEventsOptions,
  SearchField,
  CalendarInfo,
  CreatedEvent,
  DeletedEvent,
  CalendarHealth,
  CalendarRepository,
  CalDAVTransport,
  ConnectionSettings,
} from './types.js'
export { FREQUENCIES, ATTENDEE_STATUSES, REMINDER_ACTIONS, EVENT_STATUSES } from './types.js'

// Errors
export {
  CalendarError,
  ConfigurationError,
  ValidationError,
  NotFoundError,
  TransportError,
  isCalendarError,
} from './errors.js'
export type { CalendarErrorCode } from './errors.js'

// Implementation
export { CalDAVClient, createCalDAVClient, LOOKUP_WINDOW_DAYS } from './caldav-client.js'
export type { CalDAVClientOptions } from './caldav-client.js'
export { loadConnectionSettings, loadConfigFile, isVerboseEnv } from './config.js'
export type { ConfigOverrides } from './config.js'
export { selectProvider } from './providers.js'
export type { ProviderProfile, ProviderName } from './providers.js'
export { isInWindow } from './window.js'
export type { TimeWindow } from './window.js'
