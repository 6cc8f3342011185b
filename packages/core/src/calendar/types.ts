/**
 * Calendar System Types
 *
 * Core interfaces for the CalDAV-backed calendar tools.
 */

import type { DAVCalendar, DAVCalendarObject } from 'tsdav'

export const FREQUENCIES = ['DAILY', 'WEEKLY', 'MONTHLY', 'YEARLY'] as const
export const ATTENDEE_STATUSES = ['ACCEPTED', 'DECLINED', 'TENTATIVE', 'NEEDS-ACTION'] as const
export const REMINDER_ACTIONS = ['DISPLAY', 'EMAIL', 'AUDIO'] as const
export const EVENT_STATUSES = ['CONFIRMED', 'TENTATIVE', 'CANCELLED'] as const

export type Frequency = (typeof FREQUENCIES)[number]
export type AttendeeStatus = (typeof ATTENDEE_STATUSES)[number]
export type ReminderAction = (typeof REMINDER_ACTIONS)[number]
export type EventStatus = (typeof EVENT_STATUSES)[number]

/**
 * Event time value.
 *
 * - `YYYY-MM-DD` for all-day events
 * - `YYYY-MM-DDTHH:mm:ssZ` for UTC
 * - `YYYY-MM-DDTHH:mm:ss` for floating times, or zone-local when the event
 *   carries a `timezone`
 */
export type EventTime = string

export interface RecurrenceRule {
  frequency: Frequency
  /** Emitted only when greater than 1 */
  interval?: number
  count?: number
  until?: EventTime
  /** Weekday codes with optional ordinal, e.g. `MO`, `2TU`, `-1FR` */
  byDay?: string[]
  byMonthDay?: number[]
  byMonth?: number[]
}

export interface Attendee {
  email: string
  status: AttendeeStatus
  name?: string
}

export interface Reminder {
  minutesBefore: number
  action: ReminderAction
  /**
   * Alarm text. When absent the event title is written instead, and that is
   * what decoding the stored alarm returns.
   */
  description?: string
  /** Recipient for EMAIL alarms */
  emailTo?: string
  /** VALARM lines outside the fields above (REPEAT, DURATION, ATTACH, ...), kept verbatim */
  preserved?: string[]
}

/**
 * Calendar event representation.
 * Maps to an iCalendar VEVENT.
 */
export interface CalendarEvent {
  /** Assigned once at creation, never reassigned */
  uid: string

  title: string

  /** Empty string when absent */
  description: string

  /** Empty string when absent */
  location: string

  start: EventTime
  end: EventTime

  /** TZID qualifying floating-form start/end values */
  timezone: string | null

  /** True when start is a date-only value */
  allDay: boolean

  status: EventStatus

  /** RFC 5545 revision counter, incremented on every update */
  sequence: number

  dtstamp: string | null
  lastModified: string | null
  created: string | null

  /** Free-text tags, order preserved */
  categories: string[]

  /** 0 = undefined, 1 = highest, 9 = lowest */
  priority: number

  attendees: Attendee[]
  reminders: Reminder[]

  /** Structured rule, or null when absent or not expressible */
  recurrence: RecurrenceRule | null

  /** Raw RRULE value as stored */
  rrule: string | null
}

export interface AttendeeInput {
  email: string
  status?: string
  name?: string
}

export interface ReminderInput {
  minutesBefore?: number
  action?: string
  description?: string
  emailTo?: string
}

export interface RecurrenceInput {
  frequency?: string
  interval?: number
  count?: number
  until?: string
  byDay?: string | string[]
  byMonthDay?: number | number[]
  byMonth?: number | number[]
}

/**
 * Input for creating a new event (uid generated automatically)
 */
export interface CreateEventInput {
  title: string
  description?: string
  location?: string
  /** ISO 8601; defaults to tomorrow 14:00 local */
  start?: string
  end?: string
  /** Used when end is omitted (default: 1 hour, or 1 day for all-day events) */
  durationHours?: number
  reminders?: ReminderInput[]
  attendees?: Array<AttendeeInput | string>
  categories?: string[]
  priority?: number
  recurrence?: RecurrenceInput
  status?: string
}

/**
 * Input for updating an event. Omitted fields keep their prior value;
 * an empty description or location clears it; a null recurrence removes it.
 */
export interface UpdateEventInput {
  title?: string
  description?: string
  location?: string
  start?: string
  end?: string
  categories?: string[]
  priority?: number
  attendees?: Array<AttendeeInput | string>
  reminders?: ReminderInput[]
  recurrence?: RecurrenceInput | null
  status?: string
}

export interface GetEventsOptions {
  calendarIndex?: number
  /** ISO 8601; defaults to today 00:00 local */
  start?: string
  /** ISO 8601, exclusive; defaults to start + 7 days */
  end?: string
  includeAllDay?: boolean
}

export type SearchField = 'title' | 'description' | 'location' | 'attendees'

export interface SearchEventsOptions {
  query: string
  start: string
  end: string
  calendarIndex?: number
  /** Defaults to every field */
  fields?: SearchField[]
}

export interface CalendarInfo {
  index: number
  name: string
  url: string
}

export interface CreatedEvent {
  calendarIndex: number
  calendar: string
  event: CalendarEvent
}

export interface DeletedEvent {
  uid: string
  calendarIndex: number
}

export interface CalendarHealth {
  reachable: boolean
  provider: string
  latencyMs?: number
  error?: string
}

/**
 * Repository interface for calendar operations.
 * The tool surface depends on this, not on the CalDAV client.
 */
export interface CalendarRepository {
  listCalendars(): Promise<CalendarInfo[]>

  createEvent(input: CreateEventInput, calendarIndex?: number): Promise<CreatedEvent>

  /** Events overlapping [start, end) */
  getEvents(options?: GetEventsOptions): Promise<CalendarEvent[]>

  getTodayEvents(calendarIndex?: number): Promise<CalendarEvent[]>

  /**
   * @param startFromToday - Start today (true) or on Monday of this week (false)
   */
  getWeekEvents(calendarIndex?: number, startFromToday?: boolean): Promise<CalendarEvent[]>

  /** Throws NotFoundError when no event in the lookup window has this UID */
  getEventByUid(uid: string, calendarIndex?: number): Promise<CalendarEvent>

  updateEvent(uid: string, changes: UpdateEventInput, calendarIndex?: number): Promise<CalendarEvent>

  deleteEvent(uid: string, calendarIndex?: number): Promise<DeletedEvent>

  searchEvents(options: SearchEventsOptions): Promise<CalendarEvent[]>
}

/**
 * The slice of the tsdav client this package relies on.
 * Tests supply an in-process implementation.
 */
export interface CalDAVTransport {
  fetchCalendars(): Promise<DAVCalendar[]>
  fetchCalendarObjects(params: {
    calendar: DAVCalendar
    timeRange?: { start: string; end: string }
  }): Promise<DAVCalendarObject[]>
  createCalendarObject(params: {
    calendar: DAVCalendar
    filename: string
    iCalString: string
  }): Promise<Response>
  updateCalendarObject(params: { calendarObject: DAVCalendarObject }): Promise<Response>
  deleteCalendarObject(params: { calendarObject: DAVCalendarObject }): Promise<Response>
}

/**
 * Credentials and target for the CalDAV connection.
 */
export interface ConnectionSettings {
  url: string
  username: string
  password: string
}
