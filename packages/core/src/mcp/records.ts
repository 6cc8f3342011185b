/**
 * Tool output records
 *
 * Events leave the tool surface as snake_case JSON objects.
 *
 * @module mcp/records
 */

import type {
  Attendee,
  CalendarEvent,
  RecurrenceRule,
  Reminder,
} from '../calendar/types.js'

export interface AttendeeRecord {
  email: string
  status: string
  name?: string
}

export interface ReminderRecord {
  minutes_before: number
  action: string
  description?: string
  email_to?: string
}

export interface RecurrenceRecord {
  frequency: string
  interval?: number
  count?: number
  until?: string
  by_day?: string[]
  by_month_day?: number[]
  by_month?: number[]
}

export interface EventRecord {
  uid: string
  title: string
  description: string
  location: string
  start: string
  end: string
  timezone: string | null
  all_day: boolean
  status: string
  sequence: number
  dtstamp: string | null
  last_modified: string | null
  created: string | null
  categories: string[]
  priority: number
  attendees: AttendeeRecord[]
  reminders: ReminderRecord[]
  recurrence: RecurrenceRecord | null
  rrule: string | null
}

function toAttendeeRecord(attendee: Attendee): AttendeeRecord {
  const record: AttendeeRecord = { email: attendee.email, status: attendee.status }
  if (attendee.name) record.name = attendee.name
  return record
}

function toReminderRecord(reminder: Reminder): ReminderRecord {
  const record: ReminderRecord = {
    minutes_before: reminder.minutesBefore,
    action: reminder.action,
  }
  if (reminder.description !== undefined) record.description = reminder.description
  if (reminder.emailTo) record.email_to = reminder.emailTo
  return record
}

function toRecurrenceRecord(rule: RecurrenceRule): RecurrenceRecord {
  const record: RecurrenceRecord = { frequency: rule.frequency }
  if (rule.interval !== undefined) record.interval = rule.interval
  if (rule.count !== undefined) record.count = rule.count
  if (rule.until !== undefined) record.until = rule.until
  if (rule.byDay) record.by_day = rule.byDay
  if (rule.byMonthDay) record.by_month_day = rule.byMonthDay
  if (rule.byMonth) record.by_month = rule.byMonth
  return record
}

export function toEventRecord(event: CalendarEvent): EventRecord {
  return {
    uid: event.uid,
    title: event.title,
    description: event.description,
    location: event.location,
    start: event.start,
    end: event.end,
    timezone: event.timezone,
    all_day: event.allDay,
    status: event.status,
    sequence: event.sequence,
    dtstamp: event.dtstamp,
    last_modified: event.lastModified,
    created: event.created,
    categories: event.categories,
    priority: event.priority,
    attendees: event.attendees.map(toAttendeeRecord),
    reminders: event.reminders.map(toReminderRecord),
    recurrence: event.recurrence ? toRecurrenceRecord(event.recurrence) : null,
    rrule: event.rrule,
  }
}
