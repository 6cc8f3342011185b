/**
 * Input normalisation
 *
 * Turns loosely-typed caller input into model values, rejecting anything the
 * encoder could not represent.
 */

import { ValidationError } from './errors.js'
import { parseTimeInput } from './datetime.js'
import {
  ATTENDEE_STATUSES,
  EVENT_STATUSES,
  FREQUENCIES,
  REMINDER_ACTIONS,
  type Attendee,
  type AttendeeInput,
  type AttendeeStatus,
  type EventStatus,
  type Frequency,
  type RecurrenceInput,
  type RecurrenceRule,
  type Reminder,
  type ReminderAction,
  type ReminderInput,
} from './types.js'

const DEFAULT_REMINDER_MINUTES = 15
const WEEKDAY = /^([+-]?\d{1,2})?(MO|TU|WE|TH|FR|SA|SU)$/

function includes<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value)
}

export function isFrequency(value: string): value is Frequency {
  return includes(FREQUENCIES, value)
}

export function isAttendeeStatus(value: string): value is AttendeeStatus {
  return includes(ATTENDEE_STATUSES, value)
}

export function isReminderAction(value: string): value is ReminderAction {
  return includes(REMINDER_ACTIONS, value)
}

export function isEventStatus(value: string): value is EventStatus {
  return includes(EVENT_STATUSES, value)
}

function toList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return []
  return Array.isArray(value) ? value : [value]
}

function positiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer, got ${value}`)
  }
  return value
}

function integerInRanges(value: number, field: string, ranges: Array<[number, number]>): number {
  if (!Number.isInteger(value) || !ranges.some(([min, max]) => value >= min && value <= max)) {
    throw new ValidationError(`${field} value ${value} is out of range`)
  }
  return value
}

export function normalizeRecurrence(input: RecurrenceInput): RecurrenceRule {
  const frequency = input.frequency?.trim().toUpperCase()
  if (!frequency) {
    throw new ValidationError('Recurrence frequency is required')
  }
  if (!isFrequency(frequency)) {
    throw new ValidationError(
      `Invalid recurrence frequency "${input.frequency}". Expected one of ${FREQUENCIES.join(', ')}`,
    )
  }

  const rule: RecurrenceRule = { frequency }

  if (input.interval !== undefined) {
    const interval = positiveInteger(input.interval, 'Recurrence interval')
    // An interval of 1 is the RFC 5545 default and is never written out
    if (interval > 1) rule.interval = interval
  }
  if (input.count !== undefined) {
    rule.count = positiveInteger(input.count, 'Recurrence count')
  }
  if (input.count !== undefined && input.until !== undefined) {
    throw new ValidationError('Recurrence count and until cannot both be set')
  }
  if (input.until !== undefined) {
    rule.until = parseTimeInput(input.until, 'recurrence until')
  }

  const byDay = toList(input.byDay)
    .flatMap((entry) => entry.split(','))
    .map((entry) => entry.trim().toUpperCase())
    .filter((entry) => entry.length > 0)
  for (const day of byDay) {
    if (!WEEKDAY.test(day)) {
      throw new ValidationError(`Invalid recurrence weekday "${day}". Expected e.g. MO, 2TU, -1FR`)
    }
  }
  if (byDay.length > 0) rule.byDay = byDay

  const byMonthDay = toList(input.byMonthDay).map((day) =>
    integerInRanges(day, 'Recurrence bymonthday', [
      [-31, -1],
      [1, 31],
    ]),
  )
  if (byMonthDay.length > 0) rule.byMonthDay = byMonthDay

  const byMonth = toList(input.byMonth).map((month) =>
    integerInRanges(month, 'Recurrence bymonth', [[1, 12]]),
  )
  if (byMonth.length > 0) rule.byMonth = byMonth

  return rule
}

export function normalizeAttendee(input: AttendeeInput | string): Attendee {
  const raw = typeof input === 'string' ? { email: input } : input
  const email = raw.email.trim().replace(/^mailto:/i, '')

  if (!email.includes('@')) {
    throw new ValidationError(`Invalid attendee email "${raw.email}"`)
  }

  const status = raw.status?.trim().toUpperCase() || 'NEEDS-ACTION'
  if (!isAttendeeStatus(status)) {
    throw new ValidationError(
      `Invalid attendee status "${raw.status}". Expected one of ${ATTENDEE_STATUSES.join(', ')}`,
    )
  }

  const attendee: Attendee = { email, status }
  const name = raw.name?.trim()
  if (name) attendee.name = name
  return attendee
}

/**
 * @param title - Used as the alarm text when none is given
 */
export function normalizeReminder(input: ReminderInput, title: string): Reminder {
  const minutesBefore = input.minutesBefore ?? DEFAULT_REMINDER_MINUTES
  if (!Number.isInteger(minutesBefore) || minutesBefore < 0) {
    throw new ValidationError(
      `Reminder minutes_before must be a non-negative integer, got ${minutesBefore}`,
    )
  }

  const action = input.action?.trim().toUpperCase() || 'DISPLAY'
  if (!isReminderAction(action)) {
    throw new ValidationError(
      `Invalid reminder action "${input.action}". Expected one of ${REMINDER_ACTIONS.join(', ')}`,
    )
  }

  const reminder: Reminder = {
    minutesBefore,
    action,
    description: input.description ?? title,
  }

  if (action === 'EMAIL' && input.emailTo) {
    if (!input.emailTo.includes('@')) {
      throw new ValidationError(`Invalid reminder email "${input.emailTo}"`)
    }
    reminder.emailTo = input.emailTo.trim()
  }

  return reminder
}

export function normalizePriority(priority: number): number {
  if (!Number.isInteger(priority) || priority < 0 || priority > 9) {
    throw new ValidationError(`Priority must be an integer from 0 to 9, got ${priority}`)
  }
  return priority
}

export function normalizeCategories(categories: string[]): string[] {
  const seen = new Set<string>()
  for (const category of categories) {
    const trimmed = category.trim()
    if (trimmed) seen.add(trimmed)
  }
  return [...seen]
}

export function normalizeStatus(status: string): EventStatus {
  const upper = status.trim().toUpperCase()
  if (!isEventStatus(upper)) {
    throw new ValidationError(
      `Invalid event status "${status}". Expected one of ${EVENT_STATUSES.join(', ')}`,
    )
  }
  return upper
}
