/**
 * Event time handling
 *
 * Event times are kept as strings in one of three forms (date-only, UTC,
 * floating/zone-local) so that encoding and decoding never shift a wall-clock
 * value. Luxon is used for parsing, arithmetic and instants.
 */

import { DateTime, Duration, IANAZone } from 'luxon'
import { ValidationError } from './errors.js'
import type { EventTime } from './types.js'

export type TimeForm = 'date' | 'utc' | 'local'

const DATE_FORMAT = 'yyyy-MM-dd'
const LOCAL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"
const UTC_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'"

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/
const HAS_OFFSET = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/
const ICAL_DATE = /^(\d{4})(\d{2})(\d{2})$/
const ICAL_DATE_TIME = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})([zZ]?)$/

export function timeForm(time: EventTime): TimeForm {
  if (DATE_ONLY.test(time)) return 'date'
  return time.endsWith('Z') ? 'utc' : 'local'
}

export function formatTime(dt: DateTime, form: TimeForm): EventTime {
  switch (form) {
    case 'date':
      return dt.toFormat(DATE_FORMAT)
    case 'utc':
      return dt.toUTC().toFormat(UTC_FORMAT)
    case 'local':
      return dt.toFormat(LOCAL_FORMAT)
  }
}

/**
 * Normalise caller input. Values with an explicit offset become UTC; values
 * without one stay floating; a bare date is an all-day value.
 */
export function parseTimeInput(input: string, field: string): EventTime {
  const trimmed = input.trim()
  const hasOffset = trimmed.includes('T') && HAS_OFFSET.test(trimmed)
  // Wall-clock values are read in UTC so no local DST rule can move them
  const parsed = hasOffset
    ? DateTime.fromISO(trimmed, { setZone: true })
    : DateTime.fromISO(trimmed, { zone: 'utc' })

  if (!parsed.isValid) {
    throw new ValidationError(
      `Invalid ${field}: "${input}" is not an ISO 8601 date or date-time`,
    )
  }

  if (DATE_ONLY.test(trimmed)) {
    return formatTime(parsed, 'date')
  }

  return formatTime(parsed, hasOffset ? 'utc' : 'local')
}

/**
 * Decode an iCalendar DATE or DATE-TIME value.
 * Returns null when the value is not one of the RFC 5545 forms.
 */
export function fromICalValue(
  value: string,
  params: Record<string, string>,
): { time: EventTime; timezone: string | null } | null {
  const trimmed = value.trim()

  const date = ICAL_DATE.exec(trimmed)
  if (date) {
    const dt = DateTime.fromObject(
      { year: Number(date[1]), month: Number(date[2]), day: Number(date[3]) },
      { zone: 'utc' },
    )
    return dt.isValid ? { time: formatTime(dt, 'date'), timezone: null } : null
  }

  const dateTime = ICAL_DATE_TIME.exec(trimmed)
  if (!dateTime) {
    return null
  }

  const dt = DateTime.fromObject(
    {
      year: Number(dateTime[1]),
      month: Number(dateTime[2]),
      day: Number(dateTime[3]),
      hour: Number(dateTime[4]),
      minute: Number(dateTime[5]),
      second: Number(dateTime[6]),
    },
    { zone: 'utc' },
  )
  if (!dt.isValid) {
    return null
  }

  if (dateTime[7]) {
    return { time: formatTime(dt, 'utc'), timezone: null }
  }
  return { time: formatTime(dt, 'local'), timezone: params['TZID'] || null }
}

/**
 * Compact iCalendar form of an event time (without parameters).
 */
export function toICalValue(time: EventTime): string {
  return time.replace(/[-:]/g, '')
}

/**
 * Resolve an event time to a Luxon DateTime. Floating values are read in the
 * event's zone when it is a known IANA zone, otherwise in Luxon's default zone.
 */
export function toDateTime(time: EventTime, timezone?: string | null): DateTime {
  if (timeForm(time) === 'utc') {
    return DateTime.fromISO(time, { zone: 'utc' })
  }
  if (timezone && IANAZone.isValidZone(timezone)) {
    return DateTime.fromISO(time, { zone: timezone })
  }
  return DateTime.fromISO(time)
}

export function toInstant(time: EventTime, timezone?: string | null): number {
  return toDateTime(time, timezone).toMillis()
}

/**
 * Add wall-clock time while keeping the value's form.
 */
export function shiftTime(time: EventTime, amount: { minutes?: number; days?: number }): EventTime {
  const form = timeForm(time)
  // Floating values are shifted as wall-clock time, unaffected by DST
  const base = DateTime.fromISO(time, { zone: 'utc' })
  const shifted = base.plus({ days: amount.days ?? 0, minutes: amount.minutes ?? 0 })
  return formatTime(shifted, form)
}

/**
 * Wall-clock minutes from `start` to `end`, ignoring zones.
 */
export function minutesBetween(start: EventTime, end: EventTime): number {
  const from = DateTime.fromISO(start, { zone: 'utc' })
  const to = DateTime.fromISO(end, { zone: 'utc' })
  return Math.round(to.diff(from, 'minutes').minutes)
}

/**
 * Parse an ISO 8601 duration with an optional sign (`-PT15M`, `P1DT2H`, `P1W`).
 * Returns whole minutes, or null when unparseable.
 */
export function durationToMinutes(value: string): number | null {
  const match = /^([+-])?(P.+)$/i.exec(value.trim())
  if (!match) return null

  const duration = Duration.fromISO(match[2].toUpperCase())
  if (!duration.isValid) return null

  const minutes = Math.round(duration.as('minutes'))
  return match[1] === '-' && minutes !== 0 ? -minutes : minutes
}

/**
 * Current instant as an iCalendar UTC value, e.g. for DTSTAMP.
 */
export function utcStamp(now: Date): string {
  return formatTime(DateTime.fromJSDate(now), 'utc')
}

/**
 * Ensure start/end share a form and end does not precede start.
 */
export function assertTimeOrder(start: EventTime, end: EventTime, timezone: string | null): void {
  const startIsDate = timeForm(start) === 'date'
  if (startIsDate !== (timeForm(end) === 'date')) {
    throw new ValidationError(
      `Start "${start}" and end "${end}" must both be dates (all-day) or both date-times`,
    )
  }

  const startAt = toInstant(start, timezone)
  const endAt = toInstant(end, timezone)
  if (startIsDate ? endAt <= startAt : endAt < startAt) {
    throw new ValidationError(`End "${end}" must be after start "${start}"`)
  }
}
