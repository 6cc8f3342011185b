/**
 * VEVENT encoder
 *
 * Renders CalendarEvent fields into iCalendar text. Free text goes through
 * escapeText; enumerated values are checked before anything is emitted.
 *
 * @module calendar/ical/encoder
 */

import { ValidationError } from '../errors.js'
import { timeForm, toICalValue } from '../datetime.js'
import {
  isAttendeeStatus,
  isEventStatus,
  isFrequency,
  isReminderAction,
} from '../validation.js'
import type { Attendee, CalendarEvent, EventTime, RecurrenceRule, Reminder } from '../types.js'
import { escapeText, foldLine, formatParamValue, parseContentLine, unfoldLines } from './text.js'

export const PRODID = '-//caldav-mcp//calendar//EN'

/**
 * Render a recurrence rule as an RRULE value (without the `RRULE:` prefix).
 */
export function formatRecurrence(rule: RecurrenceRule): string {
  if (!rule.frequency || !isFrequency(rule.frequency)) {
    throw new ValidationError(`Invalid recurrence frequency "${rule.frequency ?? ''}"`)
  }

  const parts = [`FREQ=${rule.frequency}`]

  if (rule.interval !== undefined && rule.interval > 1) {
    parts.push(`INTERVAL=${rule.interval}`)
  }
  if (rule.count !== undefined) {
    parts.push(`COUNT=${rule.count}`)
  }
  if (rule.until !== undefined) {
    parts.push(`UNTIL=${toICalValue(rule.until)}`)
  }
  if (rule.byDay && rule.byDay.length > 0) {
    parts.push(`BYDAY=${rule.byDay.join(',')}`)
  }
  if (rule.byMonthDay && rule.byMonthDay.length > 0) {
    parts.push(`BYMONTHDAY=${rule.byMonthDay.join(',')}`)
  }
  if (rule.byMonth && rule.byMonth.length > 0) {
    parts.push(`BYMONTH=${rule.byMonth.join(',')}`)
  }

  return parts.join(';')
}

/**
 * Render categories as a single escaped, comma-separated CATEGORIES value.
 */
export function formatCategories(categories: string[]): string {
  return categories.map(escapeText).join(',')
}

export function formatAttendee(attendee: Attendee): string {
  const status = attendee.status ?? 'NEEDS-ACTION'
  if (!isAttendeeStatus(status)) {
    throw new ValidationError(`Invalid attendee status "${status}"`)
  }
  if (!attendee.email.includes('@')) {
    throw new ValidationError(`Invalid attendee email "${attendee.email}"`)
  }

  const params: string[] = []
  if (attendee.name) {
    params.push(`CN=${formatParamValue(attendee.name)}`)
  }
  params.push('RSVP=TRUE', `PARTSTAT=${status}`)

  return `ATTENDEE;${params.join(';')}:mailto:${attendee.email}`
}

function formatTrigger(minutesBefore: number): string {
  return minutesBefore >= 0 ? `-PT${minutesBefore}M` : `PT${-minutesBefore}M`
}

/**
 * Render a reminder as a VALARM block.
 *
 * @param title - Event title, used when the reminder has no text of its own
 */
export function formatAlarm(reminder: Reminder, title: string): string[] {
  const action = reminder.action ?? 'DISPLAY'
  if (!isReminderAction(action)) {
    throw new ValidationError(`Invalid reminder action "${action}"`)
  }

  const lines = [
    'BEGIN:VALARM',
    `ACTION:${action}`,
    `TRIGGER:${formatTrigger(reminder.minutesBefore)}`,
    `DESCRIPTION:${escapeText(reminder.description ?? title)}`,
  ]

  if (action === 'EMAIL') {
    lines.push(`SUMMARY:${escapeText(title)}`)
    if (reminder.emailTo) {
      lines.push(`ATTENDEE:mailto:${reminder.emailTo}`)
    }
  }

  lines.push(...(reminder.preserved ?? []))
  lines.push('END:VALARM')
  return lines
}

function formatTimeProperty(name: string, time: EventTime, timezone: string | null): string {
  const form = timeForm(time)
  if (form === 'date') {
    return `${name};VALUE=DATE:${toICalValue(time)}`
  }
  if (form === 'local' && timezone) {
    return `${name};TZID=${formatParamValue(timezone)}:${toICalValue(time)}`
  }
  return `${name}:${toICalValue(time)}`
}

/**
 * Render the VEVENT block (unfolded lines).
 *
 * @param preserved - Unrecognised lines from a previously decoded copy of the
 *   event, re-emitted verbatim before the alarms
 */
export function encodeEvent(event: CalendarEvent, preserved: string[] = []): string[] {
  if (!isEventStatus(event.status)) {
    throw new ValidationError(`Invalid event status "${event.status}"`)
  }
  if (!Number.isInteger(event.priority) || event.priority < 0 || event.priority > 9) {
    throw new ValidationError(`Priority must be an integer from 0 to 9, got ${event.priority}`)
  }

  const lines = ['BEGIN:VEVENT', `UID:${event.uid}`]

  if (event.dtstamp) lines.push(`DTSTAMP:${toICalValue(event.dtstamp)}`)
  if (event.created) lines.push(`CREATED:${toICalValue(event.created)}`)
  if (event.lastModified) lines.push(`LAST-MODIFIED:${toICalValue(event.lastModified)}`)

  lines.push(formatTimeProperty('DTSTART', event.start, event.timezone))
  lines.push(formatTimeProperty('DTEND', event.end, event.timezone))

  lines.push(`SUMMARY:${escapeText(event.title)}`)
  if (event.description) {
    lines.push(`DESCRIPTION:${escapeText(event.description)}`)
  }
  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`)
  }

  lines.push(`STATUS:${event.status}`)
  lines.push(`SEQUENCE:${event.sequence}`)

  if (event.priority > 0) {
    lines.push(`PRIORITY:${event.priority}`)
  }
  if (event.categories.length > 0) {
    lines.push(`CATEGORIES:${formatCategories(event.categories)}`)
  }

  const rrule = event.recurrence ? formatRecurrence(event.recurrence) : event.rrule
  if (rrule) {
    lines.push(`RRULE:${rrule}`)
  }

  for (const attendee of event.attendees) {
    lines.push(formatAttendee(attendee))
  }

  lines.push(...preserved)

  for (const reminder of event.reminders) {
    lines.push(...formatAlarm(reminder, event.title))
  }

  lines.push('END:VEVENT')
  return lines
}

function serialize(lines: string[]): string {
  return lines.map(foldLine).join('\r\n') + '\r\n'
}

/**
 * Render a complete calendar object holding a single event.
 */
export function encodeCalendar(event: CalendarEvent, preserved: string[] = []): string {
  return serialize([
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODID}`,
    'CALSCALE:GREGORIAN',
    ...encodeEvent(event, preserved),
    'END:VCALENDAR',
  ])
}

/**
 * Replace the master VEVENT of `event.uid` inside an existing calendar object.
 * Everything else (VTIMEZONE, RECURRENCE-ID overrides, calendar properties)
 * is kept as stored. Falls back to a fresh object when no master is found.
 */
export function replaceEvent(
  calendarText: string,
  event: CalendarEvent,
  preserved: string[] = [],
): string {
  const lines = unfoldLines(calendarText)
  const output: string[] = []
  let replaced = false
  let block: string[] | null = null
  let depth = 0

  for (const line of lines) {
    const upper = line.toUpperCase()

    if (block) {
      block.push(line)
      if (upper.startsWith('BEGIN:')) depth++
      if (upper.startsWith('END:')) depth--
      if (depth === 0) {
        if (!replaced && isMasterOf(block, event.uid)) {
          output.push(...encodeEvent(event, preserved))
          replaced = true
        } else {
          output.push(...block)
        }
        block = null
      }
      continue
    }

    if (upper === 'BEGIN:VEVENT') {
      block = [line]
      depth = 1
      continue
    }

    output.push(line)
  }

  if (!replaced) {
    return encodeCalendar(event, preserved)
  }

  return serialize(output)
}

function isMasterOf(block: string[], uid: string): boolean {
  let matchesUid = false
  let depth = 0

  for (const raw of block) {
    const line = parseContentLine(raw)
    if (!line) continue
    if (line.name === 'BEGIN') depth++
    if (line.name === 'END') depth--
    // Only properties of the VEVENT itself, not of nested VALARMs
    if (depth !== 1) continue
    if (line.name === 'RECURRENCE-ID') return false
    if (line.name === 'UID' && line.value.trim() === uid) matchesUid = true
  }

  return matchesUid
}
