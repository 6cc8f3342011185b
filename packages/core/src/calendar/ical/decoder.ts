/**
 * VEVENT decoder
 *
 * Extracts CalendarEvent fields from calendar data returned by the server.
 * Input may come from any calendar software, so nothing here throws: optional
 * fields fall back to defaults and only a missing UID or DTSTART makes an
 * event undecodable.
 *
 * @module calendar/ical/decoder
 */

import {
  durationToMinutes,
  formatTime,
  fromICalValue,
  shiftTime,
  timeForm,
  toDateTime,
} from '../datetime.js'
import {
  isAttendeeStatus,
  isEventStatus,
  isFrequency,
  isReminderAction,
} from '../validation.js'
import type {
  Attendee,
  AttendeeStatus,
  CalendarEvent,
  EventTime,
  RecurrenceRule,
  Reminder,
} from '../types.js'
import { parseContentLine, splitEscapedList, unescapeText, unfoldLines, type ContentLine } from './text.js'

export interface DecodedEvent {
  event: CalendarEvent
  /** Unrecognised lines, re-emitted when the event is encoded again */
  preserved: string[]
  /** True for RECURRENCE-ID instances overriding a recurring master */
  isOverride: boolean
}

export interface DecodeFailure {
  uid: string | null
  reason: string
}

export interface DecodedCalendar {
  events: DecodedEvent[]
  failures: DecodeFailure[]
}

/** Properties consumed by decodeEvent; anything else is preserved */
const KNOWN_PROPERTIES = new Set([
  'UID',
  'DTSTAMP',
  'CREATED',
  'LAST-MODIFIED',
  'DTSTART',
  'DTEND',
  'DURATION',
  'SUMMARY',
  'DESCRIPTION',
  'LOCATION',
  'STATUS',
  'SEQUENCE',
  'PRIORITY',
  'CATEGORIES',
  'RRULE',
  'ATTENDEE',
])

interface RawComponent {
  name: string
  properties: ContentLine[]
  children: RawComponent[]
  /** Original unfolded lines, BEGIN/END included */
  lines: string[]
}

/**
 * Split unfolded lines into a component tree. Malformed nesting is tolerated:
 * stray END lines are ignored and unterminated components are closed at EOF.
 */
function parseComponents(lines: string[]): RawComponent[] {
  const roots: RawComponent[] = []
  const stack: RawComponent[] = []

  for (const raw of lines) {
    const line = parseContentLine(raw)
    if (!line) continue

    for (const open of stack) open.lines.push(raw)

    if (line.name === 'BEGIN') {
      const component: RawComponent = {
        name: line.value.trim().toUpperCase(),
        properties: [],
        children: [],
        lines: [raw],
      }
      const parent = stack[stack.length - 1]
      if (parent) parent.children.push(component)
      else roots.push(component)
      stack.push(component)
    } else if (line.name === 'END') {
      const name = line.value.trim().toUpperCase()
      const index = stack.map((c) => c.name).lastIndexOf(name)
      if (index >= 0) stack.length = index
    } else {
      const current = stack[stack.length - 1]
      if (current) current.properties.push(line)
    }
  }

  return roots
}

function first(component: RawComponent, name: string): ContentLine | undefined {
  return component.properties.find((p) => p.name === name)
}

function textOf(component: RawComponent, name: string): string {
  const property = first(component, name)
  return property ? unescapeText(property.value) : ''
}

function integerOf(component: RawComponent, name: string, min: number, max: number): number {
  const property = first(component, name)
  if (!property) return 0
  const value = Number.parseInt(property.value.trim(), 10)
  return Number.isInteger(value) && value >= min && value <= max ? value : 0
}

function utcOf(component: RawComponent, name: string): string | null {
  const property = first(component, name)
  if (!property) return null
  const decoded = fromICalValue(property.value, property.params)
  return decoded && timeForm(decoded.time) === 'utc' ? decoded.time : null
}

function parseList(value: string, parse: (item: string) => number): number[] | null {
  const items = value.split(',').map((item) => parse(item.trim()))
  return items.every((item) => Number.isInteger(item)) ? items : null
}

/**
 * Parse an RRULE value into the structured form. Returns null when the rule
 * uses parts the structured form cannot express; the raw value is kept then.
 */
export function parseRecurrence(value: string): RecurrenceRule | null {
  const parts = new Map<string, string>()
  for (const part of value.split(';')) {
    const eq = part.indexOf('=')
    if (eq <= 0) continue
    parts.set(part.slice(0, eq).trim().toUpperCase(), part.slice(eq + 1).trim())
  }

  const frequency = parts.get('FREQ')?.toUpperCase()
  if (!frequency || !isFrequency(frequency)) return null

  const rule: RecurrenceRule = { frequency }

  for (const [key, raw] of parts) {
    switch (key) {
      case 'FREQ':
        break
      case 'INTERVAL': {
        const interval = Number.parseInt(raw, 10)
        if (!Number.isInteger(interval) || interval < 1) return null
        if (interval > 1) rule.interval = interval
        break
      }
      case 'COUNT': {
        const count = Number.parseInt(raw, 10)
        if (!Number.isInteger(count) || count < 1) return null
        rule.count = count
        break
      }
      case 'UNTIL': {
        const until = fromICalValue(raw, {})
        if (!until) return null
        rule.until = until.time
        break
      }
      case 'BYDAY':
        rule.byDay = raw.split(',').map((day) => day.trim().toUpperCase())
        break
      case 'BYMONTHDAY': {
        const days = parseList(raw, (item) => Number.parseInt(item, 10))
        if (!days) return null
        rule.byMonthDay = days
        break
      }
      case 'BYMONTH': {
        const months = parseList(raw, (item) => Number.parseInt(item, 10))
        if (!months) return null
        rule.byMonth = months
        break
      }
      default:
        // WKST, BYSETPOS, BYHOUR, ... are outside the structured form
        return null
    }
  }

  return rule
}

export function parseAttendee(property: ContentLine): Attendee | null {
  const email = unescapeText(property.value)
    .trim()
    .replace(/^mailto:/i, '')
  if (!email) return null

  const partstat = property.params['PARTSTAT']?.toUpperCase() ?? ''
  const status: AttendeeStatus = isAttendeeStatus(partstat) ? partstat : 'NEEDS-ACTION'

  const attendee: Attendee = { email, status }
  const name = property.params['CN']
  if (name) attendee.name = name
  return attendee
}

function parseAlarm(component: RawComponent): Reminder | null {
  const action = first(component, 'ACTION')?.value.trim().toUpperCase() ?? ''
  const trigger = first(component, 'TRIGGER')
  if (!isReminderAction(action) || !trigger) return null

  // Absolute triggers (VALUE=DATE-TIME) and END-relative triggers stay unparsed
  if (trigger.params['VALUE'] || trigger.params['RELATED']?.toUpperCase() === 'END') return null

  const minutes = durationToMinutes(trigger.value)
  if (minutes === null) return null

  const reminder: Reminder = {
    minutesBefore: minutes === 0 ? 0 : -minutes,
    action,
  }

  const description = first(component, 'DESCRIPTION')
  if (description) reminder.description = unescapeText(description.value)

  // Lines the encoder writes itself from the fields above
  const consumed = new Set<ContentLine>([trigger])
  for (const name of ['ACTION', 'DESCRIPTION']) {
    const property = first(component, name)
    if (property) consumed.add(property)
  }

  if (action === 'EMAIL') {
    const recipient = first(component, 'ATTENDEE')
    if (recipient) {
      reminder.emailTo = unescapeText(recipient.value).trim().replace(/^mailto:/i, '')
      consumed.add(recipient)
    }
    const summary = first(component, 'SUMMARY')
    if (summary) consumed.add(summary)
  }

  const preserved = [
    ...component.properties
      .filter((property) => !consumed.has(property))
      .map((property) => property.raw),
    ...component.children.flatMap((child) => child.lines),
  ]
  if (preserved.length > 0) reminder.preserved = preserved

  return reminder
}

type DecodedTime = NonNullable<ReturnType<typeof fromICalValue>>

/**
 * DTEND may use another form than DTSTART, e.g. UTC against a TZID start.
 * A date against a date-time is unusable. A zone-local end in another zone
 * than the start is carried as UTC, since the event holds one zone.
 */
function alignEnd(end: DecodedTime, start: DecodedTime): EventTime | null {
  const endForm = timeForm(end.time)
  if ((endForm === 'date') !== (timeForm(start.time) === 'date')) return null
  if (endForm === 'local' && end.timezone !== start.timezone) {
    return formatTime(toDateTime(end.time, end.timezone), 'utc')
  }
  return end.time
}

/**
 * Decode a single VEVENT component.
 */
function decodeEvent(component: RawComponent): DecodedEvent | DecodeFailure {
  const uid = first(component, 'UID')?.value.trim() || null
  if (!uid) {
    return { uid: null, reason: 'VEVENT has no UID' }
  }

  const dtstart = first(component, 'DTSTART')
  const start = dtstart ? fromICalValue(dtstart.value, dtstart.params) : null
  if (!start) {
    return { uid, reason: 'VEVENT has no valid DTSTART' }
  }

  const allDay = timeForm(start.time) === 'date'
  const dtend = first(component, 'DTEND')
  const decodedEnd = dtend ? fromICalValue(dtend.value, dtend.params) : null
  let end = decodedEnd ? alignEnd(decodedEnd, start) : null

  if (!end) {
    const duration = first(component, 'DURATION')
    const minutes = duration ? durationToMinutes(duration.value) : null
    if (minutes !== null && minutes >= 0) {
      end = allDay
        ? shiftTime(start.time, { days: Math.max(1, Math.round(minutes / 1440)) })
        : shiftTime(start.time, { minutes })
    } else {
      end = allDay ? shiftTime(start.time, { days: 1 }) : shiftTime(start.time, { minutes: 60 })
    }
  }

  const statusValue = first(component, 'STATUS')?.value.trim().toUpperCase() ?? ''
  const rruleValue = first(component, 'RRULE')?.value.trim() || null

  const categories = component.properties
    .filter((p) => p.name === 'CATEGORIES')
    .flatMap((p) => splitEscapedList(p.value))

  const attendees = component.properties
    .filter((p) => p.name === 'ATTENDEE')
    .map(parseAttendee)
    .filter((a): a is Attendee => a !== null)

  const preserved: string[] = component.properties
    .filter((p) => !KNOWN_PROPERTIES.has(p.name) && p.name !== 'RECURRENCE-ID')
    .map((p) => p.raw)

  const reminders: Reminder[] = []
  for (const child of component.children) {
    const reminder = child.name === 'VALARM' ? parseAlarm(child) : null
    if (reminder) reminders.push(reminder)
    else preserved.push(...child.lines)
  }

  const event: CalendarEvent = {
    uid,
    title: textOf(component, 'SUMMARY'),
    description: textOf(component, 'DESCRIPTION'),
    location: textOf(component, 'LOCATION'),
    start: start.time,
    end,
    timezone: start.timezone,
    allDay,
    status: isEventStatus(statusValue) ? statusValue : 'CONFIRMED',
    sequence: integerOf(component, 'SEQUENCE', 0, Number.MAX_SAFE_INTEGER),
    dtstamp: utcOf(component, 'DTSTAMP'),
    lastModified: utcOf(component, 'LAST-MODIFIED'),
    created: utcOf(component, 'CREATED'),
    categories,
    priority: integerOf(component, 'PRIORITY', 0, 9),
    attendees,
    reminders,
    recurrence: rruleValue ? parseRecurrence(rruleValue) : null,
    rrule: rruleValue,
  }

  return {
    event,
    preserved,
    isOverride: first(component, 'RECURRENCE-ID') !== undefined,
  }
}

function isFailure(result: DecodedEvent | DecodeFailure): result is DecodeFailure {
  return 'reason' in result
}

/**
 * Decode every VEVENT in a calendar object.
 */
export function decodeCalendar(text: string): DecodedCalendar {
  const events: DecodedEvent[] = []
  const failures: DecodeFailure[] = []

  const visit = (components: RawComponent[]): void => {
    for (const component of components) {
      if (component.name === 'VEVENT') {
        const result = decodeEvent(component)
        if (isFailure(result)) failures.push(result)
        else events.push(result)
      } else if (component.name === 'VCALENDAR') {
        visit(component.children)
      }
    }
  }

  visit(parseComponents(unfoldLines(text)))
  return { events, failures }
}

/**
 * The master (non-override) event of a calendar object, if it has one.
 */
export function findMasterEvent(decoded: DecodedCalendar, uid?: string): DecodedEvent | undefined {
  return decoded.events.find(
    (entry) => !entry.isOverride && (uid === undefined || entry.event.uid === uid),
  )
}
