/**
 * CalDAV Client Implementation
 *
 * Implements CalendarRepository using tsdav for CalDAV transport. Calendar
 * text is built and read by the ical encoder/decoder; recurring events are
 * matched against time windows with ical-expander.
 *
 * tsdav cannot fetch an object by UID, so UID operations query a bounded
 * window around now and scan the decoded events.
 */

import { createDAVClient, type DAVCalendar, type DAVCalendarObject } from 'tsdav'
import { DateTime } from 'luxon'
import { pino, type Logger } from 'pino'
import { randomUUID } from 'node:crypto'
import {
  assertTimeOrder,
  formatTime,
  minutesBetween,
  parseTimeInput,
  shiftTime,
  timeForm,
  toDateTime,
  toInstant,
  utcStamp,
} from './datetime.js'
import { NotFoundError, TransportError, ValidationError, isCalendarError } from './errors.js'
import { decodeCalendar, findMasterEvent, type DecodedEvent } from './ical/decoder.js'
import { encodeCalendar, formatRecurrence, replaceEvent } from './ical/encoder.js'
import { selectProvider, type ProviderProfile } from './providers.js'
import {
  normalizeAttendee,
  normalizeCategories,
  normalizePriority,
  normalizeRecurrence,
  normalizeReminder,
  normalizeStatus,
} from './validation.js'
import { isInWindow, type TimeWindow } from './window.js'
import type {
  CalDAVTransport,
  CalendarEvent,
  CalendarHealth,
  CalendarInfo,
  CalendarRepository,
  ConnectionSettings,
  CreateEventInput,
  CreatedEvent,
  DeletedEvent,
  EventTime,
  GetEventsOptions,
  SearchEventsOptions,
  SearchField,
  UpdateEventInput,
} from './types.js'

/** UID lookups scan this many days either side of now */
export const LOOKUP_WINDOW_DAYS = 365

const DEFAULT_WINDOW_DAYS = 7
const DEFAULT_START_HOUR = 14
const DEFAULT_DURATION_HOURS = 1
const UID_DOMAIN = 'caldav-mcp'
const SEARCH_FIELDS: SearchField[] = ['title', 'description', 'location', 'attendees']

export interface CalDAVClientOptions {
  /** Opens the transport; defaults to tsdav's createDAVClient */
  connect?: (settings: ConnectionSettings) => Promise<CalDAVTransport>
  logger?: Logger
  /** Clock, for defaults and timestamps */
  now?: () => Date
}

interface LocatedEvent {
  object: DAVCalendarObject
  data: string
  decoded: DecodedEvent
}

async function connectWithTsdav(settings: ConnectionSettings): Promise<CalDAVTransport> {
  return createDAVClient({
    serverUrl: settings.url,
    credentials: {
      username: settings.username,
      password: settings.password,
    },
    authMethod: 'Basic',
    defaultAccountType: 'caldav',
  })
}

function calendarName(calendar: DAVCalendar): string {
  // displayName can be string or object
  if (typeof calendar.displayName === 'string' && calendar.displayName) {
    return calendar.displayName
  }
  const urlParts = calendar.url.replace(/\/$/, '').split('/')
  return urlParts[urlParts.length - 1] ?? calendar.url
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * CalDAV-based implementation of CalendarRepository
 */
export class CalDAVClient implements CalendarRepository {
  readonly provider: ProviderProfile
  private readonly settings: ConnectionSettings
  private readonly openTransport: (settings: ConnectionSettings) => Promise<CalDAVTransport>
  private readonly logger: Logger
  private readonly now: () => Date
  private transport: CalDAVTransport | null = null
  private pending: Promise<CalDAVTransport> | null = null

  constructor(settings: ConnectionSettings, options: CalDAVClientOptions = {}) {
    this.settings = settings
    this.provider = selectProvider(settings.url)
    this.openTransport = options.connect ?? connectWithTsdav
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ component: 'caldav' })
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Open the connection. Concurrent and repeated calls share one attempt.
   */
  async connect(): Promise<void> {
    await this.getTransport()
  }

  private async getTransport(): Promise<CalDAVTransport> {
    if (this.transport) {
      return this.transport
    }

    if (!this.pending) {
      this.logger.info({ url: this.settings.url, provider: this.provider.name }, 'Connecting')
      this.pending = this.openTransport(this.settings).then(
        (transport) => {
          this.transport = transport
          this.pending = null
          return transport
        },
        (err: unknown) => {
          this.pending = null
          throw this.transportError(`Could not connect to ${this.settings.url}`, err)
        },
      )
    }

    return this.pending
  }

  /**
   * Drop the connection. A later call reconnects.
   */
  close(): void {
    this.transport = null
    this.pending = null
  }

  private transportError(message: string, cause?: unknown, status?: number): TransportError {
    const parts = [cause === undefined ? message : `${message}: ${errorMessage(cause)}`]
    if (this.provider.transportHint) {
      parts.push(this.provider.transportHint)
    }
    return new TransportError(parts.join('. '), status, { cause })
  }

  /**
   * Run a transport call, wrapping library failures in TransportError.
   */
  private async request<T>(
    operation: string,
    call: (transport: CalDAVTransport) => Promise<T>,
  ): Promise<T> {
    const transport = await this.getTransport()
    try {
      return await call(transport)
    } catch (err) {
      if (isCalendarError(err)) throw err
      throw this.transportError(`${operation} failed`, err)
    }
  }

  private assertOk(response: Response, operation: string): void {
    if (response.ok) return
    if (response.status === 412) {
      throw new TransportError(
        `${operation} failed: the event was modified concurrently on the server (HTTP 412); fetch it again and retry`,
        412,
      )
    }
    throw this.transportError(
      `${operation} failed with HTTP ${response.status} ${response.statusText}`.trim(),
      undefined,
      response.status,
    )
  }

  private async fetchDAVCalendars(): Promise<DAVCalendar[]> {
    return this.request('Listing calendars', (transport) => transport.fetchCalendars())
  }

  private async resolveCalendar(index: number): Promise<DAVCalendar> {
    const calendars = await this.fetchDAVCalendars()
    if (calendars.length === 0) {
      throw new NotFoundError('No calendars found for this account')
    }
    const calendar = Number.isInteger(index) && index >= 0 ? calendars[index] : undefined
    if (!calendar) {
      throw new NotFoundError(
        `Calendar index ${index} is out of range (${calendars.length} calendar${calendars.length === 1 ? '' : 's'} available)`,
      )
    }
    return calendar
  }

  private async fetchObjects(calendar: DAVCalendar, window: TimeWindow): Promise<DAVCalendarObject[]> {
    return this.request('Fetching events', (transport) =>
      transport.fetchCalendarObjects({
        calendar,
        timeRange: {
          start: window.from.toISOString(),
          end: window.to.toISOString(),
        },
      }),
    )
  }

  private decodeObject(object: DAVCalendarObject): DecodedEvent[] {
    if (typeof object.data !== 'string' || !object.data) return []

    const decoded = decodeCalendar(object.data)
    for (const failure of decoded.failures) {
      this.logger.debug({ url: object.url, uid: failure.uid }, `Skipping event: ${failure.reason}`)
    }
    return decoded.events.filter((entry) => !entry.isOverride)
  }

  /**
   * Find the stored object holding the event with this UID.
   */
  private async locate(uid: string, calendarIndex: number): Promise<LocatedEvent> {
    const calendar = await this.resolveCalendar(calendarIndex)
    const now = DateTime.fromJSDate(this.now())
    const window: TimeWindow = {
      from: now.minus({ days: LOOKUP_WINDOW_DAYS }).toJSDate(),
      to: now.plus({ days: LOOKUP_WINDOW_DAYS }).toJSDate(),
    }

    const objects = await this.fetchObjects(calendar, window)
    for (const object of objects) {
      if (typeof object.data !== 'string') continue
      const decoded = findMasterEvent(decodeCalendar(object.data), uid)
      if (decoded) {
        return { object, data: object.data, decoded }
      }
    }

    throw new NotFoundError(
      `Event with UID "${uid}" not found within ${LOOKUP_WINDOW_DAYS} days of today`,
    )
  }

  private today(): DateTime {
    return DateTime.fromJSDate(this.now()).startOf('day')
  }

  private async eventsBetween(
    calendarIndex: number,
    window: TimeWindow,
    includeAllDay: boolean,
  ): Promise<CalendarEvent[]> {
    const calendar = await this.resolveCalendar(calendarIndex)
    const objects = await this.fetchObjects(calendar, window)

    const events: CalendarEvent[] = []
    for (const object of objects) {
      for (const { event } of this.decodeObject(object)) {
        if (!includeAllDay && event.allDay) continue
        if (typeof object.data === 'string' && isInWindow(event, object.data, window, this.logger)) {
          events.push(event)
        }
      }
    }

    // Sort by start time
    events.sort((a, b) => toInstant(a.start, a.timezone) - toInstant(b.start, b.timezone))
    return events
  }

  // ─── CalendarRepository Implementation ───

  async listCalendars(): Promise<CalendarInfo[]> {
    const calendars = await this.fetchDAVCalendars()
    return calendars.map((calendar, index) => ({
      index,
      name: calendarName(calendar),
      url: calendar.url,
    }))
  }

  async createEvent(input: CreateEventInput, calendarIndex = 0): Promise<CreatedEvent> {
    const title = input.title.trim()
    if (!title) {
      throw new ValidationError('Event title is required')
    }

    const now = this.now()
    const start = input.start
      ? parseTimeInput(input.start, 'start_time')
      : formatTime(
          DateTime.fromJSDate(now)
            .plus({ days: 1 })
            .set({ hour: DEFAULT_START_HOUR, minute: 0, second: 0, millisecond: 0 }),
          'local',
        )
    const allDay = timeForm(start) === 'date'
    const end = input.end
      ? parseTimeInput(input.end, 'end_time')
      : defaultEnd(start, input.durationHours)

    assertTimeOrder(start, end, null)

    const recurrence = input.recurrence ? normalizeRecurrence(input.recurrence) : null
    const stamp = utcStamp(now)

    const event: CalendarEvent = {
      uid: `${randomUUID()}@${UID_DOMAIN}`,
      title: input.title,
      description: input.description ?? '',
      location: input.location ?? '',
      start,
      end,
      timezone: null,
      allDay,
      status: normalizeStatus(input.status ?? 'CONFIRMED'),
      sequence: 0,
      dtstamp: stamp,
      lastModified: stamp,
      created: stamp,
      categories: normalizeCategories(input.categories ?? []),
      priority: normalizePriority(input.priority ?? 0),
      attendees: (input.attendees ?? []).map(normalizeAttendee),
      reminders: (input.reminders ?? []).map((reminder) => normalizeReminder(reminder, input.title)),
      recurrence,
      rrule: recurrence ? formatRecurrence(recurrence) : null,
    }

    const calendar = await this.resolveCalendar(calendarIndex)
    const iCalString = encodeCalendar(event)

    const response = await this.request('Creating event', (transport) =>
      transport.createCalendarObject({
        calendar,
        filename: `${event.uid}.ics`,
        iCalString,
      }),
    )
    this.assertOk(response, 'Creating event')

    this.logger.info({ uid: event.uid, calendarIndex }, 'Event created')
    return { calendarIndex, calendar: calendarName(calendar), event }
  }

  async getEvents(options: GetEventsOptions = {}): Promise<CalendarEvent[]> {
    const from = options.start
      ? toDateTime(parseTimeInput(options.start, 'start_date'))
      : this.today()
    const to = options.end
      ? toDateTime(parseTimeInput(options.end, 'end_date'))
      : from.plus({ days: DEFAULT_WINDOW_DAYS })

    if (to.toMillis() <= from.toMillis()) {
      throw new ValidationError(
        `end_date must be after start_date (got ${from.toISO() ?? ''} to ${to.toISO() ?? ''})`,
      )
    }

    return this.eventsBetween(
      options.calendarIndex ?? 0,
      { from: from.toJSDate(), to: to.toJSDate() },
      options.includeAllDay ?? true,
    )
  }

  async getTodayEvents(calendarIndex = 0): Promise<CalendarEvent[]> {
    const from = this.today()
    return this.eventsBetween(
      calendarIndex,
      { from: from.toJSDate(), to: from.plus({ days: 1 }).toJSDate() },
      true,
    )
  }

  async getWeekEvents(calendarIndex = 0, startFromToday = true): Promise<CalendarEvent[]> {
    // Luxon weeks start on Monday
    const from = startFromToday ? this.today() : this.today().startOf('week')
    return this.eventsBetween(
      calendarIndex,
      { from: from.toJSDate(), to: from.plus({ days: DEFAULT_WINDOW_DAYS }).toJSDate() },
      true,
    )
  }

  async getEventByUid(uid: string, calendarIndex = 0): Promise<CalendarEvent> {
    const located = await this.locate(uid, calendarIndex)
    return located.decoded.event
  }

  async updateEvent(
    uid: string,
    changes: UpdateEventInput,
    calendarIndex = 0,
  ): Promise<CalendarEvent> {
    const located = await this.locate(uid, calendarIndex)
    const current = located.decoded.event
    const updated: CalendarEvent = { ...current }

    if (changes.title !== undefined) {
      if (!changes.title.trim()) {
        throw new ValidationError('Event title cannot be empty')
      }
      updated.title = changes.title
    }
    if (changes.description !== undefined) updated.description = changes.description
    if (changes.location !== undefined) updated.location = changes.location

    if (changes.start !== undefined) {
      updated.start = parseTimeInput(changes.start, 'start')
      updated.allDay = timeForm(updated.start) === 'date'
    }
    if (changes.end !== undefined) {
      updated.end = parseTimeInput(changes.end, 'end')
    } else if (changes.start !== undefined) {
      updated.end = movedEnd(current, updated.start)
    }

    if (changes.status !== undefined) updated.status = normalizeStatus(changes.status)
    if (changes.categories !== undefined) updated.categories = normalizeCategories(changes.categories)
    if (changes.priority !== undefined) updated.priority = normalizePriority(changes.priority)
    if (changes.attendees !== undefined) updated.attendees = changes.attendees.map(normalizeAttendee)
    if (changes.reminders !== undefined) {
      updated.reminders = changes.reminders.map((reminder) =>
        normalizeReminder(reminder, updated.title),
      )
    }

    if (changes.recurrence === null) {
      updated.recurrence = null
      updated.rrule = null
    } else if (changes.recurrence !== undefined) {
      updated.recurrence = normalizeRecurrence(changes.recurrence)
      updated.rrule = formatRecurrence(updated.recurrence)
    }

    assertTimeOrder(updated.start, updated.end, updated.timezone)

    const stamp = utcStamp(this.now())
    updated.sequence = current.sequence + 1
    updated.lastModified = stamp
    updated.dtstamp = stamp

    const data = replaceEvent(located.data, updated, located.decoded.preserved)
    const response = await this.request('Updating event', (transport) =>
      transport.updateCalendarObject({
        calendarObject: { ...located.object, data },
      }),
    )
    this.assertOk(response, 'Updating event')

    this.logger.info({ uid, calendarIndex, sequence: updated.sequence }, 'Event updated')
    return updated
  }

  async deleteEvent(uid: string, calendarIndex = 0): Promise<DeletedEvent> {
    const located = await this.locate(uid, calendarIndex)

    const response = await this.request('Deleting event', (transport) =>
      transport.deleteCalendarObject({ calendarObject: located.object }),
    )
    this.assertOk(response, 'Deleting event')

    this.logger.info({ uid, calendarIndex }, 'Event deleted')
    return { uid, calendarIndex }
  }

  async searchEvents(options: SearchEventsOptions): Promise<CalendarEvent[]> {
    if (!options.start || !options.end) {
      throw new ValidationError('Search requires both start_date and end_date')
    }

    const fields = options.fields && options.fields.length > 0 ? options.fields : SEARCH_FIELDS
    const query = options.query.trim().toLowerCase()

    const events = await this.getEvents({
      calendarIndex: options.calendarIndex,
      start: options.start,
      end: options.end,
    })

    if (!query) return events
    return events.filter((event) => fields.some((field) => matchesField(event, field, query)))
  }

  /**
   * Check if the server is reachable
   */
  async checkHealth(): Promise<CalendarHealth> {
    const start = Date.now()
    try {
      await this.fetchDAVCalendars()
      return {
        reachable: true,
        provider: this.provider.name,
        latencyMs: Date.now() - start,
      }
    } catch (err) {
      return {
        reachable: false,
        provider: this.provider.name,
        error: errorMessage(err),
      }
    }
  }
}

function defaultEnd(start: EventTime, durationHours: number | undefined): EventTime {
  if (durationHours !== undefined && (!Number.isFinite(durationHours) || durationHours <= 0)) {
    throw new ValidationError(`duration_hours must be positive, got ${durationHours}`)
  }

  if (timeForm(start) === 'date') {
    const days = durationHours === undefined ? 1 : Math.max(1, Math.ceil(durationHours / 24))
    return shiftTime(start, { days })
  }

  return shiftTime(start, {
    minutes: Math.round((durationHours ?? DEFAULT_DURATION_HOURS) * 60),
  })
}

/**
 * End for a moved start with no explicit end: keep the duration when the
 * start keeps its form, otherwise fall back to the default length.
 */
function movedEnd(current: CalendarEvent, start: EventTime): EventTime {
  if ((timeForm(start) === 'date') !== current.allDay) {
    return defaultEnd(start, undefined)
  }
  // Mixed forms (zone-local start, UTC end) only compare as instants
  const minutes =
    timeForm(current.start) === timeForm(current.end)
      ? minutesBetween(current.start, current.end)
      : Math.round(
          (toInstant(current.end, current.timezone) - toInstant(current.start, current.timezone)) /
            60_000,
        )
  return current.allDay
    ? shiftTime(start, { days: Math.max(1, Math.round(minutes / 1440)) })
    : shiftTime(start, { minutes })
}

function matchesField(event: CalendarEvent, field: SearchField, query: string): boolean {
  switch (field) {
    case 'title':
      return event.title.toLowerCase().includes(query)
    case 'description':
      return event.description.toLowerCase().includes(query)
    case 'location':
      return event.location.toLowerCase().includes(query)
    case 'attendees':
      return event.attendees.some(
        (attendee) =>
          attendee.email.toLowerCase().includes(query) ||
          (attendee.name?.toLowerCase().includes(query) ?? false),
      )
  }
}

/**
 * Create a CalDAVClient instance
 */
export function createCalDAVClient(
  settings: ConnectionSettings,
  options?: CalDAVClientOptions,
): CalDAVClient {
  return new CalDAVClient(settings, options)
}
