/**
 * In-process CalDAV stand-in
 *
 * Stores calendar objects with ETags and answers the slice of tsdav that
 * CalDAVClient uses. Time-range queries behave like a server REPORT:
 * recurring events are always returned, others only when they overlap.
 */

import type { DAVCalendar, DAVCalendarObject } from 'tsdav'
import type { CalDAVTransport } from '../../src/calendar/types.js'
import { decodeCalendar } from '../../src/calendar/ical/decoder.js'
import { toInstant } from '../../src/calendar/datetime.js'

interface StoredObject {
  calendarUrl: string
  data: string
  etag: string
}

export interface RecordedRequest {
  method: 'PROPFIND' | 'REPORT' | 'PUT' | 'DELETE'
  url: string
  timeRange?: { start: string; end: string }
  ifMatch?: string
}

export class FakeCalDAVServer implements CalDAVTransport {
  readonly calendars: DAVCalendar[]
  readonly objects = new Map<string, StoredObject>()
  readonly requests: RecordedRequest[] = []
  private nextEtag = 1
  private failure: Error | null = null

  constructor(names: string[] = ['Personal']) {
    this.calendars = names.map((displayName, index) => ({
      url: `https://caldav.example.test/calendars/test-user/cal-${index}/`,
      displayName,
    }))
  }

  /** Make the next transport call throw */
  failNextWith(error: Error): void {
    this.failure = error
  }

  /** Store an object directly, as if another client had created it */
  seed(calendarIndex: number, filename: string, data: string): string {
    const calendar = this.calendars[calendarIndex]
    if (!calendar) throw new Error(`No calendar ${calendarIndex}`)
    const url = `${calendar.url}${filename}`
    this.objects.set(url, { calendarUrl: calendar.url, data, etag: this.newEtag() })
    return url
  }

  objectsIn(calendarIndex: number): Array<{ url: string; data: string }> {
    const calendar = this.calendars[calendarIndex]
    return [...this.objects.entries()]
      .filter(([, object]) => object.calendarUrl === calendar?.url)
      .map(([url, object]) => ({ url, data: object.data }))
  }

  /** Simulate another client editing the object */
  touch(url: string): void {
    const object = this.objects.get(url)
    if (object) object.etag = this.newEtag()
  }

  private newEtag(): string {
    return `"etag-${this.nextEtag++}"`
  }

  private checkFailure(): void {
    const failure = this.failure
    if (failure) {
      this.failure = null
      throw failure
    }
  }

  async fetchCalendars(): Promise<DAVCalendar[]> {
    this.checkFailure()
    this.requests.push({ method: 'PROPFIND', url: 'https://caldav.example.test/calendars/test-user/' })
    return this.calendars
  }

  async fetchCalendarObjects(params: {
    calendar: DAVCalendar
    timeRange?: { start: string; end: string }
  }): Promise<DAVCalendarObject[]> {
    this.checkFailure()
    this.requests.push({ method: 'REPORT', url: params.calendar.url, timeRange: params.timeRange })

    const results: DAVCalendarObject[] = []
    for (const [url, object] of this.objects) {
      if (object.calendarUrl !== params.calendar.url) continue
      if (params.timeRange && !matchesRange(object.data, params.timeRange)) continue
      results.push({ url, etag: object.etag, data: object.data })
    }
    return results
  }

  async createCalendarObject(params: {
    calendar: DAVCalendar
    filename: string
    iCalString: string
  }): Promise<Response> {
    this.checkFailure()
    const url = `${params.calendar.url}${params.filename}`
    this.requests.push({ method: 'PUT', url })

    if (this.objects.has(url)) {
      return new Response('Precondition Failed', { status: 412, statusText: 'Precondition Failed' })
    }
    this.objects.set(url, {
      calendarUrl: params.calendar.url,
      data: params.iCalString,
      etag: this.newEtag(),
    })
    return new Response(null, { status: 201, statusText: 'Created' })
  }

  async updateCalendarObject(params: { calendarObject: DAVCalendarObject }): Promise<Response> {
    this.checkFailure()
    const { url, etag, data } = params.calendarObject
    this.requests.push({ method: 'PUT', url, ifMatch: etag })

    const stored = this.objects.get(url)
    if (!stored) {
      return new Response('Not Found', { status: 404, statusText: 'Not Found' })
    }
    if (etag !== stored.etag) {
      return new Response('Precondition Failed', { status: 412, statusText: 'Precondition Failed' })
    }
    stored.data = typeof data === 'string' ? data : String(data)
    stored.etag = this.newEtag()
    return new Response(null, { status: 204, statusText: 'No Content' })
  }

  async deleteCalendarObject(params: { calendarObject: DAVCalendarObject }): Promise<Response> {
    this.checkFailure()
    const { url, etag } = params.calendarObject
    this.requests.push({ method: 'DELETE', url, ifMatch: etag })

    const stored = this.objects.get(url)
    if (!stored) {
      return new Response('Not Found', { status: 404, statusText: 'Not Found' })
    }
    if (etag !== stored.etag) {
      return new Response('Precondition Failed', { status: 412, statusText: 'Precondition Failed' })
    }
    this.objects.delete(url)
    return new Response(null, { status: 204, statusText: 'No Content' })
  }
}

function matchesRange(data: string, range: { start: string; end: string }): boolean {
  const from = Date.parse(range.start)
  const to = Date.parse(range.end)

  return decodeCalendar(data).events.some(({ event }) => {
    if (event.rrule) return true
    const start = toInstant(event.start, event.timezone)
    const end = toInstant(event.end, event.timezone)
    return start < to && Math.max(end, start + 1) > from
  })
}

/** Build a one-event calendar object from VEVENT property lines */
export function vcalendar(...eventLines: string[]): string {
  return [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//Example Corp//Test Calendar//EN',
    'BEGIN:VEVENT',
    ...eventLines,
    'END:VEVENT',
    'END:VCALENDAR',
    '',
  ].join('\r\n')
}
