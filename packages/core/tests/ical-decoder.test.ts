import { describe, it, expect } from 'vitest'
import { decodeCalendar, findMasterEvent, parseRecurrence } from '../src/calendar/ical/decoder.js'
import { parseContentLine } from '../src/calendar/ical/text.js'

function lf(...lines: string[]): string {
  return lines.join('\n') + '\n'
}

describe('parseContentLine', () => {
  it('reads quoted parameters containing separators', () => {
    expect(parseContentLine('ATTENDEE;CN="Lee, Ann: PM";partstat=ACCEPTED:mailto:ann@example.com')).toEqual({
      name: 'ATTENDEE',
      params: { CN: 'Lee, Ann: PM', PARTSTAT: 'ACCEPTED' },
      value: 'mailto:ann@example.com',
      raw: 'ATTENDEE;CN="Lee, Ann: PM";partstat=ACCEPTED:mailto:ann@example.com',
    })
  })

  it('returns null without a separator', () => {
    expect(parseContentLine('garbage')).toBeNull()
  })
})

describe('decodeCalendar', () => {
  it('reads events written by other calendar software', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'PRODID:-//Other Vendor//EN',
      'BEGIN:VEVENT',
      'UID:foreign-1',
      'DTSTART:20250120T090000Z',
      'DURATION:PT45M',
      'SUMMARY:Design rev',
      ' iew',
      'ATTENDEE;CN="Lee, Ann";PARTSTAT=DELEGATED:MAILTO:ann@example.com',
      'ATTENDEE:mailto:bob@example.com',
      'PRIORITY:high',
      'SEQUENCE:x',
      'CATEGORIES:alpha,beta',
      'CATEGORIES:gamma',
      'X-CUSTOM;X-PARAM=1:value',
      'STATUS:tentative',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const decoded = decodeCalendar(text)
    expect(decoded.failures).toEqual([])
    expect(decoded.events).toEqual([
      {
        event: {
          uid: 'foreign-1',
          title: 'Design review',
          description: '',
          location: '',
          start: '2025-01-20T09:00:00Z',
          end: '2025-01-20T09:45:00Z',
          timezone: null,
          allDay: false,
          status: 'TENTATIVE',
          sequence: 0,
          dtstamp: null,
          lastModified: null,
          created: null,
          categories: ['alpha', 'beta', 'gamma'],
          priority: 0,
          attendees: [
            { email: 'ann@example.com', status: 'NEEDS-ACTION', name: 'Lee, Ann' },
            { email: 'bob@example.com', status: 'NEEDS-ACTION' },
          ],
          reminders: [],
          recurrence: null,
          rrule: null,
        },
        preserved: ['X-CUSTOM;X-PARAM=1:value'],
        isOverride: false,
      },
    ])
  })

  it('reports events without UID or DTSTART as failures and keeps the rest', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'DTSTART:20250120T090000Z',
      'SUMMARY:No uid',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:no-start',
      'SUMMARY:No start',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:ok',
      'DTSTART:20250120T090000Z',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const decoded = decodeCalendar(text)
    expect(decoded.failures).toEqual([
      { uid: null, reason: 'VEVENT has no UID' },
      { uid: 'no-start', reason: 'VEVENT has no valid DTSTART' },
    ])
    expect(decoded.events.map((entry) => entry.event.uid)).toEqual(['ok'])
  })

  it('defaults a missing end to one hour, or one day for all-day events', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:timed',
      'DTSTART:20250120T090000',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:all-day',
      'DTSTART;VALUE=DATE:20250131',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const events = decodeCalendar(text).events.map(({ event }) => [event.uid, event.end, event.allDay])
    expect(events).toEqual([
      ['timed', '2025-01-20T10:00:00', false],
      ['all-day', '2025-02-01', true],
    ])
  })

  it('reads reminders and keeps alarms it cannot represent', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:alarms',
      'DTSTART:20250120T090000Z',
      'SUMMARY:Review',
      'BEGIN:VALARM',
      'ACTION:EMAIL',
      'TRIGGER:-P1D',
      'DESCRIPTION:Tomorrow',
      'SUMMARY:Review',
      'ATTENDEE:mailto:ann@example.com',
      'END:VALARM',
      'BEGIN:VALARM',
      'ACTION:DISPLAY',
      'TRIGGER;VALUE=DATE-TIME:20250120T080000Z',
      'DESCRIPTION:Wake up',
      'END:VALARM',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const [entry] = decodeCalendar(text).events
    expect(entry?.event.reminders).toEqual([
      { minutesBefore: 1440, action: 'EMAIL', description: 'Tomorrow', emailTo: 'ann@example.com' },
    ])
    expect(entry?.preserved).toEqual([
      'BEGIN:VALARM',
      'ACTION:DISPLAY',
      'TRIGGER;VALUE=DATE-TIME:20250120T080000Z',
      'DESCRIPTION:Wake up',
      'END:VALARM',
    ])
  })

  it('keeps TZID and timestamps', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:zoned',
      'DTSTAMP:20250115T100000Z',
      'LAST-MODIFIED:20250116T120000Z',
      'DTSTART;TZID="Europe/Berlin":20250120T090000',
      'DTEND;TZID="Europe/Berlin":20250120T100000',
      'SEQUENCE:4',
      'PRIORITY:3',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const [entry] = decodeCalendar(text).events
    expect(entry?.event).toMatchObject({
      start: '2025-01-20T09:00:00',
      end: '2025-01-20T10:00:00',
      timezone: 'Europe/Berlin',
      dtstamp: '2025-01-15T10:00:00Z',
      lastModified: '2025-01-16T12:00:00Z',
      created: null,
      sequence: 4,
      priority: 3,
    })
  })

  it('picks the master event over recurrence overrides', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:series',
      'RECURRENCE-ID:20250121T090000Z',
      'DTSTART:20250121T100000Z',
      'SUMMARY:Moved',
      'END:VEVENT',
      'BEGIN:VEVENT',
      'UID:series',
      'DTSTART:20250120T090000Z',
      'RRULE:FREQ=DAILY;COUNT=3',
      'SUMMARY:Series',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const master = findMasterEvent(decodeCalendar(text), 'series')
    expect(master?.event.title).toBe('Series')
    expect(master?.event.recurrence).toEqual({ frequency: 'DAILY', count: 3 })
  })

  it('returns nothing for text that is not a calendar', () => {
    expect(decodeCalendar('not a calendar')).toEqual({ events: [], failures: [] })
  })
})

describe('parseRecurrence', () => {
  it('parses the structured parts', () => {
    expect(parseRecurrence('FREQ=MONTHLY;INTERVAL=2;UNTIL=20251231;BYMONTHDAY=1,-1;BYMONTH=1,7')).toEqual({
      frequency: 'MONTHLY',
      interval: 2,
      until: '2025-12-31',
      byMonthDay: [1, -1],
      byMonth: [1, 7],
    })
  })

  it('returns null for parts outside the structured form', () => {
    expect(parseRecurrence('FREQ=WEEKLY;WKST=SU;BYDAY=TU')).toBeNull()
    expect(parseRecurrence('FREQ=HOURLY')).toBeNull()
  })

  it('keeps the raw rule on the event when it cannot be structured', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:raw-rule',
      'DTSTART:20250120T090000Z',
      'RRULE:FREQ=WEEKLY;WKST=SU;BYDAY=TU',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const [entry] = decodeCalendar(text).events
    expect(entry?.event.recurrence).toBeNull()
    expect(entry?.event.rrule).toBe('FREQ=WEEKLY;WKST=SU;BYDAY=TU')
  })
})

describe('decodeCalendar with mixed start and end forms', () => {
  function decodeTimes(...eventLines: string[]) {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:mixed',
      ...eventLines,
      'END:VEVENT',
      'END:VCALENDAR',
    )
    const [entry] = decodeCalendar(text).events
    return entry?.event
  }

  it('keeps a UTC end after a zone-local start', () => {
    expect(
      decodeTimes('DTSTART;TZID=Europe/Berlin:20250120T090000', 'DTEND:20250120T120000Z'),
    ).toMatchObject({
      start: '2025-01-20T09:00:00',
      end: '2025-01-20T12:00:00Z',
      timezone: 'Europe/Berlin',
    })
  })

  it('carries an end in another zone as UTC', () => {
    expect(
      decodeTimes('DTSTART:20250120T090000Z', 'DTEND;TZID=Europe/Berlin:20250120T110000'),
    ).toMatchObject({
      start: '2025-01-20T09:00:00Z',
      end: '2025-01-20T10:00:00Z',
      timezone: null,
    })
  })

  it('ignores a date-time end on an all-day event', () => {
    expect(decodeTimes('DTSTART;VALUE=DATE:20250120', 'DTEND:20250121T090000Z')).toMatchObject({
      start: '2025-01-20',
      end: '2025-01-21',
      allDay: true,
    })
  })
})

describe('decodeCalendar alarm properties', () => {
  it('keeps alarm lines that have no reminder field', () => {
    const text = lf(
      'BEGIN:VCALENDAR',
      'BEGIN:VEVENT',
      'UID:repeating-alarm',
      'DTSTART:20250120T090000Z',
      'BEGIN:VALARM',
      'ACTION:DISPLAY',
      'TRIGGER:-PT10M',
      'DESCRIPTION:Soon',
      'REPEAT:2',
      'DURATION:PT5M',
      'END:VALARM',
      'END:VEVENT',
      'END:VCALENDAR',
    )

    const [entry] = decodeCalendar(text).events
    expect(entry?.event.reminders).toEqual([
      {
        minutesBefore: 10,
        action: 'DISPLAY',
        description: 'Soon',
        preserved: ['REPEAT:2', 'DURATION:PT5M'],
      },
    ])
    expect(entry?.preserved).toEqual([])
  })
})
