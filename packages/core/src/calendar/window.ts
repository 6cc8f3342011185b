/**
 * Time-window membership
 *
 * The server-side time-range query is only a prefilter; providers differ in
 * how they treat recurring events, so every candidate is checked again here.
 * Recurring events are expanded with ical-expander.
 */

import IcalExpander from 'ical-expander'
import type { Logger } from 'pino'
import { toInstant } from './datetime.js'
import type { CalendarEvent } from './types.js'

/** Half-open interval [from, to) */
export interface TimeWindow {
  from: Date
  to: Date
}

const MAX_EXPANSIONS = 1000

// The slice of ical-expander's results read here
interface ExpandedTime {
  toJSDate(): Date
}

interface ExpandedEvent {
  uid: string
  startDate: ExpandedTime
  endDate: ExpandedTime
}

interface ExpandedOccurrence {
  startDate: ExpandedTime
  endDate: ExpandedTime
  item: { uid: string }
}

interface Expansion {
  events: ExpandedEvent[]
  occurrences: ExpandedOccurrence[]
}

function overlaps(startAt: number, endAt: number, window: TimeWindow): boolean {
  const from = window.from.getTime()
  const to = window.to.getTime()
  // Zero-length events sit at a single instant
  if (endAt <= startAt) {
    return startAt >= from && startAt < to
  }
  return startAt < to && endAt > from
}

function occursInWindow(event: CalendarEvent, calendarText: string, window: TimeWindow): boolean {
  const expander = new IcalExpander({ ics: calendarText, maxIterations: MAX_EXPANSIONS })
  // `between` is inclusive at both ends
  const before = new Date(window.to.getTime() - 1)
  const { events, occurrences }: Expansion = expander.between(window.from, before)

  // Moved instances (RECURRENCE-ID overrides) come back as events
  const matches = [
    ...events.filter((candidate) => candidate.uid === event.uid),
    ...occurrences.filter((occurrence) => occurrence.item.uid === event.uid),
  ]

  return matches.some((match) =>
    overlaps(match.startDate.toJSDate().getTime(), match.endDate.toJSDate().getTime(), window),
  )
}

/**
 * Whether the event, or any occurrence of it, overlaps the window.
 *
 * @param calendarText - The stored calendar object, needed to expand recurrences
 */
export function isInWindow(
  event: CalendarEvent,
  calendarText: string,
  window: TimeWindow,
  logger?: Logger,
): boolean {
  if (!event.rrule) {
    return overlaps(
      toInstant(event.start, event.timezone),
      toInstant(event.end, event.timezone),
      window,
    )
  }

  try {
    return occursInWindow(event, calendarText, window)
  } catch (err) {
    // The server already matched it against the time range
    logger?.warn(
      { uid: event.uid, err: err instanceof Error ? err.message : String(err) },
      'Could not expand recurring event; keeping it',
    )
    return true
  }
}
