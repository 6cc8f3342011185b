/**
 * Calendar Errors
 *
 * Every failure surfaced to tool callers is one of these. None of them is
 * retried internally.
 */

export type CalendarErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'TRANSPORT_ERROR'

export abstract class CalendarError extends Error {
  abstract readonly code: CalendarErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Missing or invalid connection settings */
export class ConfigurationError extends CalendarError {
  readonly code = 'CONFIGURATION_ERROR' as const

  constructor(
    message: string,
    readonly missing: string[] = [],
  ) {
    super(message)
  }
}

/** Malformed caller input: bad date, unknown frequency, priority out of range */
export class ValidationError extends CalendarError {
  readonly code = 'VALIDATION_ERROR' as const
}

/** Calendar index or event UID could not be resolved */
export class NotFoundError extends CalendarError {
  readonly code = 'NOT_FOUND' as const
}

/**
 * Network or HTTP failure reported by the CalDAV server.
 * Rate-limited providers usually show up here as timeouts.
 */
export class TransportError extends CalendarError {
  readonly code = 'TRANSPORT_ERROR' as const

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export function isCalendarError(err: unknown): err is CalendarError {
  return err instanceof CalendarError
}
