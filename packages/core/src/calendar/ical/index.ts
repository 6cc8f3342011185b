/**
 * iCalendar text layer
 *
 * @module calendar/ical
 */

export {
  escapeText,
  unescapeText,
  splitEscapedList,
  foldLine,
  unfoldLines,
  parseContentLine,
} from './text.js'
export type { ContentLine } from './text.js'
export {
  PRODID,
  formatRecurrence,
  formatCategories,
  formatAttendee,
  formatAlarm,
  encodeEvent,
  encodeCalendar,
  replaceEvent,
} from './encoder.js'
export { decodeCalendar, findMasterEvent, parseRecurrence, parseAttendee } from './decoder.js'
export type { DecodedEvent, DecodedCalendar, DecodeFailure } from './decoder.js'
