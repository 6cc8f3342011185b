/**
 * iCalendar content-line primitives (RFC 5545 section 3.1, 3.3.11)
 *
 * @module calendar/ical/text
 */

const MAX_LINE_OCTETS = 75

export interface ContentLine {
  /** Upper-cased property name */
  name: string
  /** Upper-cased parameter names, unquoted values */
  params: Record<string, string>
  /** Raw value, still escaped */
  value: string
  /** The unfolded line as read */
  raw: string
}

/**
 * Escape a TEXT value so reserved characters cannot break the line structure.
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

/**
 * Reverse of escapeText. Unknown escapes keep the escaped character.
 */
export function unescapeText(value: string): string {
  return value.replace(/\\(.)/g, (_match, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch))
}

/**
 * Split a list value on commas that are not escaped, unescaping each item.
 */
export function splitEscapedList(value: string): string[] {
  const items: string[] = []
  let current = ''

  for (let i = 0; i < value.length; i++) {
    const ch = value[i]
    if (ch === '\\' && i + 1 < value.length) {
      current += ch + value[i + 1]
      i++
    } else if (ch === ',') {
      items.push(current)
      current = ''
    } else {
      current += ch
    }
  }
  items.push(current)

  return items.map((item) => unescapeText(item).trim()).filter((item) => item.length > 0)
}

/**
 * Quote a parameter value when it contains characters that would end the parameter.
 * DQUOTE is not allowed inside parameter values at all and is dropped.
 */
export function formatParamValue(value: string): string {
  const cleaned = value.replace(/"/g, '').replace(/[\r\n]+/g, ' ')
  return /[:;,]/.test(cleaned) ? `"${cleaned}"` : cleaned
}

/**
 * Fold a content line at 75 octets without splitting a UTF-8 sequence.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) {
    return line
  }

  const segments: string[] = []
  let current = ''
  let currentOctets = 0
  // Continuation lines start with a space, which counts toward the limit
  let limit = MAX_LINE_OCTETS

  for (const ch of line) {
    const octets = Buffer.byteLength(ch, 'utf-8')
    if (currentOctets + octets > limit) {
      segments.push(current)
      current = ''
      currentOctets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += ch
    currentOctets += octets
  }
  segments.push(current)

  return segments.join('\r\n ')
}

/**
 * Join folded lines and drop blank ones. Accepts CRLF or bare LF input.
 */
export function unfoldLines(text: string): string[] {
  const physical = text.split(/\r\n|\n|\r/)
  const lines: string[] = []

  for (const line of physical) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && lines.length > 0) {
      lines[lines.length - 1] += line.slice(1)
    } else if (line.trim().length > 0) {
      lines.push(line)
    }
  }

  return lines
}

/**
 * Parse `NAME;PARAM=value;PARAM="quoted":value`.
 * Returns null for lines without a name/value separator.
 */
export function parseContentLine(raw: string): ContentLine | null {
  let i = 0
  let inQuotes = false
  let colon = -1
  const semicolons: number[] = []

  for (; i < raw.length; i++) {
    const ch = raw[i]
    if (ch === '"') {
      inQuotes = !inQuotes
    } else if (!inQuotes && ch === ';') {
      semicolons.push(i)
    } else if (!inQuotes && ch === ':') {
      colon = i
      break
    }
  }

  if (colon <= 0) {
    return null
  }

  const head = raw.slice(0, colon)
  const nameEnd = semicolons.length > 0 ? semicolons[0] : head.length
  const name = head.slice(0, nameEnd).trim().toUpperCase()
  if (!name) {
    return null
  }

  const params: Record<string, string> = {}
  for (let p = 0; p < semicolons.length; p++) {
    const segment = head.slice(semicolons[p] + 1, semicolons[p + 1] ?? head.length)
    const eq = segment.indexOf('=')
    if (eq <= 0) continue
    const key = segment.slice(0, eq).trim().toUpperCase()
    const value = segment.slice(eq + 1).trim()
    params[key] = value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value
  }

  return { name, params, value: raw.slice(colon + 1), raw }
}
