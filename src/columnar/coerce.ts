/**
 * Scalar Coercion
 *
 * Strict conversion of raw wire text to typed cell values. Nothing is
 * truncated or guessed: text that does not fit its kind is a CoercionError.
 */

import { CoercionError } from '../errors.js'
import type { ScalarKind } from '../schema/types.js'
import { assertNever } from '../utils/index.js'
import type { ScalarValue } from './types.js'

// =============================================================================
// GRAMMARS
// =============================================================================

const INTEGER_PATTERN = /^[+-]?\d+$/
const UNSIGNED_PATTERN = /^\+?\d+$/
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647
const UINT32_MAX = 4294967295

/** Literal tokens accepted for booleans, compared case-insensitively */
export const TRUE_TOKENS: ReadonlySet<string> = new Set(['1', 'true', 'yes'])
export const FALSE_TOKENS: ReadonlySet<string> = new Set(['0', 'false', 'no'])

/** The service's placeholder for "no date" */
const ZERO_DATE = '0000-00-00'
const ZERO_DATETIME = '0000-00-00 00:00:00'

// =============================================================================
// COERCION
// =============================================================================

/**
 * Coerce raw text to a scalar kind.
 *
 * Returns null for empty text on every kind except text and html, and for the
 * all-zero date placeholder. Nullability is the caller's concern.
 *
 * @param field - Field path reported in the CoercionError
 * @throws {CoercionError} When the text does not match the kind's grammar
 */
export function coerceScalar(kind: ScalarKind, raw: string, field: string): ScalarValue | null {
  if (kind === 'text') return raw
  if (kind === 'html') return unescapeHtml(raw)

  const text = raw.trim()
  if (text === '') return null
  const fail = (): never => {
    throw new CoercionError(field, raw, kind)
  }

  switch (kind) {
    case 'integer': {
      if (!INTEGER_PATTERN.test(text)) return fail()
      const value = Number(text)
      if (value < INT32_MIN || value > INT32_MAX) return fail()
      // Number('-0') is -0
      return value === 0 ? 0 : value
    }
    case 'unsigned': {
      if (!UNSIGNED_PATTERN.test(text)) return fail()
      const value = Number(text)
      return value > UINT32_MAX ? fail() : value
    }
    case 'decimal': {
      if (!DECIMAL_PATTERN.test(text)) return fail()
      const value = Number(text)
      if (!Number.isFinite(value)) return fail()
      return value
    }
    case 'boolean': {
      const token = text.toLowerCase()
      if (TRUE_TOKENS.has(token)) return true
      if (FALSE_TOKENS.has(token)) return false
      return fail()
    }
    case 'date': {
      if (text === ZERO_DATE) return null
      const match = DATE_PATTERN.exec(text)
      if (!match) return fail()
      return calendarDate(match, 0, 0, 0) ?? fail()
    }
    case 'datetime': {
      if (text === ZERO_DATETIME || text === ZERO_DATE) return null
      const full = DATETIME_PATTERN.exec(text)
      if (full) {
        return calendarDate(full, Number(full[4]), Number(full[5]), Number(full[6])) ?? fail()
      }
      const dateOnly = DATE_PATTERN.exec(text)
      if (!dateOnly) return fail()
      return calendarDate(dateOnly, 0, 0, 0) ?? fail()
    }
    default:
      return assertNever(kind)
  }
}

/**
 * Build a UTC date from a `YYYY-MM-DD` match and a time of day.
 * Returns undefined when any component is out of range (month 13, February 30, hour 24).
 */
function calendarDate(match: RegExpExecArray, hours: number, minutes: number, seconds: number): Date | undefined {
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined

  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hours, minutes, seconds, 0)
  return date
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
    return leap ? 29 : 28
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
}

// =============================================================================
// HTML ENTITIES
// =============================================================================

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
}

const ENTITY_PATTERN = /&(#[xX][0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g

/**
 * Unescape the named entities `&lt; &gt; &amp; &quot; &apos; &nbsp;` and numeric
 * character references in one pass. Anything else is left as written.
 */
export function unescapeHtml(text: string): string {
  return text.replace(ENTITY_PATTERN, (whole: string, body: string) => {
    if (body.startsWith('#')) {
      const hex = body[1] === 'x' || body[1] === 'X'
      const codePoint = hex ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10)
      if (!Number.isFinite(codePoint) || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
        return whole
      }
      return String.fromCodePoint(codePoint)
    }
    return NAMED_ENTITIES[body] ?? whole
  })
}

/**
 * Render a date as the service writes it: `YYYY-MM-DD` or `YYYY-MM-DD HH:MM:SS`.
 */
export function formatServiceDate(date: Date, withTime: boolean): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  const day = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
  if (!withTime) return day
  return `${day} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
}
