/**
 * Text grammars for command-line constraints: membership literals, limits and
 * date ranges.
 */

import { QueryError, isCoercionError } from '../errors.js'
import { coerceScalar } from '../columnar/coerce.js'
import type { QueryLimit } from './index.js'

const MEMBERSHIP_SEPARATORS = new Set(['|', ','])

/**
 * Split a membership list on `|` or `,`. A backslash escapes the next character.
 * Empty literals between separators are kept; a trailing separator adds nothing.
 *
 * @example
 * ```typescript
 * parseMembershipLiterals('12,54,5')     // ['12', '54', '5']
 * parseMembershipLiterals('ab\\|c|de||g') // ['ab|c', 'de', '', 'g']
 * ```
 *
 * @throws {QueryError} When the text ends in a lone backslash
 */
export function parseMembershipLiterals(text: string): string[] {
  const values: string[] = []
  let current = ''
  let escaped = false
  for (const char of text) {
    if (escaped) {
      current += char
      escaped = false
    } else if (char === '\\') {
      escaped = true
    } else if (MEMBERSHIP_SEPARATORS.has(char)) {
      values.push(current)
      current = ''
    } else {
      current += char
    }
  }
  if (escaped) {
    throw new QueryError(`unexpected end of input after '\\' in ${JSON.stringify(text)}`, 'values', 'escaped character')
  }
  if (current !== '') values.push(current)
  return values
}

/**
 * Parse `field=v1|v2|...`.
 *
 * @throws {QueryError} When the field name or the value list is empty
 */
export function parseMembershipArgument(text: string): { field: string; values: string[] } {
  const expected = "'field=value1|value2|..'"
  const eq = text.indexOf('=')
  const field = eq < 0 ? '' : text.slice(0, eq)
  if (field === '') {
    throw new QueryError(`expected format is ${expected}, got ${JSON.stringify(text)}`, 'filter', expected)
  }
  const values = parseMembershipLiterals(text.slice(eq + 1))
  if (values.length === 0) {
    throw new QueryError(`no values for field '${field}' in ${JSON.stringify(text)}`, field, expected)
  }
  return { field, values }
}

const LIMIT_PATTERN = /^(\d+)(?:,(\d+))?$/

/**
 * Parse `all`, `N` (first N records) or `O,N` (N records from index O).
 *
 * @returns undefined for `all`
 * @throws {QueryError} For anything else
 */
export function parseLimit(text: string): QueryLimit | undefined {
  const trimmed = text.trim()
  if (trimmed === 'all') return undefined
  const match = LIMIT_PATTERN.exec(trimmed)
  if (!match) {
    throw new QueryError(`invalid limit ${JSON.stringify(text)}, expected 'all', N or O,N`, 'limit', "'all', N or O,N")
  }
  const [, first = '', second] = match
  return second === undefined ? { offset: 0, count: Number(first) } : { offset: Number(first), count: Number(second) }
}

/**
 * @public
 */
export interface DateRange {
  readonly low: Date
  readonly high: Date
}

/**
 * Parse `YYYY-MM-DD..YYYY-MM-DD`.
 *
 * @param field - Field name reported in errors
 * @throws {QueryError} When either side is not a calendar date
 */
export function parseDateRange(text: string, field: string = 'date range'): DateRange {
  const expected = 'YYYY-MM-DD..YYYY-MM-DD'
  const separator = text.indexOf('..')
  if (separator < 0) {
    throw new QueryError(`expected date range in format: 2020-10-10..2021-10-10, got ${JSON.stringify(text)}`, field, expected)
  }
  const bound = (part: string): Date => {
    let value: ReturnType<typeof coerceScalar> | undefined
    try {
      value = coerceScalar('date', part, field)
    } catch (error) {
      if (!isCoercionError(error)) throw error
    }
    if (!(value instanceof Date)) {
      throw new QueryError(`invalid date ${JSON.stringify(part)} in ${JSON.stringify(text)}`, field, expected)
    }
    return value
  }
  return { low: bound(text.slice(0, separator)), high: bound(text.slice(separator + 2)) }
}
