/**
 * JSON Decoding
 *
 * Listing pages in the JSON encoding: `{ "products": [ {..}, {..} ] }`.
 * Scalars become their text form so both encodings reach the batch
 * builder with the same raw values.
 */

import { ParseError } from '../errors.js'
import { byteOffsetOf, isPlainObject } from '../utils/index.js'
import type { Schema } from '../schema/types.js'
import { findField } from '../schema/types.js'
import { ASSOCIATIONS_ELEMENT } from './xml.js'
import {
  type RecordTree,
  type RecordValue,
  LANGUAGE_ID_KEY,
  LANGUAGE_VALUE_KEY,
  recordTree,
} from './types.js'

/**
 * Steps from the document root to a value: object keys and array indexes.
 */
type JsonPath = readonly (string | number)[]

/**
 * Decode a JSON listing page.
 *
 * Accepted shapes:
 * - `{ "<resource>": [ record, ... ] }`
 * - `{ "<record>": record }` for a single record
 * - `[]` or `{}` for an empty listing
 *
 * Shape errors carry the byte offset of the offending value.
 */
export function parseJsonPage(text: string, schema: Schema): RecordTree[] {
  const document = parseJson(text)
  const fail = (reason: string, path: JsonPath): never => {
    throw new ParseError(reason, byteOffsetOf(text, locateJsonValue(text, path)))
  }

  if (Array.isArray(document)) {
    if (document.length === 0) return []
    return fail('top-level array must be empty', [0])
  }
  if (!isPlainObject(document)) {
    return fail('top-level value must be an object', [])
  }

  const keys = Object.keys(document)
  if (keys.length === 0) return []
  const [key, second] = keys
  if (key === undefined) return []
  if (second !== undefined) {
    return fail(`expected a single listing key, found ${keys.map(k => JSON.stringify(k)).join(', ')}`, [second])
  }

  const listing = document[key]
  if (Array.isArray(listing)) {
    return listing.map((item, index) => {
      if (!isPlainObject(item)) {
        return fail(`record ${index} of "${key}" is not an object`, [key, index])
      }
      return recordFromObject(item, schema, [key, index], fail)
    })
  }
  if (isPlainObject(listing)) {
    return [recordFromObject(listing, schema, [key], fail)]
  }
  return fail(`listing "${key}" must be an array or an object`, [key])
}

type Fail = (reason: string, path: JsonPath) => never

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    const position = locateJsonSyntaxError(text)
    const reason = error instanceof Error ? error.message : String(error)
    throw new ParseError(reason, byteOffsetOf(text, position), undefined, error)
  }
}

function recordFromObject(object: Record<string, unknown>, schema: Schema | undefined, path: JsonPath, fail: Fail): RecordTree {
  const entries = new Map<string, RecordValue>()
  for (const [name, value] of Object.entries(object)) {
    if (name === ASSOCIATIONS_ELEMENT && isPlainObject(value)) {
      for (const [association, elements] of Object.entries(value)) {
        entries.set(association, toValue(association, elements, schema, [...path, name, association], fail))
      }
    } else {
      entries.set(name, toValue(name, value, schema, [...path, name], fail))
    }
  }
  return recordTree(entries)
}

function toValue(name: string, value: unknown, schema: Schema | undefined, path: JsonPath, fail: Fail): RecordValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  if (typeof value === 'boolean') return value ? '1' : '0'

  const field = schema ? findField(schema, name) : undefined
  if (Array.isArray(value)) {
    if (field?.kind.type === 'translated' || (field === undefined && isTranslatedList(value))) {
      return value.map((entry, index) => translatedEntry(name, entry, [...path, index], fail))
    }
    const elementSchema = field?.kind.type === 'association' ? field.kind.elementSchema : undefined
    return value.map((element, index) => {
      if (!isPlainObject(element)) {
        return fail(`element ${index} of "${name}" is not an object`, [...path, index])
      }
      return recordFromObject(element, elementSchema, [...path, index], fail)
    })
  }
  if (isPlainObject(value)) {
    return recordFromObject(value, undefined, path, fail)
  }
  return fail(`unsupported value for "${name}"`, path)
}

function isTranslatedList(value: readonly unknown[]): boolean {
  return (
    value.length > 0 &&
    value.every(v => isPlainObject(v) && Object.keys(v).length === 2 && 'id' in v && 'value' in v)
  )
}

function translatedEntry(name: string, entry: unknown, path: JsonPath, fail: Fail): RecordTree {
  if (!isPlainObject(entry) || !('id' in entry)) {
    return fail(`translated field "${name}" expects { id, value } entries`, path)
  }
  const id = entry['id']
  const text = entry['value']
  return recordTree([
    [LANGUAGE_ID_KEY, typeof id === 'number' ? String(id) : typeof id === 'string' ? id : null],
    [LANGUAGE_VALUE_KEY, typeof text === 'string' ? text : text === null || text === undefined ? null : String(text)],
  ])
}

// =============================================================================
// POSITIONS
// =============================================================================

/**
 * Cursor over JSON text following the RFC 8259 grammar. Every method stops
 * with a JsonSyntaxPosition at the first character that does not fit.
 */
class JsonScanner {
  i = 0

  constructor(private readonly text: string) {}

  fail(): never {
    throw new JsonSyntaxPosition(this.i)
  }

  skipWs(): void {
    const text = this.text
    while (this.i < text.length && (text[this.i] === ' ' || text[this.i] === '\n' || text[this.i] === '\r' || text[this.i] === '\t')) {
      this.i++
    }
  }

  peek(): string | undefined {
    return this.text[this.i]
  }

  expect(literal: string): void {
    for (const ch of literal) {
      if (this.text[this.i] !== ch) this.fail()
      this.i++
    }
  }

  /** Consume a string and return its decoded value */
  string(): string {
    const start = this.i
    this.expect('"')
    const text = this.text
    while (this.i < text.length) {
      const ch = text[this.i]
      if (ch === '"') {
        this.i++
        return String(JSON.parse(text.slice(start, this.i)))
      }
      if (ch === '\\') {
        this.i++
        const esc = text[this.i]
        if (esc === 'u') {
          this.i++
          for (let k = 0; k < 4; k++) {
            if (!/[0-9a-fA-F]/.test(text[this.i] ?? '')) this.fail()
            this.i++
          }
          continue
        }
        if (esc === undefined || !'"\\/bfnrt'.includes(esc)) this.fail()
        this.i++
        continue
      }
      if (ch !== undefined && ch.charCodeAt(0) < 0x20) this.fail()
      this.i++
    }
    return this.fail()
  }

  /**
   * Consume one value. `onMember` and `onElement` see the position of every
   * direct member of an object or array, before it is consumed.
   */
  value(onMember?: (key: string, start: number) => void, onElement?: (index: number, start: number) => void): void {
    this.skipWs()
    const ch = this.peek()
    if (ch === '{') {
      this.i++
      this.skipWs()
      if (this.peek() === '}') {
        this.i++
        return
      }
      for (;;) {
        this.skipWs()
        const key = this.string()
        this.skipWs()
        this.expect(':')
        this.skipWs()
        onMember?.(key, this.i)
        this.value()
        this.skipWs()
        if (this.peek() === ',') {
          this.i++
          continue
        }
        this.expect('}')
        return
      }
    }
    if (ch === '[') {
      this.i++
      this.skipWs()
      if (this.peek() === ']') {
        this.i++
        return
      }
      for (let index = 0; ; index++) {
        this.skipWs()
        onElement?.(index, this.i)
        this.value()
        this.skipWs()
        if (this.peek() === ',') {
          this.i++
          continue
        }
        this.expect(']')
        return
      }
    }
    if (ch === '"') {
      this.string()
      return
    }
    if (ch === 't') return this.expect('true')
    if (ch === 'f') return this.expect('false')
    if (ch === 'n') return this.expect('null')
    if (ch === '-' || (ch !== undefined && ch >= '0' && ch <= '9')) return this.number()
    this.fail()
  }

  private number(): void {
    if (this.peek() === '-') this.i++
    if (this.peek() === '0') {
      this.i++
    } else {
      this.digits()
    }
    if (this.peek() === '.') {
      this.i++
      this.digits()
    }
    if (this.peek() === 'e' || this.peek() === 'E') {
      this.i++
      if (this.peek() === '+' || this.peek() === '-') this.i++
      this.digits()
    }
  }

  private digits(): void {
    const start = this.i
    while (/[0-9]/.test(this.peek() ?? '')) this.i++
    if (this.i === start) this.fail()
  }
}

class JsonSyntaxPosition extends Error {
  constructor(readonly position: number) {
    super(`JSON syntax error at ${position}`)
  }
}

/**
 * Index of the first character at which `text` stops being valid JSON.
 * Only called after JSON.parse has rejected the text, whose messages do not
 * always carry a position.
 */
export function locateJsonSyntaxError(text: string): number {
  const scanner = new JsonScanner(text)
  try {
    scanner.value()
    scanner.skipWs()
    if (scanner.i < text.length) scanner.fail()
  } catch (error) {
    if (error instanceof JsonSyntaxPosition) return error.position
    throw error
  }
  return text.length
}

/**
 * Index of the first character of the value at `path` in valid JSON text.
 * A repeated key resolves to its last occurrence, as in JSON.parse. A path
 * that leads nowhere stops at the deepest value found on the way.
 */
export function locateJsonValue(text: string, path: JsonPath): number {
  const scanner = new JsonScanner(text)
  scanner.skipWs()
  let position = scanner.i
  for (const step of path) {
    let found: number | undefined
    scanner.i = position
    try {
      scanner.value(
        (key, start) => {
          if (key === step) found = start
        },
        (index, start) => {
          if (index === step) found = start
        }
      )
    } catch (error) {
      if (error instanceof JsonSyntaxPosition) return position
      throw error
    }
    if (found === undefined) return position
    position = found
  }
  return position
}
