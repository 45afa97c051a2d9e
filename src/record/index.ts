/**
 * Record Parser
 *
 * Turns one page of listing bytes into record trees, in page order.
 * A page either decodes completely or fails with a ParseError; no
 * partial list of records is ever returned.
 *
 * @module record
 */

import { ParseError } from '../errors.js'
import type { Schema } from '../schema/types.js'
import { assertNever } from '../utils/index.js'
import { parseJsonPage } from './json.js'
import type { RecordTree } from './types.js'
import { findInvalidUtf8 } from './utf8.js'
import { parseXmlPage } from './xml.js'

export * from './types.js'
export { parseXmlDocument, type XmlElement } from './xml.js'
export { locateJsonSyntaxError, locateJsonValue } from './json.js'
export { findInvalidUtf8 } from './utf8.js'

/**
 * Wire encodings a page can arrive in.
 *
 * @public
 */
export type PageEncoding = 'xml' | 'json'

const decoder = new TextDecoder('utf-8')

/**
 * Validate and decode page bytes as UTF-8 text. A leading byte order mark is dropped.
 *
 * @throws {ParseError} At the first invalid byte sequence
 */
export function decodeUtf8(bytes: Uint8Array): string {
  const invalid = findInvalidUtf8(bytes)
  if (invalid >= 0) {
    throw new ParseError('invalid UTF-8 byte sequence', invalid)
  }
  const text = decoder.decode(bytes)
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
}

/**
 * Decode one listing page.
 *
 * @param bytes - Raw page body
 * @param encoding - Wire encoding of the body
 * @param schema - Resolved schema, used to tell association lists from nested records
 * @returns One record tree per record, in page order
 * @throws {ParseError} When the bytes are not a well-formed page
 *
 * @example
 * ```typescript
 * const records = parsePage(body, 'xml', schema)
 * for (const record of records) builder.append(record)
 * ```
 */
export function parsePage(bytes: Uint8Array, encoding: PageEncoding, schema: Schema): RecordTree[] {
  const text = decodeUtf8(bytes)
  // The byte order mark shifts every character offset by one, three bytes in UTF-8
  const bomBytes = bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf ? 3 : 0
  try {
    switch (encoding) {
      case 'xml':
        return parseXmlPage(text, schema)
      case 'json':
        return parseJsonPage(text, schema)
      default:
        return assertNever(encoding)
    }
  } catch (error) {
    if (error instanceof ParseError && bomBytes > 0) {
      throw new ParseError(error.reason, error.offset + bomBytes, error.page, error.cause)
    }
    throw error
  }
}
