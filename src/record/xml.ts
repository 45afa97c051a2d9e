/**
 * XML Decoding
 *
 * A small element tree built on the saxes streaming parser, shared by the
 * schema resolver (synopsis documents) and the record parser (listing pages).
 */

import { SaxesParser } from 'saxes'
import { ParseError } from '../errors.js'
import { byteOffsetOf } from '../utils/index.js'
import type { Schema } from '../schema/types.js'
import { findField } from '../schema/types.js'
import {
  type RecordTree,
  type RecordValue,
  LANGUAGE_ID_KEY,
  LANGUAGE_VALUE_KEY,
  recordTree,
} from './types.js'

// =============================================================================
// ELEMENT TREE
// =============================================================================

/**
 * One parsed element. `text` concatenates the element's own text and CDATA nodes.
 */
export interface XmlElement {
  readonly name: string
  readonly attributes: Readonly<Record<string, string>>
  readonly children: XmlElement[]
  text: string
  /** Byte offset just past the element's start tag */
  readonly offset: number
}

/** Wrapper element of association declarations and values */
export const ASSOCIATIONS_ELEMENT = 'associations'

/** Element of one translation inside a translated field */
export const LANGUAGE_ELEMENT = 'language'

/**
 * Parse an XML document held in a string.
 *
 * @throws {ParseError} On malformed markup, with the byte offset of the violation
 */
export function parseXmlDocument(text: string): XmlElement {
  const parser = new SaxesParser({ position: true })
  const stack: XmlElement[] = []
  let root: XmlElement | undefined

  parser.on('opentag', tag => {
    const attributes: Record<string, string> = {}
    for (const [key, attr] of Object.entries(tag.attributes)) {
      attributes[key] = attributeText(attr)
    }
    const element: XmlElement = {
      name: tag.name,
      attributes,
      children: [],
      text: '',
      offset: byteOffsetOf(text, parser.position),
    }
    const parent = stack[stack.length - 1]
    if (parent) {
      parent.children.push(element)
    } else {
      root = element
    }
    stack.push(element)
  })
  parser.on('closetag', () => {
    stack.pop()
  })
  const appendText = (chunk: string) => {
    const current = stack[stack.length - 1]
    if (current) current.text += chunk
  }
  parser.on('text', appendText)
  parser.on('cdata', appendText)

  try {
    parser.write(text).close()
  } catch (error) {
    if (error instanceof Error) {
      throw new ParseError(error.message, byteOffsetOf(text, parser.position), undefined, error)
    }
    throw error
  }

  if (!root) {
    throw new ParseError('document has no root element', byteOffsetOf(text, text.length))
  }
  return root
}

function attributeText(attr: unknown): string {
  if (typeof attr === 'string') return attr
  if (typeof attr === 'object' && attr !== null && 'value' in attr && typeof attr.value === 'string') {
    return attr.value
  }
  return ''
}

/** True when the element nests other elements */
export function hasElementChildren(element: XmlElement): boolean {
  return element.children.length > 0
}

/**
 * True when every child is a `<language id="..">` entry.
 */
export function isLanguageList(element: XmlElement): boolean {
  return (
    element.children.length > 0 &&
    element.children.every(c => c.name === LANGUAGE_ELEMENT && c.attributes['id'] !== undefined)
  )
}

// =============================================================================
// LISTING PAGES
// =============================================================================

/**
 * Decode a listing page: `<root><products><product>..</product></products></root>`.
 *
 * A single-record response (`<root><product>..</product></root>`) yields one record.
 */
export function parseXmlPage(text: string, schema: Schema): RecordTree[] {
  const root = parseXmlDocument(text)
  if (root.children.length === 0) return []
  if (root.children.length > 1) {
    const extra = root.children[1]
    throw new ParseError(
      `expected a single listing element under <${root.name}>, found <${extra?.name ?? '?'}>`,
      extra?.offset ?? root.offset
    )
  }

  const [listing] = root.children
  if (!listing) return []
  if (listing.name === schema.recordName) {
    return [recordFromElement(listing, schema)]
  }

  return listing.children.map(element => {
    if (element.name !== schema.recordName) {
      throw new ParseError(`unexpected element <${element.name}>, expected <${schema.recordName}>`, element.offset)
    }
    return recordFromElement(element, schema)
  })
}

function recordFromElement(element: XmlElement, schema: Schema | undefined): RecordTree {
  const entries = new Map<string, RecordValue>()
  const put = (child: XmlElement, value: RecordValue) => {
    if (entries.has(child.name)) {
      throw new ParseError(`duplicate field <${child.name}> in <${element.name}>`, child.offset)
    }
    entries.set(child.name, value)
  }

  for (const child of element.children) {
    if (child.name === ASSOCIATIONS_ELEMENT) {
      for (const association of child.children) {
        put(association, associationValue(association, schema))
      }
    } else {
      put(child, fieldValue(child, schema))
    }
  }
  return recordTree(entries)
}

function associationValue(element: XmlElement, schema: Schema | undefined): readonly RecordTree[] {
  const field = schema ? findField(schema, element.name) : undefined
  const elementSchema = field?.kind.type === 'association' ? field.kind.elementSchema : undefined
  return element.children.map(child => recordFromElement(child, elementSchema))
}

function fieldValue(element: XmlElement, schema: Schema | undefined): RecordValue {
  const field = schema ? findField(schema, element.name) : undefined
  const kind = field?.kind.type

  if (kind === 'association' || element.attributes['nodeType'] !== undefined) {
    return associationValue(element, schema)
  }
  if (kind === 'translated' || isLanguageList(element)) {
    return element.children.map(language => {
      const id = language.attributes['id']
      if (language.name !== LANGUAGE_ELEMENT || id === undefined) {
        throw new ParseError(`expected <language id=".."> inside <${element.name}>`, language.offset)
      }
      return recordTree([
        [LANGUAGE_ID_KEY, id],
        [LANGUAGE_VALUE_KEY, language.text],
      ])
    })
  }
  if (hasElementChildren(element)) {
    return recordFromElement(element, undefined)
  }
  return element.text
}
