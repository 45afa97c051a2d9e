/**
 * Batch Builder Tests
 *
 * The builder contract every backend honors: all-or-nothing appends, the
 * finished state, null columns and nested lists.
 */

import { describe, it, expect } from 'vitest'
import { BuilderStateError, CoercionError } from '../../../src/errors.js'
import { BACKEND_NAMES, getBackend } from '../../../src/columnar/index.js'
import { parsePage } from '../../../src/record/index.js'
import type { RecordTree } from '../../../src/record/index.js'
import { resolveSchema } from '../../../src/schema/index.js'
import { utf8 } from '../../../src/utils/index.js'
import { PRODUCTS_XML, productSchema } from '../fixtures.js'

const stockSchema = resolveSchema(
  'stocks',
  '<prestashop><stock><id></id><quantity format="isInt" required="true"></quantity><location></location><date_add></date_add></stock></prestashop>'
)

function tree(entries: Record<string, string>): RecordTree {
  return new Map(Object.entries(entries))
}

describe.each(BACKEND_NAMES)('%s builder', backend => {
  it('refuses appends after finish', () => {
    const builder = getBackend(backend).createBuilder(stockSchema)
    builder.append(tree({ id: '1', quantity: '4' }))
    builder.finish()

    expect(builder.finished).toBe(true)
    expect(() => builder.append(tree({ id: '2', quantity: '5' }))).toThrow(BuilderStateError)
    expect(() => builder.append(tree({ id: '2', quantity: '5' }))).toThrow('append() called after finish()')
    expect(() => builder.finish()).toThrow('finish() called twice')
  })

  it('rejects text that is not an integer without adding a row', () => {
    const builder = getBackend(backend).createBuilder(stockSchema)
    builder.append(tree({ id: '1', quantity: '4' }))

    let failure: unknown
    try {
      builder.append(tree({ id: '2', quantity: 'N/A' }))
    } catch (error) {
      failure = error
    }

    expect(failure).toBeInstanceOf(CoercionError)
    expect(failure).toMatchObject({ field: 'quantity', value: 'N/A', expected: 'integer' })
    expect(builder.numRows).toBe(1)
    const batch = builder.finish()
    expect(batch.toRows()).toEqual([{ id: 1, quantity: 4, location: null, date_add: null }])
  })

  it('rejects a missing non-nullable value', () => {
    const builder = getBackend(backend).createBuilder(stockSchema)
    expect(() => builder.append(tree({ id: '1' }))).toThrow(CoercionError)
    expect(builder.numRows).toBe(0)
  })

  it('fills nullable columns with nulls for empty records', () => {
    const schema = resolveSchema('notes', '<prestashop><note><id></id><body></body><date_add></date_add></note></prestashop>')
    const builder = getBackend(backend).createBuilder(schema)

    expect(builder.append(new Map())).toBe(1)
    expect(builder.append(new Map())).toBe(1)
    const batch = builder.finish()

    expect(batch.numRows).toBe(2)
    for (const name of ['id', 'body', 'date_add']) {
      const column = batch.getColumn(name)
      expect(column.length).toBe(2)
      expect([column.get(0), column.get(1)]).toEqual([null, null])
    }
  })

  it('keeps an association as one list cell when not flattening', () => {
    const schema = productSchema()
    const [first] = parsePage(utf8(PRODUCTS_XML), 'xml', schema)
    if (first === undefined) throw new Error('fixture page has no records')
    const builder = getBackend(backend).createBuilder(schema)

    expect(builder.append(first)).toBe(1)
    const batch = builder.finish()

    expect(batch.numRows).toBe(1)
    expect(batch.getColumn('categories').get(0)).toEqual([{ id: 2 }, { id: 5 }])
  })

  it('explodes the same association into one row per element when flattening', () => {
    const schema = productSchema()
    const [first] = parsePage(utf8(PRODUCTS_XML), 'xml', schema)
    if (first === undefined) throw new Error('fixture page has no records')
    const builder = getBackend(backend).createBuilder(schema, { flatten: true })

    expect(builder.append(first)).toBe(2)
    const batch = builder.finish()

    expect(batch.numRows).toBe(2)
    const ids = batch.getColumn('categories_id')
    expect([ids.get(0), ids.get(1)]).toEqual([2, 5])
  })
})
