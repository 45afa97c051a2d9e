/**
 * Column Layout and Row Materialization Tests
 */

import { describe, it, expect } from 'vitest'
import { CoercionError, SchemaError } from '../../../src/errors.js'
import {
  type CellRow,
  coerceRecord,
  deriveLayout,
  describeLayout,
  explodeRow,
  materializeRows,
  parseLayout,
  sameLayout,
  serializeLayout,
} from '../../../src/columnar/index.js'
import { parsePage, recordTree } from '../../../src/record/index.js'
import { resolveSchema } from '../../../src/schema/index.js'
import { utf8 } from '../../../src/utils/index.js'
import { PRODUCTS_XML, PRODUCT_ROWS, productSchema } from '../fixtures.js'

const schema = productSchema()

const TWO_ASSOCIATIONS = resolveSchema(
  'items',
  '<prestashop><item><id></id><associations>' +
    '<tags nodeType="tag"><tag><id></id></tag></tags>' +
    '<images nodeType="image"><image><id></id></image></images>' +
    '</associations></item></prestashop>'
)

// =============================================================================
// Layout
// =============================================================================

describe('deriveLayout', () => {
  it('keeps associations and translations as list columns', () => {
    const layout = deriveLayout(schema, false)
    expect(describeLayout(layout)).toBe(
      'id:integer?, id_manufacturer:unsigned?, reference:text?, price:decimal, active:boolean?, ' +
        'date_upd:datetime?, name:list<languageId:integer?, value:text?>?, description:html?, ' +
        'categories:list<id:unsigned?>'
    )
  })

  it('turns association fields into nullable top-level columns when flattening', () => {
    const layout = deriveLayout(schema, true)
    expect(layout.columns.map(c => c.name)).toEqual([
      'id',
      'id_manufacturer',
      'reference',
      'price',
      'active',
      'date_upd',
      'name',
      'description',
      'categories_id',
    ])
    expect(layout.columns[8]).toEqual({ name: 'categories_id', type: { type: 'unsigned' }, nullable: true })
  })

  it('rejects a flattened name that collides with a field', () => {
    const colliding = resolveSchema(
      'items',
      '<prestashop><item><tags_id></tags_id><associations><tags nodeType="tag"><tag><id></id></tag></tags></associations></item></prestashop>'
    )
    expect(() => deriveLayout(colliding, false)).not.toThrow()
    expect(() => deriveLayout(colliding, true)).toThrow(SchemaError)
    expect(() => deriveLayout(colliding, true)).toThrow("flattened column 'tags_id' collides with another column")
  })

  it('compares layouts structurally', () => {
    expect(sameLayout(deriveLayout(schema, false), deriveLayout(productSchema(), false))).toBe(true)
    expect(sameLayout(deriveLayout(schema, false), deriveLayout(schema, true))).toBe(false)
  })

  it('serializes and parses layouts', () => {
    const layout = deriveLayout(schema, false)
    expect(parseLayout(serializeLayout(layout))).toEqual(layout)
  })

  it('rejects an embedded layout with an unknown kind', () => {
    expect(() => parseLayout('{"columns":[{"name":"a","nullable":true,"type":{"type":"blob"}}]}')).toThrow()
  })
})

// =============================================================================
// Rows
// =============================================================================

describe('materializeRows', () => {
  const records = parsePage(utf8(PRODUCTS_XML), 'xml', schema)

  it('coerces one row per record without flattening', () => {
    expect(records.flatMap(record => materializeRows(record, schema, false))).toEqual(PRODUCT_ROWS)
  })

  it('explodes association elements into rows', () => {
    const rows = records.flatMap(record => materializeRows(record, schema, true))
    expect(rows.map(row => [row['id'], row['categories_id']])).toEqual([
      [1, 2],
      [1, 5],
      [2, null],
    ])
    expect(rows[1]?.['reference']).toBe('A-1')
    expect(rows[0]).not.toHaveProperty('categories')
  })

  it('fails on a missing required value', () => {
    const tree = recordTree([['id', '1']])
    expect(() => materializeRows(tree, schema, false)).toThrow(
      new CoercionError('price', null, 'decimal')
    )
  })

  it('fails on an empty required value', () => {
    const tree = recordTree([['price', '  ']])
    expect(() => materializeRows(tree, schema, false)).toThrow(`Cannot coerce value "  " of field 'price' to decimal`)
  })

  it('reports association element paths', () => {
    const tree = recordTree([
      ['price', '1'],
      ['categories', [recordTree([['id', 'x']])]],
    ])
    try {
      materializeRows(tree, schema, false)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(CoercionError)
      if (error instanceof CoercionError) {
        expect(error.field).toBe('categories.id')
        expect(error.value).toBe('x')
      }
    }
  })

  it('reads bare text of a translated field as one entry without a language', () => {
    const row = coerceRecord(recordTree([['price', '1'], ['name', 'Mug']]), schema)
    expect(row['name']).toEqual([{ languageId: null, value: 'Mug' }])
  })

  it('reads an absent or blank association as empty', () => {
    expect(coerceRecord(recordTree([['price', '1']]), schema)['categories']).toEqual([])
    expect(coerceRecord(recordTree([['price', '1'], ['categories', '\n  ']]), schema)['categories']).toEqual([])
  })

  it('rejects a nested record where a scalar is declared', () => {
    const tree = recordTree([['price', recordTree([['amount', '1']])]])
    expect(() => materializeRows(tree, schema, false)).toThrow(`Cannot coerce value "[record]" of field 'price' to decimal`)
  })
})

describe('explodeRow', () => {
  it('takes the cross product of several associations', () => {
    const row: CellRow = {
      id: 1,
      tags: [{ id: 1 }, { id: 2 }],
      images: [{ id: 7 }, { id: 8 }, { id: 9 }],
    }
    expect(explodeRow(row, TWO_ASSOCIATIONS)).toEqual([
      { id: 1, tags_id: 1, images_id: 7 },
      { id: 1, tags_id: 1, images_id: 8 },
      { id: 1, tags_id: 1, images_id: 9 },
      { id: 1, tags_id: 2, images_id: 7 },
      { id: 1, tags_id: 2, images_id: 8 },
      { id: 1, tags_id: 2, images_id: 9 },
    ])
  })

  it('keeps a row with nulls when an association is empty', () => {
    expect(explodeRow({ id: 3, tags: [], images: [{ id: 4 }] }, TWO_ASSOCIATIONS)).toEqual([
      { id: 3, tags_id: null, images_id: 4 },
    ])
  })
})
