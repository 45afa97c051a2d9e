/**
 * Row Materialization
 *
 * Pure conversion of one record tree into the output rows it produces.
 * Coercion happens here, once, for every backend. Flattening is a separate
 * step over already-coerced values so the explode logic can be tested on
 * its own.
 */

import { CoercionError } from '../errors.js'
import {
  type RecordTree,
  type RecordValue,
  LANGUAGE_ID_KEY,
  LANGUAGE_VALUE_KEY,
  isRecordList,
} from '../record/types.js'
import type { FieldSpec, Schema } from '../schema/types.js'
import { describeKind } from '../schema/types.js'
import { coerceScalar } from './coerce.js'
import { flattenedName } from './layout.js'
import { type CellRow, type CellValue, isCellRows } from './types.js'

/**
 * Coerce a record tree into a single row with nested list cells.
 *
 * @param path - Prefix for field paths in errors (`categories` for elements of that association)
 * @throws {CoercionError} On the first value that does not fit its field
 */
export function coerceRecord(tree: RecordTree, schema: Schema, path?: string): CellRow {
  const row: Record<string, CellValue> = {}
  for (const field of schema.fields) {
    row[field.name] = coerceField(field, tree.get(field.name), path ? `${path}.${field.name}` : field.name)
  }
  return row
}

/**
 * Rows a record produces.
 *
 * Without flattening this is always one row. With flattening, each association
 * contributes its elements as a factor of a cross product: K elements give K
 * rows, and an empty association keeps the row once with nulls in its columns.
 *
 * @throws {CoercionError} Before any row is returned, so callers never see a partial record
 */
export function materializeRows(tree: RecordTree, schema: Schema, flatten: boolean): CellRow[] {
  const row = coerceRecord(tree, schema)
  return flatten ? explodeRow(row, schema) : [row]
}

/**
 * Cross-product explode of the association cells of a coerced row.
 */
export function explodeRow(row: CellRow, schema: Schema): CellRow[] {
  let rows: Record<string, CellValue>[] = [{}]

  for (const field of schema.fields) {
    const value = row[field.name] ?? null
    if (field.kind.type !== 'association') {
      for (const r of rows) r[field.name] = value
      continue
    }

    const elementFields = field.kind.elementSchema.fields
    const elements = isCellRows(value) ? value : []
    const next: Record<string, CellValue>[] = []
    for (const r of rows) {
      if (elements.length === 0) {
        const copy = { ...r }
        for (const ef of elementFields) copy[flattenedName(field.name, ef.name)] = null
        next.push(copy)
        continue
      }
      for (const element of elements) {
        const copy = { ...r }
        for (const ef of elementFields) copy[flattenedName(field.name, ef.name)] = element[ef.name] ?? null
        next.push(copy)
      }
    }
    rows = next
  }
  return rows
}

// =============================================================================
// FIELD COERCION
// =============================================================================

function coerceField(field: FieldSpec, raw: RecordValue | undefined, path: string): CellValue {
  switch (field.kind.type) {
    case 'scalar': {
      const kind = field.kind.scalar
      if (raw === undefined || raw === null) {
        if (field.nullable) return null
        throw new CoercionError(path, null, kind)
      }
      if (typeof raw !== 'string') {
        throw new CoercionError(path, describeRaw(raw), kind)
      }
      const value = coerceScalar(kind, raw, path)
      if (value === null && !field.nullable) {
        throw new CoercionError(path, raw, kind)
      }
      return value
    }

    case 'translated': {
      if (raw === undefined || raw === null) {
        if (field.nullable) return null
        throw new CoercionError(path, null, describeKind(field.kind))
      }
      // A single-language response carries the bare text
      if (typeof raw === 'string') {
        return [{ [LANGUAGE_ID_KEY]: null, [LANGUAGE_VALUE_KEY]: raw }]
      }
      if (!isRecordList(raw)) {
        throw new CoercionError(path, describeRaw(raw), describeKind(field.kind))
      }
      return raw.map(entry => {
        const id = entry.get(LANGUAGE_ID_KEY)
        const text = entry.get(LANGUAGE_VALUE_KEY)
        return {
          [LANGUAGE_ID_KEY]: typeof id === 'string' ? coerceScalar('integer', id, `${path}.${LANGUAGE_ID_KEY}`) : null,
          [LANGUAGE_VALUE_KEY]: typeof text === 'string' ? text : null,
        }
      })
    }

    case 'association': {
      if (raw === undefined || raw === null) return []
      if (typeof raw === 'string') {
        if (raw.trim() === '') return []
        throw new CoercionError(path, raw, describeKind(field.kind))
      }
      if (!isRecordList(raw)) {
        throw new CoercionError(path, describeRaw(raw), describeKind(field.kind))
      }
      const elementSchema = field.kind.elementSchema
      return raw.map(element => coerceRecord(element, elementSchema, path))
    }
  }
}

function describeRaw(raw: RecordValue): string {
  if (typeof raw === 'string') return raw
  if (raw === null) return 'null'
  return isRecordList(raw) ? `[list of ${raw.length}]` : '[record]'
}
