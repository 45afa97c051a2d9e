/**
 * Native Type System
 *
 * Plain JS column vectors laid out the way hyparquet-writer takes them, and
 * the Parquet schema elements they are written with.
 *
 * | Column kind     | Parquet physical type        | JS value          |
 * |-----------------|------------------------------|-------------------|
 * | integer         | INT32                        | number            |
 * | unsigned        | INT64                        | bigint            |
 * | decimal         | DOUBLE                       | number            |
 * | boolean         | BOOLEAN                      | boolean           |
 * | text, html      | BYTE_ARRAY (UTF8)            | string            |
 * | date, datetime  | INT64 (TIMESTAMP_MILLIS)     | Date              |
 * | list            | BYTE_ARRAY (UTF8), JSON text | string            |
 *
 * Dates are midnight UTC timestamps, as in the arrow backend; the layout
 * metadata tells them apart from datetimes. List columns hold a JSON array of
 * element objects; dates inside them are epoch milliseconds.
 */

import type { SchemaElement } from 'hyparquet'
import { ValidationError } from '../../errors.js'
import type { ColumnLayout, ColumnSpec, ColumnType } from '../layout.js'
import { type CellRow, type CellValue, isCellRows } from '../types.js'

/**
 * A value hyparquet-writer can encode for one of the physical types above.
 */
export type ParquetValue = string | number | boolean | bigint | Date | null

// =============================================================================
// SCHEMA
// =============================================================================

/**
 * Flat Parquet schema of a layout: the root element followed by one element per column.
 */
export function toParquetSchema(layout: ColumnLayout): SchemaElement[] {
  return [{ name: 'root', num_children: layout.columns.length }, ...layout.columns.map(toParquetElement)]
}

function toParquetElement(column: ColumnSpec): SchemaElement {
  const base = { name: column.name, repetition_type: column.nullable ? 'OPTIONAL' : 'REQUIRED' } as const
  switch (column.type.type) {
    case 'integer':
      return { ...base, type: 'INT32' }
    case 'unsigned':
      return { ...base, type: 'INT64' }
    case 'decimal':
      return { ...base, type: 'DOUBLE' }
    case 'boolean':
      return { ...base, type: 'BOOLEAN' }
    case 'date':
    case 'datetime':
      return { ...base, type: 'INT64', converted_type: 'TIMESTAMP_MILLIS' }
    case 'text':
    case 'html':
    case 'list':
      return { ...base, type: 'BYTE_ARRAY', converted_type: 'UTF8' }
  }
}

// =============================================================================
// VALUES
// =============================================================================

/**
 * Encode a cell for its Parquet column.
 */
export function toParquetValue(value: CellValue, type: ColumnType): ParquetValue {
  if (value === null) return null
  if (isCellRows(value)) {
    return type.type === 'list' ? JSON.stringify(value.map(element => toJsonElement(element, type.element))) : null
  }
  if (type.type === 'unsigned' && typeof value === 'number') return BigInt(value)
  return value
}

function toJsonElement(element: CellRow, columns: readonly ColumnSpec[]): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const column of columns) {
    const value = element[column.name] ?? null
    if (value instanceof Date) {
      out[column.name] = value.getTime()
    } else if (isCellRows(value)) {
      out[column.name] = column.type.type === 'list' ? value.map(e => toJsonElement(e, nestedColumns(column.type))) : null
    } else {
      out[column.name] = value
    }
  }
  return out
}

function nestedColumns(type: ColumnType): readonly ColumnSpec[] {
  return type.type === 'list' ? type.element : []
}

/**
 * Decode a value read back by hyparquet.
 *
 * @throws {ValidationError} When the value does not have the column's type
 */
export function fromParquetValue(raw: unknown, type: ColumnType): CellValue {
  if (raw === null || raw === undefined) return null
  if (type.type === 'list') {
    if (typeof raw !== 'string') {
      throw new ValidationError(`unexpected ${typeof raw} in a list column`, 'value', raw)
    }
    return fromJsonList(JSON.parse(raw), type.element)
  }
  return fromPlainValue(raw, type)
}

function fromJsonList(raw: unknown, columns: readonly ColumnSpec[]): CellRow[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError('list column does not hold a JSON array', 'value', raw)
  }
  return raw.map((element: unknown) => {
    if (typeof element !== 'object' || element === null || Array.isArray(element)) {
      throw new ValidationError('list element is not an object', 'value', element)
    }
    const row: Record<string, CellValue> = {}
    for (const column of columns) {
      const value: unknown = Reflect.get(element, column.name)
      if (value === null || value === undefined) {
        row[column.name] = null
      } else if (column.type.type === 'list') {
        row[column.name] = fromJsonList(value, column.type.element)
      } else {
        row[column.name] = fromPlainValue(value, column.type)
      }
    }
    return row
  })
}

function fromPlainValue(raw: unknown, type: ColumnType): CellValue {
  switch (type.type) {
    case 'integer':
    case 'unsigned':
    case 'decimal':
      if (typeof raw === 'number') return raw
      if (typeof raw === 'bigint') return Number(raw)
      break
    case 'boolean':
      if (typeof raw === 'boolean') return raw
      break
    case 'text':
    case 'html':
      if (typeof raw === 'string') return raw
      break
    case 'date':
    case 'datetime':
      if (raw instanceof Date) return raw
      if (typeof raw === 'bigint') return new Date(Number(raw))
      if (typeof raw === 'number') return new Date(raw)
      break
    case 'list':
      break
  }
  throw new ValidationError(`unexpected ${typeof raw} in a ${type.type} column`, 'value', raw)
}
