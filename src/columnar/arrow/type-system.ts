/**
 * Arrow Type System
 *
 * Mapping between column layouts and apache-arrow types, plus value
 * conversion in both directions.
 *
 * | Column kind     | Arrow type                      |
 * |-----------------|---------------------------------|
 * | integer         | Int32                           |
 * | unsigned        | Uint32                          |
 * | decimal         | Float64                         |
 * | boolean         | Bool                            |
 * | text, html      | Utf8                            |
 * | date, datetime  | Timestamp (milliseconds)        |
 * | list            | List<Struct<element columns>>   |
 *
 * Every field carries its column kind under `colfetch.kind` so that html and
 * date columns stay distinguishable from text and datetime ones.
 */

import {
  Bool,
  type Builder,
  type DataType,
  Field,
  Float64,
  Int32,
  List,
  RecordBatch,
  Schema as ArrowSchema,
  Struct,
  TimestampMillisecond,
  Uint32,
  Utf8,
  makeBuilder,
  makeData,
} from 'apache-arrow'
import { ValidationError } from '../../errors.js'
import { type ColumnLayout, type ColumnSpec, type ColumnType, LAYOUT_METADATA_KEY, serializeLayout } from '../layout.js'
import { type CellRow, type CellValue, isCellRows } from '../types.js'

/** Field metadata key holding the column kind */
export const KIND_METADATA_KEY = 'colfetch.kind'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Arrow type of a column.
 */
export function toArrowType(type: ColumnType): DataType {
  switch (type.type) {
    case 'integer':
      return new Int32()
    case 'unsigned':
      return new Uint32()
    case 'decimal':
      return new Float64()
    case 'boolean':
      return new Bool()
    case 'text':
    case 'html':
      return new Utf8()
    case 'date':
    case 'datetime':
      return new TimestampMillisecond()
    case 'list':
      return new List(new Field('item', new Struct(type.element.map(toArrowField)), true))
  }
}

export function toArrowField(column: ColumnSpec): Field {
  return new Field(column.name, toArrowType(column.type), column.nullable, new Map([[KIND_METADATA_KEY, column.type.type]]))
}

/**
 * Arrow schema of a layout, with the layout itself embedded as schema metadata.
 */
export function toArrowSchema(layout: ColumnLayout): ArrowSchema {
  return new ArrowSchema(layout.columns.map(toArrowField), new Map([[LAYOUT_METADATA_KEY, serializeLayout(layout)]]))
}

// =============================================================================
// VALUES
// =============================================================================

/**
 * Value as an Arrow builder takes it: timestamps become epoch milliseconds and
 * list elements become plain objects keyed by element column.
 */
export function toArrowValue(value: CellValue, type: ColumnType): unknown {
  if (value === null) return null
  if (value instanceof Date) return value.getTime()
  if (type.type === 'list' && isCellRows(value)) {
    return value.map(element => {
      const out: Record<string, unknown> = {}
      for (const column of type.element) {
        out[column.name] = toArrowValue(element[column.name] ?? null, column.type)
      }
      return out
    })
  }
  return value
}

/**
 * Normalize a value read from an Arrow vector back into a cell value.
 *
 * @throws {ValidationError} When the value does not have the column's type
 */
export function fromArrowValue(value: unknown, type: ColumnType): CellValue {
  if (value === null || value === undefined) return null

  switch (type.type) {
    case 'integer':
    case 'unsigned':
    case 'decimal':
      if (typeof value === 'number') return value
      if (typeof value === 'bigint') return Number(value)
      break
    case 'boolean':
      if (typeof value === 'boolean') return value
      break
    case 'text':
    case 'html':
      if (typeof value === 'string') return value
      break
    case 'date':
    case 'datetime':
      if (value instanceof Date) return value
      if (typeof value === 'number') return new Date(value)
      if (typeof value === 'bigint') return new Date(Number(value))
      break
    case 'list':
      if (isIterable(value)) {
        const columns = type.element
        return Array.from(value, element => fromArrowStruct(element, columns))
      }
      break
  }
  throw new ValidationError(`unexpected ${typeof value} in a ${type.type} column`, 'value', value)
}

function fromArrowStruct(element: unknown, columns: readonly ColumnSpec[]): CellRow {
  // StructRow proxies expose their fields through toJSON()
  const fields = hasToJSON(element) ? element.toJSON() : element
  if (!isObjectRecord(fields)) {
    throw new ValidationError('list element is not a struct', 'value', element)
  }
  const row: Record<string, CellValue> = {}
  for (const column of columns) {
    row[column.name] = fromArrowValue(fields[column.name], column.type)
  }
  return row
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value
}

function hasToJSON(value: unknown): value is { toJSON(): unknown } {
  return typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function'
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// =============================================================================
// BUILDERS
// =============================================================================

/**
 * One Arrow builder per column, in schema order.
 */
export function createColumnBuilders(schema: ArrowSchema): Builder[] {
  return schema.fields.map(field => makeBuilder({ type: field.type, nullValues: [null, undefined] }))
}

/**
 * Flush column builders into a record batch of `numRows` rows.
 */
export function sealRecordBatch(schema: ArrowSchema, builders: readonly Builder[], numRows: number): RecordBatch {
  const children = builders.map(builder => builder.finish().flush())
  const data = makeData({ type: new Struct(schema.fields), length: numRows, nullCount: 0, children })
  return new RecordBatch(schema, data)
}

/**
 * Build a record batch from materialized rows.
 */
export function recordBatchFromRows(layout: ColumnLayout, rows: readonly CellRow[], schema: ArrowSchema = toArrowSchema(layout)): RecordBatch {
  const builders = createColumnBuilders(schema)
  layout.columns.forEach((column, i) => {
    const builder = builders[i]
    if (builder === undefined) return
    for (const row of rows) {
      builder.append(toArrowValue(row[column.name] ?? null, column.type))
    }
  })
  return sealRecordBatch(schema, builders, rows.length)
}
