/**
 * Column Layout
 *
 * The backend-neutral column set a schema produces, with or without
 * flattening. Writers compare layouts to refuse schema drift, and both
 * output formats embed the layout so files read back without a schema.
 */

import { z } from 'zod'
import { SchemaError } from '../errors.js'
import type { FieldSpec, ScalarKind, Schema } from '../schema/types.js'
import { LANGUAGE_ID_KEY, LANGUAGE_VALUE_KEY } from '../record/types.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Physical shape of a column: a scalar kind, or a list of struct elements.
 *
 * @public
 */
export type ColumnType =
  | { readonly type: ScalarKind }
  | { readonly type: 'list'; readonly element: readonly ColumnSpec[] }

/**
 * @public
 */
export interface ColumnSpec {
  readonly name: string
  readonly type: ColumnType
  readonly nullable: boolean
}

/**
 * @public
 */
export interface ColumnLayout {
  readonly columns: readonly ColumnSpec[]
}

/** Key under which both formats embed the layout as JSON */
export const LAYOUT_METADATA_KEY = 'colfetch.layout'

/** Element columns of a translated field */
export const TRANSLATED_ELEMENT: readonly ColumnSpec[] = [
  { name: LANGUAGE_ID_KEY, type: { type: 'integer' }, nullable: true },
  { name: LANGUAGE_VALUE_KEY, type: { type: 'text' }, nullable: true },
]

// =============================================================================
// DERIVATION
// =============================================================================

/**
 * Column layout of a schema.
 *
 * Without flattening every field is one column; associations and translated
 * fields are list columns. With flattening, each association's element fields
 * become nullable top-level columns named `<association>_<field>`, placed where
 * the association was. Only the top level is flattened.
 *
 * @throws {SchemaError} When a flattened column name collides with another column
 */
export function deriveLayout(schema: Schema, flatten: boolean): ColumnLayout {
  const columns: ColumnSpec[] = []
  const names = new Set<string>()
  const add = (column: ColumnSpec) => {
    if (names.has(column.name)) {
      throw new SchemaError(`flattened column '${column.name}' collides with another column`, schema.resourceType, column.name)
    }
    names.add(column.name)
    columns.push(column)
  }

  for (const field of schema.fields) {
    if (flatten && field.kind.type === 'association') {
      for (const element of field.kind.elementSchema.fields) {
        add({ name: flattenedName(field.name, element.name), type: nestedType(element), nullable: true })
      }
    } else {
      add({ name: field.name, type: nestedType(field), nullable: field.nullable })
    }
  }
  return { columns }
}

/** Top-level column name of an exploded association field */
export function flattenedName(association: string, field: string): string {
  return `${association}_${field}`
}

function nestedType(field: FieldSpec): ColumnType {
  switch (field.kind.type) {
    case 'scalar':
      return { type: field.kind.scalar }
    case 'translated':
      return { type: 'list', element: TRANSLATED_ELEMENT }
    case 'association':
      return {
        type: 'list',
        element: field.kind.elementSchema.fields.map(f => ({ name: f.name, type: nestedType(f), nullable: f.nullable })),
      }
  }
}

// =============================================================================
// COMPARISON
// =============================================================================

/**
 * Structural equality of two layouts: same column names, order, types and nullability.
 */
export function sameLayout(a: ColumnLayout, b: ColumnLayout): boolean {
  return sameColumns(a.columns, b.columns)
}

function sameColumns(a: readonly ColumnSpec[], b: readonly ColumnSpec[]): boolean {
  if (a.length !== b.length) return false
  return a.every((column, i) => {
    const other = b[i]
    return other !== undefined && column.name === other.name && column.nullable === other.nullable && sameType(column.type, other.type)
  })
}

function sameType(a: ColumnType, b: ColumnType): boolean {
  if (a.type === 'list' && b.type === 'list') return sameColumns(a.element, b.element)
  return a.type === b.type
}

/**
 * Compact one-line rendering, e.g. `id:integer, tags:list<id:integer?>?`.
 */
export function describeLayout(layout: ColumnLayout): string {
  return describeColumns(layout.columns)
}

function describeColumns(columns: readonly ColumnSpec[]): string {
  return columns
    .map(c => {
      const type = c.type.type === 'list' ? `list<${describeColumns(c.type.element)}>` : c.type.type
      return `${c.name}:${type}${c.nullable ? '?' : ''}`
    })
    .join(', ')
}

// =============================================================================
// SERIALIZATION
// =============================================================================

const scalarTypeSchema = z.object({
  type: z.enum(['integer', 'unsigned', 'decimal', 'boolean', 'text', 'html', 'date', 'datetime']),
})

const columnSpecSchema: z.ZodType<ColumnSpec> = z.lazy(() =>
  z.object({
    name: z.string(),
    nullable: z.boolean(),
    type: z.union([scalarTypeSchema, z.object({ type: z.literal('list'), element: z.array(columnSpecSchema) })]),
  })
)

const layoutSchema = z.object({ columns: z.array(columnSpecSchema) })

/** Serialize a layout for embedding in file metadata */
export function serializeLayout(layout: ColumnLayout): string {
  return JSON.stringify(layout)
}

/**
 * Parse an embedded layout.
 *
 * @throws {Error} When the text is not JSON or not a layout
 */
export function parseLayout(text: string): ColumnLayout {
  const raw: unknown = JSON.parse(text)
  return layoutSchema.parse(raw)
}
