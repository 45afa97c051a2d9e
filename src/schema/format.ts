/**
 * Indented text rendering of a schema, for the `schema` CLI command.
 */

import type { FieldSpec, Schema } from './types.js'

const INDENT = '    '

/**
 * Render a schema as an indented tree. Nullable fields end in `?`.
 *
 * Associations deeper than `maxDepth` are shown as `[...]`.
 *
 * @example
 * ```
 * {
 *     id: integer
 *     name: translated?
 *     categories: [<category> {
 *         id: integer?
 *     }]
 * }
 * ```
 */
export function formatSchema(schema: Schema, maxDepth: number = Number.POSITIVE_INFINITY): string {
  return formatRecord(schema.fields, 0, maxDepth)
}

function formatRecord(fields: readonly FieldSpec[], depth: number, maxDepth: number): string {
  const lines = ['{']
  const prefix = INDENT.repeat(depth + 1)
  for (const field of fields) {
    lines.push(`${prefix}${field.name}: ${formatKind(field, depth, maxDepth)}`)
  }
  lines.push(`${INDENT.repeat(depth)}}`)
  return lines.join('\n')
}

function formatKind(field: FieldSpec, depth: number, maxDepth: number): string {
  const mark = field.nullable ? '?' : ''
  switch (field.kind.type) {
    case 'scalar':
      return `${field.kind.scalar}${mark}`
    case 'translated':
      return `translated${mark}`
    case 'association':
      if (depth + 1 >= maxDepth) return '[...]'
      return `[<${field.kind.elementName}> ${formatRecord(field.kind.elementSchema.fields, depth + 1, maxDepth)}]`
  }
}
