/**
 * Format Hint Table
 *
 * Maps the `format` attribute of a synopsis field (`isPrice`, `isDate`, ...)
 * to a scalar kind. The table lives in `data/format-hints.json`.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { SCALAR_KINDS, type ScalarKind } from './types.js'

/**
 * Kind a format hint resolves to. `nullable` forces the field nullable
 * whatever its `required` attribute says (`isDateOrNull`).
 *
 * @public
 */
export interface HintMapping {
  readonly kind: ScalarKind
  readonly nullable?: boolean | undefined
}

const scalarKindSchema = z.enum(['integer', 'unsigned', 'decimal', 'boolean', 'text', 'html', 'date', 'datetime'])

const hintTableSchema = z.record(
  z.string().min(1),
  z.object({ kind: scalarKindSchema, nullable: z.boolean().optional() }).strict()
)

const HINT_TABLE_URL = new URL('../../data/format-hints.json', import.meta.url)

let cachedTable: ReadonlyMap<string, HintMapping> | undefined

/**
 * The built-in hint table, read once.
 */
export function getHintTable(): ReadonlyMap<string, HintMapping> {
  if (!cachedTable) {
    const raw: unknown = JSON.parse(readFileSync(HINT_TABLE_URL, 'utf8'))
    cachedTable = createHintTable(hintTableSchema.parse(raw))
  }
  return cachedTable
}

/**
 * Build a hint table from plain entries, e.g. to extend the built-in one.
 */
export function createHintTable(entries: Readonly<Record<string, HintMapping>>): ReadonlyMap<string, HintMapping> {
  const table = new Map<string, HintMapping>()
  for (const [hint, mapping] of Object.entries(entries)) {
    if (!SCALAR_KINDS.includes(mapping.kind)) {
      throw new TypeError(`Unknown scalar kind '${mapping.kind}' for hint '${hint}'`)
    }
    table.set(hint, mapping)
  }
  return table
}

/**
 * Kind implied by a field name when no hint is given.
 *
 * `id`, `id_*` and `*_id` are integers; `date_*` and `*_date` are datetimes.
 */
export function kindFromName(name: string): ScalarKind | undefined {
  if (name === 'id' || name.startsWith('id_') || name.endsWith('_id')) return 'integer'
  if (name.startsWith('date_') || name.endsWith('_date')) return 'datetime'
  return undefined
}
