/**
 * Local filter evaluation.
 *
 * The service's date filter is inclusive on both ends and its membership
 * filter compares text, so the engine re-checks every record against the
 * descriptor: `[low, high)` for date ranges, typed equality for membership.
 */

import { coerceScalar } from '../columnar/coerce.js'
import type { ScalarValue } from '../columnar/types.js'
import type { RecordTree } from '../record/types.js'
import { type Schema, findField } from '../schema/types.js'
import type { FieldFilter, QueryDescriptor } from './index.js'

/**
 * @public
 */
export type RecordFilter = (tree: RecordTree) => boolean

/**
 * Compile a descriptor's filters into a record predicate. Literals are
 * coerced once, here.
 *
 * @throws {CoercionError} From the returned predicate, when a filtered field holds a malformed value
 */
export function createRecordFilter(descriptor: QueryDescriptor, schema: Schema): RecordFilter {
  const checks = descriptor.filters.map(filter => compileFilter(filter, schema))
  return tree => checks.every(check => check(tree))
}

/**
 * Whether a record passes every filter of a descriptor.
 */
export function matchesFilters(descriptor: QueryDescriptor, schema: Schema, tree: RecordTree): boolean {
  return createRecordFilter(descriptor, schema)(tree)
}

function compileFilter(filter: FieldFilter, schema: Schema): RecordFilter {
  const spec = findField(schema, filter.field)
  const kind = spec?.kind.type === 'scalar' ? spec.kind.scalar : 'text'
  const valueOf = (tree: RecordTree): ScalarValue | null => {
    const raw = tree.get(filter.field)
    return typeof raw === 'string' ? coerceScalar(kind, raw, filter.field) : null
  }

  if (filter.type === 'dateRange') {
    const low = filter.low.getTime()
    const high = filter.high.getTime()
    return tree => {
      const value = valueOf(tree)
      if (!(value instanceof Date)) return false
      const time = value.getTime()
      return time >= low && time < high
    }
  }

  const accepted = new Set<string | number | boolean>()
  for (const literal of filter.values) {
    const value = coerceScalar(kind, literal, filter.field)
    if (value !== null) accepted.add(comparable(value))
  }
  return tree => {
    const value = valueOf(tree)
    return value !== null && accepted.has(comparable(value))
  }
}

function comparable(value: ScalarValue): string | number | boolean {
  return value instanceof Date ? value.getTime() : value
}
