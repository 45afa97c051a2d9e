/**
 * Query Layer
 *
 * Validates user constraints against a resolved schema and produces the
 * frozen request descriptor the transport pages through. Nothing here touches
 * the network: every error surfaces before the first fetch.
 *
 * @module query
 */

import { QueryError, isCoercionError } from '../errors.js'
import { coerceScalar, formatServiceDate } from '../columnar/coerce.js'
import { type FieldSpec, type ScalarKind, type Schema, describeKind, findField } from '../schema/types.js'
import { ID_FIELD } from '../schema/resolver.js'
import { parseMembershipLiterals } from './grammar.js'

export { matchesFilters, createRecordFilter, type RecordFilter } from './filters.js'
export { parseMembershipLiterals, parseMembershipArgument, parseLimit, parseDateRange, type DateRange } from './grammar.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * @public
 */
export type SortDirection = 'ASC' | 'DESC'

/**
 * Half-open date range `[low, high)` on a date or datetime field.
 *
 * @public
 */
export interface DateRangeFilter {
  readonly type: 'dateRange'
  readonly field: string
  /** Kind of the filtered field; datetime bounds go on the wire with their time */
  readonly kind: 'date' | 'datetime'
  readonly low: Date
  readonly high: Date
}

/**
 * Set membership on a scalar field. Values keep their first-seen order.
 *
 * @public
 */
export interface MembershipFilter {
  readonly type: 'membership'
  readonly field: string
  readonly values: readonly string[]
}

/**
 * @public
 */
export type FieldFilter = DateRangeFilter | MembershipFilter

/**
 * @public
 */
export interface QueryLimit {
  readonly offset: number
  readonly count: number
}

/**
 * @public
 */
export interface QuerySort {
  readonly field: string
  readonly direction: SortDirection
}

/**
 * Immutable description of one run's request.
 *
 * @public
 */
export interface QueryDescriptor {
  readonly resourceType: string
  /** Selected fields in schema order, `id` included; absent means every field */
  readonly selectedFields?: readonly string[] | undefined
  /**
   * Fields requested from the service: `full`, or the selection plus every
   * filtered field so filters can be re-checked locally
   */
  readonly display: 'full' | readonly string[]
  readonly filters: readonly FieldFilter[]
  readonly limit?: QueryLimit | undefined
  readonly sort?: QuerySort | undefined
  /** Service language id; translated fields then carry that language only */
  readonly language?: number | undefined
}

/**
 * Filter as a user writes it: dates may be `YYYY-MM-DD[ HH:MM:SS]` text and
 * membership values may be one `a|b|c` string.
 *
 * @public
 */
export type FilterConstraint =
  | { readonly type: 'dateRange'; readonly field: string; readonly low: Date | string; readonly high: Date | string }
  | { readonly type: 'membership'; readonly field: string; readonly values: string | readonly string[] }

/**
 * @public
 */
export interface QueryConstraints {
  readonly fields?: readonly string[] | undefined
  readonly filters?: readonly FilterConstraint[] | undefined
  /** `count` alone means from the first record */
  readonly limit?: { readonly offset?: number | undefined; readonly count: number } | undefined
  readonly sort?: { readonly field: string; readonly direction?: SortDirection | undefined } | undefined
  readonly language?: number | undefined
}

// =============================================================================
// BUILDING
// =============================================================================

/**
 * Validate constraints against a schema and build a frozen descriptor.
 *
 * @throws {QueryError} For an unknown field, a filter that does not fit its
 * field's kind, an empty or inverted date range, or a malformed limit
 *
 * @example
 * ```typescript
 * const query = buildQuery(schema, {
 *   fields: ['reference', 'price'],
 *   filters: [{ type: 'membership', field: 'id', values: '12|54|5' }],
 *   limit: { count: 100 },
 * })
 * ```
 */
export function buildQuery(schema: Schema, constraints: QueryConstraints = {}): QueryDescriptor {
  const selectedFields = constraints.fields !== undefined ? selectFields(schema, constraints.fields) : undefined
  const filters = (constraints.filters ?? []).map(filter => validateFilter(schema, filter))
  const limit = constraints.limit !== undefined ? validateLimit(constraints.limit.offset ?? 0, constraints.limit.count) : undefined

  let sort: QuerySort | undefined
  if (constraints.sort !== undefined) {
    scalarField(schema, constraints.sort.field, 'scalar field')
    sort = Object.freeze({ field: constraints.sort.field, direction: constraints.sort.direction ?? 'ASC' })
  }

  const language = constraints.language
  if (language !== undefined && (!Number.isInteger(language) || language <= 0)) {
    throw new QueryError(`language must be a positive integer, got ${language}`, 'language', 'positive integer')
  }

  return Object.freeze({
    resourceType: schema.resourceType,
    selectedFields: selectedFields !== undefined ? Object.freeze(selectedFields) : undefined,
    display: displayOf(schema, selectedFields, filters),
    filters: Object.freeze(filters),
    limit,
    sort,
    language,
  })
}

function selectFields(schema: Schema, fields: readonly string[]): string[] {
  if (fields.length === 0) {
    throw new QueryError('field selection is empty', 'fields', 'at least one field')
  }
  for (const name of fields) {
    requireField(schema, name)
  }
  const wanted = new Set([ID_FIELD, ...fields])
  return schema.fields.filter(field => wanted.has(field.name)).map(field => field.name)
}

function requireField(schema: Schema, name: string): FieldSpec {
  const field = findField(schema, name)
  if (field === undefined) {
    throw new QueryError(`unknown field '${name}' for resource '${schema.resourceType}'`, name, `a field of ${schema.resourceType}`)
  }
  return field
}

function scalarField(schema: Schema, name: string, expected: string): ScalarKind {
  const field = requireField(schema, name)
  if (field.kind.type !== 'scalar') {
    throw new QueryError(`field '${name}' is ${describeKind(field.kind)}, expected ${expected}`, name, expected)
  }
  return field.kind.scalar
}

function validateFilter(schema: Schema, filter: FilterConstraint): FieldFilter {
  if (filter.type === 'dateRange') {
    const kind = scalarField(schema, filter.field, 'date or datetime')
    if (kind !== 'date' && kind !== 'datetime') {
      throw new QueryError(`date range filter on ${kind} field '${filter.field}'`, filter.field, 'date or datetime')
    }
    const low = rangeBound(filter.field, filter.low)
    const high = rangeBound(filter.field, filter.high)
    if (low.getTime() >= high.getTime()) {
      throw new QueryError(
        `empty date range on '${filter.field}': ${formatServiceDate(low, true)} is not before ${formatServiceDate(high, true)}`,
        filter.field,
        'low < high'
      )
    }
    return Object.freeze({ type: 'dateRange', field: filter.field, kind, low, high })
  }

  const kind = scalarField(schema, filter.field, 'scalar field')
  const literals = typeof filter.values === 'string' ? parseMembershipLiterals(filter.values) : filter.values
  if (literals.length === 0) {
    throw new QueryError(`membership filter on '${filter.field}' has no values`, filter.field, 'at least one value')
  }
  const values: string[] = []
  for (const literal of literals) {
    checkLiteral(filter.field, kind, literal)
    if (!values.includes(literal)) values.push(literal)
  }
  return Object.freeze({ type: 'membership', field: filter.field, values: Object.freeze(values) })
}

function rangeBound(field: string, value: Date | string): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new QueryError(`invalid date in range on '${field}'`, field, 'valid date')
    }
    return value
  }
  const coerced = coerceLiteral(field, 'datetime', value)
  if (!(coerced instanceof Date)) {
    throw new QueryError(`invalid date ${JSON.stringify(value)} in range on '${field}'`, field, 'YYYY-MM-DD')
  }
  return coerced
}

function checkLiteral(field: string, kind: ScalarKind, literal: string): void {
  // Empty text is a valid text literal but no value of any other kind
  if (coerceLiteral(field, kind, literal) === null && kind !== 'text' && kind !== 'html') {
    throw new QueryError(`membership value ${JSON.stringify(literal)} on '${field}' is not a ${kind}`, field, kind)
  }
}

function coerceLiteral(field: string, kind: ScalarKind, literal: string): ReturnType<typeof coerceScalar> {
  try {
    return coerceScalar(kind, literal, field)
  } catch (error) {
    if (isCoercionError(error)) {
      throw new QueryError(`value ${JSON.stringify(literal)} on '${field}' is not a ${kind}`, field, kind)
    }
    throw error
  }
}

function validateLimit(offset: number, count: number): QueryLimit {
  for (const [name, value] of [['offset', offset], ['count', count]] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw new QueryError(`limit ${name} must be a non-negative integer, got ${value}`, 'limit', 'non-negative integer')
    }
  }
  return Object.freeze({ offset, count })
}

// =============================================================================
// PROJECTION
// =============================================================================

/**
 * The schema restricted to a selection, in schema order. `id` is always kept.
 * Without a selection the schema is returned as is.
 *
 * @throws {QueryError} For a name that is not in the schema
 */
export function projectSchema(schema: Schema, selectedFields?: readonly string[]): Schema {
  if (selectedFields === undefined) return schema
  const names = new Set(selectFields(schema, selectedFields))
  return Object.freeze({
    resourceType: schema.resourceType,
    recordName: schema.recordName,
    fields: Object.freeze(schema.fields.filter(field => names.has(field.name))),
  })
}

/**
 * Associations only come with `display=full`.
 */
function displayOf(schema: Schema, selectedFields: readonly string[] | undefined, filters: readonly FieldFilter[]): 'full' | readonly string[] {
  if (selectedFields === undefined) return 'full'
  const names = [...selectedFields]
  for (const filter of filters) {
    if (!names.includes(filter.field)) names.push(filter.field)
  }
  return names.some(name => findField(schema, name)?.kind.type === 'association') ? 'full' : Object.freeze(names)
}

// =============================================================================
// WIRE PARAMETERS
// =============================================================================

/**
 * Query parameters for one request, in a stable order.
 *
 * Date ranges are sent inclusive (`[low,high]` with `date=1`); the engine drops
 * records equal to `high` locally.
 *
 * @param page - Window of this request; overrides the descriptor's limit
 */
export function toQueryParams(descriptor: QueryDescriptor, page?: QueryLimit): [string, string][] {
  const params: [string, string][] = []
  params.push(['display', descriptor.display === 'full' ? 'full' : `[${descriptor.display.join(',')}]`])

  let hasDateRange = false
  for (const filter of descriptor.filters) {
    if (filter.type === 'membership') {
      params.push([`filter[${filter.field}]`, `[${filter.values.join('|')}]`])
      continue
    }
    const withTime = filter.kind === 'datetime'
    params.push([`filter[${filter.field}]`, `[${formatServiceDate(filter.low, withTime)},${formatServiceDate(filter.high, withTime)}]`])
    hasDateRange = true
  }
  if (hasDateRange) params.push(['date', '1'])

  const limit = page ?? descriptor.limit
  if (limit !== undefined) {
    params.push(['limit', limit.offset === 0 ? String(limit.count) : `${limit.offset},${limit.count}`])
  }
  if (descriptor.sort !== undefined) {
    params.push(['sort', `[${descriptor.sort.field}_${descriptor.sort.direction}]`])
  }
  if (descriptor.language !== undefined) {
    params.push(['language', String(descriptor.language)])
  }
  return params
}
