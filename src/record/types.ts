/**
 * Record Tree Types
 *
 * Schema-agnostic decoded form of one record. Values stay raw text until
 * the batch builder coerces them against a field kind.
 */

/**
 * A decoded field value.
 *
 * - `string`: raw scalar text
 * - `null`: explicit null (JSON `null`)
 * - `RecordTree`: a nested record
 * - `RecordTree[]`: association elements, or `{ languageId, value }` entries of a translated field
 *
 * @public
 */
export type RecordValue = string | null | RecordTree | readonly RecordTree[]

/**
 * One decoded record: field name to raw value.
 *
 * @public
 */
export interface RecordTree extends ReadonlyMap<string, RecordValue> {}

/** Key of the language identifier in a translated entry */
export const LANGUAGE_ID_KEY = 'languageId'

/** Key of the text in a translated entry */
export const LANGUAGE_VALUE_KEY = 'value'

/** Type guard for association and translated lists */
export function isRecordList(value: RecordValue | undefined): value is readonly RecordTree[] {
  return Array.isArray(value)
}

/** Type guard for nested records */
export function isRecordTree(value: RecordValue | undefined): value is RecordTree {
  return value instanceof Map
}

/** Build a record tree from entries */
export function recordTree(entries: Iterable<readonly [string, RecordValue]>): RecordTree {
  return new Map(entries)
}
