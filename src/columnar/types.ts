/**
 * Columnar Contracts
 *
 * Backend-neutral description of batches, builders and backends. The schema
 * resolver, query builder and record parser never see anything below this line;
 * each columnar runtime supplies its own realization.
 */

import type { RecordTree } from '../record/types.js'
import type { Schema } from '../schema/types.js'
import type { ColumnLayout } from './layout.js'
import type { BatchWriter, BatchWriterOptions } from '../writer/types.js'

// =============================================================================
// CELL VALUES
// =============================================================================

/**
 * A coerced scalar. Dates and datetimes are UTC `Date`s.
 *
 * @public
 */
export type ScalarValue = number | boolean | string | Date

/**
 * Value of one cell: a scalar, null, or the rows of a nested list column.
 *
 * @public
 */
export type CellValue = ScalarValue | null | readonly CellRow[]

/**
 * One row of a batch, or one element of a nested list: column name to value.
 *
 * @public
 */
export interface CellRow {
  readonly [column: string]: CellValue
}

/** Narrow a cell to the rows of a nested list */
export function isCellRows(value: CellValue): value is readonly CellRow[] {
  return Array.isArray(value)
}

// =============================================================================
// BATCHES AND BUILDERS
// =============================================================================

/**
 * Names of the two columnar runtimes.
 *
 * - `arrow`: apache-arrow builders, vectors and record batches
 * - `native`: plain growable column arrays laid out for the Parquet encoder
 *
 * @public
 */
export type BackendName = 'arrow' | 'native'

/** All backend names */
export const BACKEND_NAMES: readonly BackendName[] = ['arrow', 'native']

/**
 * Read access to one column of a finished batch.
 *
 * @public
 */
export interface ColumnVector {
  readonly name: string
  readonly length: number
  get(index: number): CellValue
}

/**
 * A finished, immutable batch. Every column has `numRows` entries.
 *
 * @public
 */
export interface ColumnarBatch {
  readonly backend: BackendName
  readonly layout: ColumnLayout
  readonly numRows: number
  /** @throws {ValidationError} For a name that is not in the layout */
  getColumn(name: string): ColumnVector
  /** Materialize every row, in order */
  toRows(): CellRow[]
}

/**
 * Construction options of a batch builder.
 *
 * @public
 */
export interface BatchBuilderOptions {
  /** Explode association fields into repeated top-level rows. Default: false */
  readonly flatten?: boolean | undefined
}

/**
 * Incrementally builds one batch from record trees.
 *
 * `append` either adds every row a record produces or throws without adding any.
 * `finish` may be called once; any later `append` throws BuilderStateError.
 *
 * @public
 */
export interface BatchBuilder {
  readonly schema: Schema
  readonly layout: ColumnLayout
  readonly flatten: boolean
  readonly numRows: number
  readonly finished: boolean
  /**
   * @returns Number of rows added (more than one when flattening explodes an association)
   * @throws {CoercionError} When a value does not fit its field
   * @throws {BuilderStateError} After finish()
   */
  append(tree: RecordTree): number
  finish(): ColumnarBatch
}

/**
 * A columnar runtime: its builder and its writer.
 *
 * @public
 */
export interface ColumnarBackend {
  readonly name: BackendName
  createBuilder(schema: Schema, options?: BatchBuilderOptions): BatchBuilder
  createWriter(options: BatchWriterOptions): BatchWriter
}
