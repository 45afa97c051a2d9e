/**
 * Shared builder state machine. Backends only say how a materialized row is
 * stored and how stored rows become a batch.
 */

import { BuilderStateError } from '../errors.js'
import type { RecordTree } from '../record/types.js'
import type { Schema } from '../schema/types.js'
import { type ColumnLayout, deriveLayout } from './layout.js'
import { materializeRows } from './rows.js'
import type { BatchBuilder, BatchBuilderOptions, CellRow, ColumnarBatch } from './types.js'

/**
 * Base class for backend builders.
 *
 * Every row of a record is materialized (and coerced) before the first one is
 * pushed, so a CoercionError leaves the builder exactly as it was.
 */
export abstract class BaseBatchBuilder implements BatchBuilder {
  readonly schema: Schema
  readonly layout: ColumnLayout
  readonly flatten: boolean

  private rowCount = 0
  private done = false

  constructor(schema: Schema, options: BatchBuilderOptions = {}) {
    this.schema = schema
    this.flatten = options.flatten ?? false
    this.layout = deriveLayout(schema, this.flatten)
  }

  get numRows(): number {
    return this.rowCount
  }

  get finished(): boolean {
    return this.done
  }

  append(tree: RecordTree): number {
    if (this.done) {
      throw new BuilderStateError('append() called after finish()')
    }
    const rows = materializeRows(tree, this.schema, this.flatten)
    for (const row of rows) {
      this.pushRow(row)
    }
    this.rowCount += rows.length
    return rows.length
  }

  finish(): ColumnarBatch {
    if (this.done) {
      throw new BuilderStateError('finish() called twice')
    }
    this.done = true
    return this.seal(this.rowCount)
  }

  /** Store one row whose values already match the layout */
  protected abstract pushRow(row: CellRow): void

  /** Turn the stored rows into an immutable batch */
  protected abstract seal(numRows: number): ColumnarBatch
}
