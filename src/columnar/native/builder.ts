import type { Schema } from '../../schema/types.js'
import { BaseBatchBuilder } from '../builder.js'
import type { BatchBuilderOptions, CellRow, CellValue } from '../types.js'
import { NativeColumnarBatch } from './batch.js'

/**
 * Batch builder over growable JS arrays, one per column.
 *
 * @public
 */
export class NativeBatchBuilder extends BaseBatchBuilder {
  private readonly columns = new Map<string, CellValue[]>()

  constructor(schema: Schema, options: BatchBuilderOptions = {}) {
    super(schema, options)
    for (const column of this.layout.columns) {
      this.columns.set(column.name, [])
    }
  }

  protected pushRow(row: CellRow): void {
    for (const [name, values] of this.columns) {
      values.push(row[name] ?? null)
    }
  }

  protected seal(numRows: number): NativeColumnarBatch {
    return new NativeColumnarBatch(this.layout, numRows, this.columns)
  }
}
