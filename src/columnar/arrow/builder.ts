import type { Builder, Schema as ArrowSchema } from 'apache-arrow'
import type { Schema } from '../../schema/types.js'
import { BaseBatchBuilder } from '../builder.js'
import type { ColumnSpec } from '../layout.js'
import type { BatchBuilderOptions, CellRow } from '../types.js'
import { ArrowColumnarBatch } from './batch.js'
import { createColumnBuilders, sealRecordBatch, toArrowSchema, toArrowValue } from './type-system.js'

/**
 * Batch builder appending straight into apache-arrow column builders.
 *
 * @public
 */
export class ArrowBatchBuilder extends BaseBatchBuilder {
  private readonly arrowSchema: ArrowSchema
  private readonly builders: Builder[]
  private readonly columns: { readonly spec: ColumnSpec; readonly builder: Builder }[]

  constructor(schema: Schema, options: BatchBuilderOptions = {}) {
    super(schema, options)
    this.arrowSchema = toArrowSchema(this.layout)
    this.builders = createColumnBuilders(this.arrowSchema)
    this.columns = this.layout.columns.flatMap((spec, i) => {
      const builder = this.builders[i]
      return builder === undefined ? [] : [{ spec, builder }]
    })
  }

  protected pushRow(row: CellRow): void {
    for (const { spec, builder } of this.columns) {
      builder.append(toArrowValue(row[spec.name] ?? null, spec.type))
    }
  }

  protected seal(numRows: number): ArrowColumnarBatch {
    return new ArrowColumnarBatch(this.layout, sealRecordBatch(this.arrowSchema, this.builders, numRows))
  }
}
