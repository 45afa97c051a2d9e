/**
 * Parquet encoder on top of hyparquet-writer.
 */

import { ByteWriter, ParquetWriter } from 'hyparquet-writer'
import { type ColumnLayout, type ColumnSpec, LAYOUT_METADATA_KEY, serializeLayout } from '../columnar/layout.js'
import { toParquetSchema, toParquetValue } from '../columnar/native/type-system.js'
import type { CellValue } from '../columnar/types.js'
import type { CompressionCodec } from './types.js'

/**
 * @public
 */
export interface ParquetEncoderOptions {
  readonly compression: CompressionCodec
  /** Maximum rows per row group. Default: one row group per batch */
  readonly rowGroupSize?: number | undefined
}

/**
 * Streams batches into row groups of a single Parquet file. The column layout
 * is embedded as key-value metadata.
 */
export class ParquetEncoder {
  private readonly writer = new ByteWriter()
  private readonly parquet: ParquetWriter
  private readonly rowGroupSize: number | undefined

  constructor(
    private readonly layout: ColumnLayout,
    options: ParquetEncoderOptions
  ) {
    this.rowGroupSize = options.rowGroupSize
    const writerOptions = {
      writer: this.writer,
      schema: toParquetSchema(layout),
      codec: options.compression,
      kvMetadata: [{ key: LAYOUT_METADATA_KEY, value: serializeLayout(layout) }],
    }
    this.parquet = new ParquetWriter(writerOptions)
  }

  /**
   * Write one batch as row groups.
   *
   * @param valuesOf - The batch's values for a column, one per row
   */
  writeBatch(numRows: number, valuesOf: (column: ColumnSpec) => readonly CellValue[]): void {
    if (numRows === 0) return
    const columnData = this.layout.columns.map(column => ({
      name: column.name,
      data: valuesOf(column).map(value => toParquetValue(value, column.type)),
    }))
    this.parquet.write({ columnData, rowGroupSize: this.rowGroupSize ?? numRows })
  }

  finish(): Uint8Array {
    this.parquet.finish()
    return new Uint8Array(this.writer.getBuffer())
  }
}
