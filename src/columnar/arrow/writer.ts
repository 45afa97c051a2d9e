import type { ColumnLayout } from '../layout.js'
import type { ColumnarBatch } from '../types.js'
import { BaseBatchWriter } from '../../writer/base.js'
import { IpcStreamEncoder } from '../../writer/ipc.js'
import { encodeNdjsonRows } from '../../writer/ndjson.js'
import { ParquetEncoder } from '../../writer/parquet.js'
import type { BatchWriterOptions } from '../../writer/types.js'
import { ArrowColumnarBatch } from './batch.js'

const NO_BYTES = new Uint8Array(0)

/**
 * Writer for Arrow-backed batches. Record batches go into the IPC stream as
 * they are; Parquet output reads them column by column.
 *
 * @public
 */
export class ArrowBatchWriter extends BaseBatchWriter<ArrowColumnarBatch> {
  private ipc: IpcStreamEncoder | undefined
  private parquet: ParquetEncoder | undefined

  constructor(options: BatchWriterOptions) {
    super('arrow', options)
  }

  protected isOwnBatch(batch: ColumnarBatch): batch is ArrowColumnarBatch {
    return batch instanceof ArrowColumnarBatch
  }

  protected encode(batch: ArrowColumnarBatch, layout: ColumnLayout): Uint8Array {
    switch (this.format) {
      case 'arrow-stream':
        return this.ipcEncoder(layout).writeBatch(batch.recordBatch)
      case 'ndjson':
        return encodeNdjsonRows(batch.toRows())
      case 'parquet':
        this.parquetEncoder(layout).writeBatch(batch.numRows, column => {
          const vector = batch.getColumn(column.name)
          return Array.from({ length: vector.length }, (_, i) => vector.get(i))
        })
        return NO_BYTES
    }
  }

  protected finishEncoding(layout: ColumnLayout): Uint8Array {
    switch (this.format) {
      case 'arrow-stream':
        return this.ipcEncoder(layout).finish()
      case 'ndjson':
        return NO_BYTES
      case 'parquet':
        return this.parquetEncoder(layout).finish()
    }
  }

  private ipcEncoder(layout: ColumnLayout): IpcStreamEncoder {
    this.ipc ??= new IpcStreamEncoder(layout)
    return this.ipc
  }

  private parquetEncoder(layout: ColumnLayout): ParquetEncoder {
    this.parquet ??= new ParquetEncoder(layout, { compression: this.compression, rowGroupSize: this.rowGroupSize })
    return this.parquet
  }
}
