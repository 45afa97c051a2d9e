import type { ColumnLayout } from '../layout.js'
import type { ColumnarBatch } from '../types.js'
import { recordBatchFromRows } from '../arrow/type-system.js'
import { BaseBatchWriter } from '../../writer/base.js'
import { IpcStreamEncoder } from '../../writer/ipc.js'
import { encodeNdjsonRows } from '../../writer/ndjson.js'
import { ParquetEncoder } from '../../writer/parquet.js'
import type { BatchWriterOptions } from '../../writer/types.js'
import { NativeColumnarBatch } from './batch.js'

const NO_BYTES = new Uint8Array(0)

/**
 * Writer for native batches. Column arrays go to hyparquet-writer as they are;
 * the Arrow stream and NDJSON are built from the batch's rows.
 *
 * @public
 */
export class NativeBatchWriter extends BaseBatchWriter<NativeColumnarBatch> {
  private ipc: IpcStreamEncoder | undefined
  private parquet: ParquetEncoder | undefined

  constructor(options: BatchWriterOptions) {
    super('native', options)
  }

  protected isOwnBatch(batch: ColumnarBatch): batch is NativeColumnarBatch {
    return batch instanceof NativeColumnarBatch
  }

  protected encode(batch: NativeColumnarBatch, layout: ColumnLayout): Uint8Array {
    switch (this.format) {
      case 'arrow-stream': {
        const encoder = this.ipcEncoder(layout)
        return encoder.writeBatch(recordBatchFromRows(layout, batch.toRows(), encoder.schema))
      }
      case 'ndjson':
        return encodeNdjsonRows(batch.toRows())
      case 'parquet':
        this.parquetEncoder(layout).writeBatch(batch.numRows, column => batch.values(column.name))
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
