/**
 * Arrow IPC stream encoder.
 */

import { RecordBatch, RecordBatchStreamWriter, type Schema as ArrowSchema } from 'apache-arrow'
import type { ColumnLayout } from '../columnar/layout.js'
import { recordBatchFromRows, toArrowSchema } from '../columnar/arrow/type-system.js'

/** Continuation marker followed by a zero metadata length */
const END_OF_STREAM = Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0)

/** Size of a message's continuation marker and metadata length */
const MESSAGE_PREFIX_LENGTH = 8

/**
 * Encodes record batches into one Arrow IPC stream, handing out the bytes of
 * each batch as soon as it is written.
 *
 * Every batch is re-attached to the stream's own schema, so the stream carries
 * a single schema message however the batches were built.
 */
export class IpcStreamEncoder {
  readonly schema: ArrowSchema
  private batchCount = 0

  constructor(private readonly layout: ColumnLayout) {
    this.schema = toArrowSchema(layout)
  }

  /**
   * @returns The schema message (first batch only) and the batch's record batch message
   */
  writeBatch(batch: RecordBatch): Uint8Array {
    const stream = encodeStream(new RecordBatch(this.schema, batch.data))
    const start = this.batchCount === 0 ? 0 : schemaMessageLength(stream)
    this.batchCount++
    return stream.subarray(start, stream.length - END_OF_STREAM.length)
  }

  /**
   * Finish the stream. A stream without batches still gets its schema, carried
   * by an empty batch.
   */
  finish(): Uint8Array {
    if (this.batchCount === 0) {
      this.batchCount++
      return encodeStream(recordBatchFromRows(this.layout, [], this.schema))
    }
    return END_OF_STREAM.slice()
  }
}

/** A complete single-batch stream: schema, batch, end of stream */
function encodeStream(batch: RecordBatch): Uint8Array {
  const writer = new RecordBatchStreamWriter()
  writer.write(batch)
  writer.finish()
  return writer.toUint8Array(true)
}

/**
 * Length of the schema message that opens a stream. Schema messages have no
 * body, so this is the prefix plus the padded metadata length it declares.
 */
function schemaMessageLength(stream: Uint8Array): number {
  const view = new DataView(stream.buffer, stream.byteOffset, stream.byteLength)
  return MESSAGE_PREFIX_LENGTH + view.getInt32(4, true)
}
