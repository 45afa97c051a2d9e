/**
 * Batch Writer Types
 *
 * Output formats, writer options and the append-only writer contract shared
 * by both columnar backends.
 */

import type { ColumnLayout } from '../columnar/layout.js'
import type { ColumnarBatch } from '../columnar/types.js'
import type { OutputSink } from '../storage/types.js'

// =============================================================================
// FORMATS
// =============================================================================

/**
 * Output formats.
 *
 * - `arrow-stream`: Arrow IPC streaming format, one record batch per written batch
 * - `parquet`: Parquet file, one row group per written batch
 * - `ndjson`: one JSON object per row; carries no layout
 *
 * @public
 */
export type OutputFormat = 'arrow-stream' | 'parquet' | 'ndjson'

/** All output formats */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['arrow-stream', 'parquet', 'ndjson']

/**
 * Parquet compression codecs. Ignored by the Arrow stream format.
 *
 * @public
 */
export type CompressionCodec = 'UNCOMPRESSED' | 'SNAPPY'

/** Default Parquet codec */
export const DEFAULT_COMPRESSION: CompressionCodec = 'SNAPPY'

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Where a writer puts its file.
 *
 * @public
 */
export interface OutputTarget {
  readonly sink: OutputSink
  /** Path handed to the sink; ignored by a stream sink */
  readonly path: string
}

/**
 * @public
 */
export interface BatchWriterOptions {
  readonly format: OutputFormat
  readonly target: OutputTarget
  /** Parquet codec. Default: SNAPPY */
  readonly compression?: CompressionCodec | undefined
  /**
   * Expected layout. When set, the first batch is checked against it too;
   * otherwise the first written batch fixes the layout.
   */
  readonly layout?: ColumnLayout | undefined
  /** Maximum rows per Parquet row group. Default: the batch size */
  readonly rowGroupSize?: number | undefined
}

// =============================================================================
// WRITER
// =============================================================================

/**
 * Totals reported by `close()`.
 *
 * @public
 */
export interface WriteSummary {
  readonly format: OutputFormat
  readonly path: string
  readonly batchesWritten: number
  readonly rowsWritten: number
  readonly bytesWritten: number
}

/**
 * Append-only batch writer.
 *
 * Batches are encoded as they arrive. Arrow streams and NDJSON reach the sink
 * batch by batch; Parquet needs its footer, so the file goes out on `close()`.
 * A rejected `write` leaves earlier batches intact, so closing after a drift
 * or encoding error still persists everything accepted.
 *
 * @public
 */
export interface BatchWriter {
  readonly format: OutputFormat
  readonly closed: boolean
  readonly batchesWritten: number
  readonly rowsWritten: number
  /**
   * Encode a batch and pass its bytes to the sink. Bytes reach the sink in
   * call order even when writes overlap.
   *
   * @throws {WriteError} SCHEMA_DRIFT when the layout differs from the first batch,
   * CLOSED after close(), ENCODE_FAILURE when the batch cannot be encoded,
   * SINK_FAILURE when the sink rejects the bytes (every later call fails with it too)
   */
  write(batch: ColumnarBatch): Promise<void>
  /**
   * Finish the file and hand the rest of it to the sink. Calling it again
   * returns the same summary.
   *
   * @throws {WriteError} SINK_FAILURE when the sink rejects the file
   */
  close(): Promise<WriteSummary>
}
