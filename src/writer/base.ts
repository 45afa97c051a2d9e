/**
 * Shared writer state machine: drift guard, counters, close-once semantics,
 * ordered delivery to the sink and error classification. Backends supply the
 * encoding.
 */

import { ValidationError, WriteError, isWriteError } from '../errors.js'
import { type ColumnLayout, describeLayout, sameLayout } from '../columnar/layout.js'
import type { BackendName, ColumnarBatch } from '../columnar/types.js'
import { getLogger } from '../utils/index.js'
import {
  type BatchWriter,
  type BatchWriterOptions,
  type CompressionCodec,
  type OutputFormat,
  type OutputTarget,
  type WriteSummary,
  DEFAULT_COMPRESSION,
} from './types.js'

/**
 * Base class for backend writers.
 *
 * @typeParam TBatch - Batch type the backend's builder produces
 */
export abstract class BaseBatchWriter<TBatch extends ColumnarBatch> implements BatchWriter {
  readonly format: OutputFormat
  protected readonly compression: CompressionCodec
  protected readonly rowGroupSize: number | undefined

  private readonly target: OutputTarget
  private layout: ColumnLayout | undefined
  private batchCount = 0
  private rowCount = 0
  private byteCount = 0
  /** Set once the first chunk reached the sink; later chunks are appended */
  private started = false
  private pending: Promise<void> = Promise.resolve()
  private summary: Promise<WriteSummary> | undefined

  constructor(
    protected readonly backend: BackendName,
    options: BatchWriterOptions
  ) {
    if (options.rowGroupSize !== undefined && (!Number.isInteger(options.rowGroupSize) || options.rowGroupSize <= 0)) {
      throw new ValidationError('rowGroupSize must be a positive integer', 'rowGroupSize', options.rowGroupSize)
    }
    this.format = options.format
    this.target = options.target
    this.compression = options.compression ?? DEFAULT_COMPRESSION
    this.rowGroupSize = options.rowGroupSize
    this.layout = options.layout
  }

  get closed(): boolean {
    return this.summary !== undefined
  }

  get batchesWritten(): number {
    return this.batchCount
  }

  get rowsWritten(): number {
    return this.rowCount
  }

  async write(batch: ColumnarBatch): Promise<void> {
    if (this.closed) {
      throw new WriteError('write() called after close()', 'CLOSED')
    }
    if (!this.isOwnBatch(batch)) {
      throw new WriteError(`the ${this.backend} writer cannot encode a ${batch.backend} batch`, 'ENCODE_FAILURE')
    }

    const layout = this.layout ?? batch.layout
    if (!sameLayout(layout, batch.layout)) {
      throw new WriteError(
        `batch layout differs from the output layout\n  expected: ${describeLayout(layout)}\n  actual:   ${describeLayout(batch.layout)}`,
        'SCHEMA_DRIFT'
      )
    }

    let chunk: Uint8Array
    try {
      chunk = this.encode(batch, layout)
    } catch (error) {
      if (isWriteError(error)) throw error
      throw new WriteError(`failed to encode batch: ${messageOf(error)}`, 'ENCODE_FAILURE', error)
    }

    this.layout = layout
    this.batchCount++
    this.rowCount += batch.numRows
    if (chunk.length > 0) {
      await this.enqueue(chunk)
    } else {
      await this.pending
    }
  }

  close(): Promise<WriteSummary> {
    if (this.summary === undefined) {
      this.summary = this.finalize()
    }
    return this.summary
  }

  private async finalize(): Promise<WriteSummary> {
    const layout = this.layout
    if (layout === undefined) {
      throw new WriteError('cannot close a writer that has neither a layout nor a batch', 'ENCODE_FAILURE')
    }

    let rest: Uint8Array
    try {
      rest = this.finishEncoding(layout)
    } catch (error) {
      throw new WriteError(`failed to finish ${this.format} output: ${messageOf(error)}`, 'ENCODE_FAILURE', error)
    }

    await this.pending
    // an empty output still creates its file
    if (rest.length > 0 || !this.started) {
      await this.enqueue(rest)
    }

    getLogger().debug(
      `[Writer] ${this.target.path}: ${this.batchCount} batch(es), ${this.rowCount} row(s), ${this.byteCount} bytes (${this.format})`
    )

    return {
      format: this.format,
      path: this.target.path,
      batchesWritten: this.batchCount,
      rowsWritten: this.rowCount,
      bytesWritten: this.byteCount,
    }
  }

  /** Chain a chunk behind the ones already handed to the sink */
  private enqueue(chunk: Uint8Array): Promise<void> {
    this.pending = this.pending.then(() => this.send(chunk))
    return this.pending
  }

  private async send(chunk: Uint8Array): Promise<void> {
    const { sink, path } = this.target
    try {
      if (this.started) {
        await sink.append(path, chunk)
      } else {
        await sink.write(path, chunk)
      }
    } catch (error) {
      throw new WriteError(`failed to write ${path}: ${messageOf(error)}`, 'SINK_FAILURE', error)
    }
    this.started = true
    this.byteCount += chunk.length
  }

  /** Narrow a batch to the backend's own batch type */
  protected abstract isOwnBatch(batch: ColumnarBatch): batch is TBatch

  /**
   * Encode one batch whose layout has already been checked.
   *
   * @returns Bytes ready for the sink; empty when the format holds them until close
   */
  protected abstract encode(batch: TBatch, layout: ColumnLayout): Uint8Array

  /** Bytes that complete the output after everything `encode` returned */
  protected abstract finishEncoding(layout: ColumnLayout): Uint8Array
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
