/**
 * Batch writer module
 *
 * Creates backend writers and reads finished outputs back. Arrow streams and
 * Parquet files embed the column layout, so they read back without the schema
 * that produced them. NDJSON is plain rows.
 *
 * @module writer
 */

import { tableFromIPC } from 'apache-arrow'
import { parquetMetadata, parquetReadObjects } from 'hyparquet'
import { ValidationError } from '../errors.js'
import { getBackend } from '../columnar/index.js'
import { type ColumnLayout, LAYOUT_METADATA_KEY, parseLayout } from '../columnar/layout.js'
import { fromArrowValue } from '../columnar/arrow/type-system.js'
import { fromParquetValue } from '../columnar/native/type-system.js'
import type { BackendName, CellRow, CellValue, ColumnarBackend } from '../columnar/types.js'
import type { OutputSink } from '../storage/types.js'
import type { BatchWriter, CompressionCodec, OutputFormat } from './types.js'

export * from './types.js'
export { BaseBatchWriter } from './base.js'
export { IpcStreamEncoder } from './ipc.js'
export { ParquetEncoder, type ParquetEncoderOptions } from './parquet.js'
export { encodeNdjsonRows } from './ndjson.js'

// =============================================================================
// WRITER FACTORY
// =============================================================================

/** File name used when no path is given */
export const DEFAULT_OUTPUT_PATHS: Readonly<Record<OutputFormat, string>> = {
  'arrow-stream': 'output.arrows',
  parquet: 'output.parquet',
  ndjson: 'output.ndjson',
}

/**
 * @public
 */
export interface CreateBatchWriterOptions {
  /** Backend whose batches the writer takes */
  readonly backend: BackendName | ColumnarBackend
  readonly format: OutputFormat
  readonly sink: OutputSink
  /** Path handed to the sink. Default: `output.` plus `arrows`, `parquet` or `ndjson` */
  readonly path?: string | undefined
  readonly compression?: CompressionCodec | undefined
  readonly layout?: ColumnLayout | undefined
  readonly rowGroupSize?: number | undefined
}

/**
 * Create an append-only writer for one output file.
 *
 * @example
 * ```typescript
 * const writer = createBatchWriter({ backend: 'native', format: 'parquet', sink: new MemoryStorage() })
 * await writer.write(builder.finish())
 * const summary = await writer.close()
 * ```
 */
export function createBatchWriter(options: CreateBatchWriterOptions): BatchWriter {
  const backend = typeof options.backend === 'string' ? getBackend(options.backend) : options.backend
  return backend.createWriter({
    format: options.format,
    target: { sink: options.sink, path: options.path ?? DEFAULT_OUTPUT_PATHS[options.format] },
    compression: options.compression,
    layout: options.layout,
    rowGroupSize: options.rowGroupSize,
  })
}

// =============================================================================
// READ-BACK
// =============================================================================

/**
 * Layout and rows recovered from an output file.
 *
 * @public
 */
export interface DecodedOutput {
  readonly layout: ColumnLayout
  readonly rows: CellRow[]
}

/**
 * Decode an Arrow IPC stream written by this library.
 *
 * @throws {ValidationError} When the stream has no embedded layout or a column is missing
 */
export function readArrowStream(bytes: Uint8Array): DecodedOutput {
  const table = tableFromIPC(bytes)
  const text = table.schema.metadata.get(LAYOUT_METADATA_KEY)
  if (text === undefined) {
    throw new ValidationError(`Arrow stream has no '${LAYOUT_METADATA_KEY}' metadata`, 'bytes')
  }
  const layout = parseLayout(text)

  const columns = layout.columns.map(spec => {
    const vector = table.getChild(spec.name)
    if (vector === null) {
      throw new ValidationError(`Arrow stream is missing column '${spec.name}'`, 'bytes', spec.name)
    }
    return { spec, vector }
  })

  const rows: CellRow[] = []
  for (let i = 0; i < table.numRows; i++) {
    const row: Record<string, CellValue> = {}
    for (const { spec, vector } of columns) {
      row[spec.name] = fromArrowValue(vector.get(i), spec.type)
    }
    rows.push(row)
  }
  return { layout, rows }
}

/**
 * Decode a Parquet file written by this library.
 *
 * @throws {ValidationError} When the file has no embedded layout
 */
export async function readParquet(bytes: Uint8Array): Promise<DecodedOutput> {
  const file = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(file).set(bytes)

  const metadata = parquetMetadata(file)
  const text = metadata.key_value_metadata?.find(entry => entry.key === LAYOUT_METADATA_KEY)?.value
  if (text === undefined) {
    throw new ValidationError(`Parquet file has no '${LAYOUT_METADATA_KEY}' metadata`, 'bytes')
  }
  const layout = parseLayout(text)
  if (Number(metadata.num_rows) === 0) {
    return { layout, rows: [] }
  }

  const raw = await parquetReadObjects({ file, metadata })
  const rows = raw.map(record => {
    const row: Record<string, CellValue> = {}
    for (const spec of layout.columns) {
      row[spec.name] = fromParquetValue(record[spec.name], spec.type)
    }
    return row
  })
  return { layout, rows }
}
