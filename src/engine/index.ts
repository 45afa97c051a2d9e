/**
 * Conversion Engine
 *
 * One run: resolve the schema, validate the query, page through the listing
 * in order, append every page to the current batch and hand full batches to
 * the writer.
 *
 * Pages are requested up to `prefetch` ahead of the page being appended but
 * are appended strictly in order, one at a time. Cancellation is checked at
 * page boundaries, so a page is appended completely or not at all.
 *
 * @module engine
 */

import { CoercionError, ParseError, RunCancelledError, ValidationError } from '../errors.js'
import { DEFAULT_BACKEND, getBackend } from '../columnar/index.js'
import type { BackendName, BatchBuilder, ColumnarBackend } from '../columnar/types.js'
import { type QueryConstraints, buildQuery, createRecordFilter, projectSchema } from '../query/index.js'
import { type RecordTree, parsePage } from '../record/index.js'
import { type Schema, type UnknownHintPolicy, resolveSchema } from '../schema/index.js'
import type { OutputSink } from '../storage/types.js'
import { type FetchedPage, type PageToken, type Transport, firstPageToken, nextPageToken } from '../transport/types.js'
import { getLogger } from '../utils/index.js'
import { type CompressionCodec, type OutputFormat, DEFAULT_OUTPUT_PATHS, createBatchWriter } from '../writer/index.js'

// =============================================================================
// OPTIONS
// =============================================================================

/** Default pages requested ahead of the one being appended */
export const DEFAULT_PREFETCH = 1

/** Largest prefetch window */
export const MAX_PREFETCH = 4

/** Default records per request */
export const DEFAULT_PAGE_SIZE = 1000

/** Default rows per batch before it is handed to the writer */
export const DEFAULT_BATCH_ROWS = 50_000

/** Default output format */
export const DEFAULT_FORMAT: OutputFormat = 'parquet'

/**
 * @public
 */
export interface RunTarget {
  readonly sink: OutputSink
  /** Default: `output.arrows` or `output.parquet` */
  readonly path?: string | undefined
}

/**
 * @public
 */
export interface RunOptions {
  readonly transport: Transport
  /** Default: 'arrow' */
  readonly backend?: BackendName | ColumnarBackend | undefined
  /** Default: 'parquet' */
  readonly format?: OutputFormat | undefined
  /** Explode associations into rows. Default: false */
  readonly flatten?: boolean | undefined
  readonly compression?: CompressionCodec | undefined
  /** Pages requested ahead, 1 to 4. Default: 1 */
  readonly prefetch?: number | undefined
  /** Records per request. Default: 1000 */
  readonly pageSize?: number | undefined
  /** Rows per batch; checked at page boundaries. Default: 50000 */
  readonly batchRows?: number | undefined
  readonly unknownHints?: UnknownHintPolicy | undefined
  /** Already resolved schema; skips the synopsis request */
  readonly schema?: Schema | undefined
  readonly signal?: AbortSignal | undefined
}

/**
 * @public
 */
export interface RunSummary {
  readonly resourceType: string
  readonly rowsWritten: number
  readonly batchesFlushed: number
  readonly pagesFetched: number
  /** Records decoded from pages, before local filtering */
  readonly recordsRead: number
  readonly bytesWritten: number
  readonly path: string
}

interface ResolvedRunOptions {
  transport: Transport
  backend: ColumnarBackend
  format: OutputFormat
  flatten: boolean
  compression: CompressionCodec | undefined
  prefetch: number
  pageSize: number
  batchRows: number
  unknownHints: UnknownHintPolicy | undefined
  schema: Schema | undefined
  signal: AbortSignal | undefined
}

function resolveOptions(options: RunOptions): ResolvedRunOptions {
  const prefetch = options.prefetch ?? DEFAULT_PREFETCH
  if (!Number.isInteger(prefetch) || prefetch < 1 || prefetch > MAX_PREFETCH) {
    throw new ValidationError(`prefetch must be an integer from 1 to ${MAX_PREFETCH}`, 'prefetch', prefetch)
  }
  const pageSize = positiveInteger('pageSize', options.pageSize ?? DEFAULT_PAGE_SIZE)
  const batchRows = positiveInteger('batchRows', options.batchRows ?? DEFAULT_BATCH_ROWS)
  const backend = options.backend ?? DEFAULT_BACKEND

  return {
    transport: options.transport,
    backend: typeof backend === 'string' ? getBackend(backend) : backend,
    format: options.format ?? DEFAULT_FORMAT,
    flatten: options.flatten ?? false,
    compression: options.compression,
    prefetch,
    pageSize,
    batchRows,
    unknownHints: options.unknownHints,
    schema: options.schema,
    signal: options.signal,
  }
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer`, name, value)
  }
  return value
}

// =============================================================================
// PAGE FETCHING
// =============================================================================

/** Settled fetch, so a prefetched page that is never awaited cannot reject unhandled */
type FetchOutcome = { readonly ok: true; readonly page: FetchedPage } | { readonly ok: false; readonly error: unknown }

interface PendingPage {
  readonly token: PageToken
  readonly outcome: Promise<FetchOutcome>
}

function settle(promise: Promise<FetchedPage>): Promise<FetchOutcome> {
  return promise.then(
    page => ({ ok: true, page }),
    (error: unknown) => ({ ok: false, error })
  )
}

// =============================================================================
// RUN
// =============================================================================

/**
 * Convert one resource type's listing into a columnar output.
 *
 * Schema and query errors surface before any page is requested. A parse,
 * coercion or transport error fails the run; batches handed to the writer
 * before the failure are still written out.
 *
 * @throws {SchemaError} When the synopsis cannot be resolved
 * @throws {QueryError} When the constraints do not fit the schema
 * @throws {ParseError} When a page is malformed; `page` is the page's record offset
 * @throws {CoercionError} When a value does not fit its field
 * @throws {TransportError} When a request fails after its retries
 * @throws {WriteError} When the output cannot be encoded or stored
 * @throws {RunCancelledError} When `signal` aborts the run
 *
 * @example
 * ```typescript
 * const summary = await run(
 *   'products',
 *   { fields: ['reference', 'price'], limit: { count: 500 } },
 *   { sink: new FileSystemStorage({ path: './out' }), path: 'products.parquet' },
 *   { transport, format: 'parquet', flatten: true }
 * )
 * console.log(`${summary.rowsWritten} rows in ${summary.batchesFlushed} batch(es)`)
 * ```
 */
export async function run(
  resourceType: string,
  constraints: QueryConstraints,
  target: RunTarget,
  options: RunOptions
): Promise<RunSummary> {
  const opts = resolveOptions(options)
  const logger = getLogger()
  const { transport, backend, signal } = opts

  if (signal?.aborted === true) {
    throw new RunCancelledError(0, signal.reason)
  }

  const schema =
    opts.schema ??
    resolveSchema(resourceType, await transport.fetchSchema(resourceType, { signal }), { unknownHints: opts.unknownHints })
  const descriptor = buildQuery(schema, constraints)
  const outputSchema = projectSchema(schema, descriptor.selectedFields)
  const keep = createRecordFilter(descriptor, schema)

  let builder: BatchBuilder = backend.createBuilder(outputSchema, { flatten: opts.flatten })
  const writer = createBatchWriter({
    backend,
    format: opts.format,
    sink: target.sink,
    path: target.path ?? DEFAULT_OUTPUT_PATHS[opts.format],
    compression: opts.compression,
    layout: builder.layout,
  })

  // Aborted when the caller aborts, and when the run ends with requests still in flight
  const controller = new AbortController()
  const forwardAbort = () => controller.abort(signal?.reason)
  signal?.addEventListener('abort', forwardAbort, { once: true })

  const pending: PendingPage[] = []
  let nextToken = firstPageToken(descriptor, opts.pageSize)
  const schedule = (capacity: number) => {
    while (pending.length < capacity && nextToken !== null) {
      const token = nextToken
      pending.push({ token, outcome: settle(transport.fetchPage(descriptor, token, { signal: controller.signal })) })
      nextToken = nextPageToken(descriptor, token)
    }
  }

  let pagesFetched = 0
  let recordsRead = 0
  let failed = true

  try {
    schedule(1)
    for (let head = pending.shift(); head !== undefined; head = pending.shift()) {
      schedule(opts.prefetch)
      const outcome = await head.outcome
      if (signal?.aborted === true) {
        throw new RunCancelledError(pagesFetched, signal.reason)
      }
      if (!outcome.ok) throw outcome.error
      pagesFetched++

      const page = head.token.offset
      let records: RecordTree[]
      try {
        records = parsePage(outcome.page.body, transport.encoding, schema)
        for (const record of records) {
          if (keep(record)) builder.append(record)
        }
      } catch (error) {
        if (error instanceof ParseError || error instanceof CoercionError) throw error.withPage(page)
        throw error
      }
      recordsRead += records.length
      logger.debug(`[Engine] ${resourceType}: page at offset ${page} held ${records.length} record(s)`)

      if (records.length < head.token.count || outcome.page.next === null) break

      if (builder.numRows >= opts.batchRows) {
        await writer.write(builder.finish())
        builder = backend.createBuilder(outputSchema, { flatten: opts.flatten })
      }
    }

    if (builder.numRows > 0 || writer.batchesWritten === 0) {
      await writer.write(builder.finish())
    }
    const written = await writer.close()
    failed = false

    logger.info(
      `[Engine] ${resourceType}: ${written.rowsWritten} row(s) in ${written.batchesWritten} batch(es) from ${pagesFetched} page(s) to ${written.path}`
    )
    return {
      resourceType,
      rowsWritten: written.rowsWritten,
      batchesFlushed: written.batchesWritten,
      pagesFetched,
      recordsRead,
      bytesWritten: written.bytesWritten,
      path: written.path,
    }
  } finally {
    signal?.removeEventListener('abort', forwardAbort)
    controller.abort()
    if (failed && !writer.closed && writer.batchesWritten > 0) {
      // Batches accepted before the failure still make a valid output
      await writer.close().then(
        summary => logger.warn(`[Engine] ${resourceType}: run failed, kept ${summary.rowsWritten} row(s) in ${summary.path}`),
        (closeError: unknown) => logger.warn(`[Engine] ${resourceType}: could not close output after failure: ${String(closeError)}`)
      )
    }
  }
}
