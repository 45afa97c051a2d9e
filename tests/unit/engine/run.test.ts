/**
 * Engine Tests
 *
 * Runs against FakeTransport and MemoryStorage: paging, prefetch, filtering,
 * batching, cancellation and failure handling.
 */

import { type Mock, afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import {
  CoercionError,
  ParseError,
  QueryError,
  RunCancelledError,
  TransportError,
  ValidationError,
} from '../../../src/errors.js'
import { run } from '../../../src/engine/index.js'
import { MemoryStorage } from '../../../src/storage/index.js'
import { defaultLogger, setLogger } from '../../../src/utils/index.js'
import { readArrowStream, readParquet } from '../../../src/writer/index.js'
import { FakeTransport, PRODUCTS_XML, productSchema } from '../fixtures.js'

type LogFn = (message: string, ...args: unknown[]) => void

let logger: { debug: Mock<LogFn>; info: Mock<LogFn>; warn: Mock<LogFn>; error: Mock<LogFn> }

beforeEach(() => {
  logger = { debug: vi.fn<LogFn>(), info: vi.fn<LogFn>(), warn: vi.fn<LogFn>(), error: vi.fn<LogFn>() }
  setLogger(logger)
})

afterEach(() => {
  setLogger(defaultLogger)
})

async function readIds(sink: MemoryStorage, path = 'out.parquet'): Promise<unknown[]> {
  const { rows } = await readParquet(await sink.read(path))
  return rows.map(row => row['id'])
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i)
}

// =============================================================================
// Paging
// =============================================================================

describe('run', () => {
  it('pages through the listing until a short page', async () => {
    const transport = new FakeTransport(25)
    const sink = new MemoryStorage()

    const summary = await run('products', {}, { sink, path: 'out.parquet' }, { transport, pageSize: 10 })

    expect(summary).toEqual({
      resourceType: 'products',
      rowsWritten: 25,
      batchesFlushed: 1,
      pagesFetched: 3,
      recordsRead: 25,
      bytesWritten: (await sink.read('out.parquet')).length,
      path: 'out.parquet',
    })
    expect(transport.schemaRequests).toBe(1)
    expect(transport.requests).toEqual([
      { offset: 0, count: 10 },
      { offset: 10, count: 10 },
      { offset: 20, count: 10 },
      { offset: 30, count: 10 },
    ])
    expect(await readIds(sink)).toEqual(range(1, 25))
    expect(logger.info).toHaveBeenCalledWith('[Engine] products: 25 row(s) in 1 batch(es) from 3 page(s) to out.parquet')
  })

  it('requests windows inside the limit', async () => {
    const transport = new FakeTransport(100)
    const sink = new MemoryStorage()

    const summary = await run('products', { limit: { offset: 5, count: 12 } }, { sink, path: 'out.parquet' }, { transport, pageSize: 10 })

    expect(transport.requests).toEqual([
      { offset: 5, count: 10 },
      { offset: 15, count: 2 },
    ])
    expect(summary.rowsWritten).toBe(12)
    expect(summary.pagesFetched).toBe(2)
    expect(await readIds(sink)).toEqual(range(6, 17))
  })

  it('keeps up to prefetch pages in flight', async () => {
    const transport = new FakeTransport(25)

    await run('products', {}, { sink: new MemoryStorage() }, { transport, pageSize: 10, prefetch: 3 })

    expect(transport.requests.map(token => token.offset)).toEqual([0, 10, 20, 30, 40, 50])
  })

  it('flushes a batch whenever it reaches batchRows', async () => {
    const transport = new FakeTransport(25)
    const sink = new MemoryStorage()

    const summary = await run('products', {}, { sink, path: 'out.parquet' }, { transport, pageSize: 10, batchRows: 10 })

    expect(summary.batchesFlushed).toBe(3)
    expect(summary.rowsWritten).toBe(25)
    expect(await readIds(sink)).toEqual(range(1, 25))
  })

  it('re-checks filters locally with a half-open date range', async () => {
    const transport = new FakeTransport(25)
    const sink = new MemoryStorage()

    const summary = await run(
      'products',
      { filters: [{ type: 'dateRange', field: 'date_upd', low: '2024-01-05', high: '2024-01-10' }] },
      { sink, path: 'out.parquet' },
      { transport, pageSize: 10 }
    )

    expect(summary.recordsRead).toBe(25)
    expect(summary.rowsWritten).toBe(5)
    expect(await readIds(sink)).toEqual([5, 6, 7, 8, 9])
  })

  it('writes the selection flattened', async () => {
    const transport = new FakeTransport(2)
    transport.overrides.set(0, PRODUCTS_XML)
    const sink = new MemoryStorage()

    await run('products', { fields: ['price', 'categories'] }, { sink, path: 'out.parquet' }, { transport, flatten: true })

    const { layout, rows } = await readParquet(await sink.read('out.parquet'))
    expect(layout.columns.map(c => c.name)).toEqual(['id', 'price', 'categories_id'])
    expect(rows).toEqual([
      { id: 1, price: 19.9, categories_id: 2 },
      { id: 1, price: 19.9, categories_id: 5 },
      { id: 2, price: 5, categories_id: null },
    ])
  })

  it('exports unsigned ids above the signed 32-bit range', async () => {
    const transport = new FakeTransport(1)
    transport.overrides.set(
      0,
      '<prestashop><products><product><id>1</id><id_manufacturer>3000000000</id_manufacturer><price>2</price></product></products></prestashop>'
    )
    const sink = new MemoryStorage()

    await run('products', { fields: ['id_manufacturer'] }, { sink, path: 'out.parquet' }, { transport })

    const { rows } = await readParquet(await sink.read('out.parquet'))
    expect(rows).toEqual([{ id: 1, id_manufacturer: 3000000000 }])
  })

  it('streams NDJSON to the default path', async () => {
    const transport = new FakeTransport(2)
    const sink = new MemoryStorage()

    const summary = await run('products', { fields: ['price'] }, { sink }, { transport, format: 'ndjson' })

    expect(summary.path).toBe('output.ndjson')
    expect(Buffer.from(await sink.read('output.ndjson')).toString('utf8')).toBe('{"id":1,"price":1.5}\n{"id":2,"price":2.5}\n')
  })

  it('writes an Arrow stream with the native backend to the default path', async () => {
    const transport = new FakeTransport(3)
    const sink = new MemoryStorage()

    const summary = await run('products', {}, { sink }, { transport, backend: 'native', format: 'arrow-stream' })

    expect(summary.path).toBe('output.arrows')
    const { rows } = readArrowStream(await sink.read('output.arrows'))
    expect(rows.map(row => row['price'])).toEqual([1.5, 2.5, 3.5])
  })

  it('writes an empty output for an empty listing', async () => {
    const transport = new FakeTransport(0)
    const sink = new MemoryStorage()

    const summary = await run('products', {}, { sink, path: 'out.parquet' }, { transport })

    expect(summary.rowsWritten).toBe(0)
    expect(summary.batchesFlushed).toBe(1)
    expect(summary.pagesFetched).toBe(1)
    const { layout, rows } = await readParquet(await sink.read('out.parquet'))
    expect(rows).toEqual([])
    expect(layout.columns).toHaveLength(9)
  })

  it('requests nothing under a zero limit', async () => {
    const transport = new FakeTransport(10)
    const sink = new MemoryStorage()

    const summary = await run('products', { limit: { count: 0 } }, { sink, path: 'out.parquet' }, { transport })

    expect(transport.requests).toEqual([])
    expect(summary.pagesFetched).toBe(0)
    expect(await sink.exists('out.parquet')).toBe(true)
  })

  it('skips the synopsis request when given a schema', async () => {
    const transport = new FakeTransport(1)

    await run('products', {}, { sink: new MemoryStorage() }, { transport, schema: productSchema() })

    expect(transport.schemaRequests).toBe(0)
  })
})

// =============================================================================
// Errors
// =============================================================================

describe('run failures', () => {
  it('validates options before any request', async () => {
    const transport = new FakeTransport(1)
    const target = { sink: new MemoryStorage() }

    await expect(run('products', {}, target, { transport, prefetch: 5 })).rejects.toThrow('prefetch must be an integer from 1 to 4')
    await expect(run('products', {}, target, { transport, pageSize: 0 })).rejects.toBeInstanceOf(ValidationError)
    await expect(run('products', {}, target, { transport, batchRows: 1.5 })).rejects.toThrow('batchRows must be a positive integer')
    expect(transport.schemaRequests).toBe(0)
  })

  it('raises query errors before the first page', async () => {
    const transport = new FakeTransport(1)

    await expect(run('products', { fields: ['colour'] }, { sink: new MemoryStorage() }, { transport })).rejects.toBeInstanceOf(QueryError)
    expect(transport.requests).toEqual([])
  })

  it('tags parse errors with the page offset', async () => {
    const transport = new FakeTransport(30)
    transport.overrides.set(10, '<prestashop><products><product>')
    const sink = new MemoryStorage()

    const result = run('products', {}, { sink, path: 'out.parquet' }, { transport, pageSize: 10 })

    await expect(result).rejects.toBeInstanceOf(ParseError)
    await expect(result).rejects.toMatchObject({ page: 10 })
    expect(await sink.exists('out.parquet')).toBe(false)
  })

  it('tags coercion errors with the page offset', async () => {
    const transport = new FakeTransport(5)
    transport.overrides.set(0, '<prestashop><products><product><id>1</id><price>abc</price></product></products></prestashop>')

    const result = run('products', {}, { sink: new MemoryStorage() }, { transport })

    await expect(result).rejects.toBeInstanceOf(CoercionError)
    await expect(result).rejects.toMatchObject({ field: 'price', value: 'abc', page: 0 })
  })

  it('keeps batches flushed before a transport failure', async () => {
    const transport = new FakeTransport(50)
    const failure = new TransportError('HTTP 500 Internal Server Error', 'TRANSPORT_ERROR', { status: 500, retryable: true })
    transport.failures.set(20, failure)
    const sink = new MemoryStorage()

    const result = run('products', {}, { sink, path: 'out.parquet' }, { transport, pageSize: 10, batchRows: 10 })

    await expect(result).rejects.toBe(failure)
    expect(await readIds(sink)).toEqual(range(1, 20))
    expect(logger.warn).toHaveBeenCalledWith('[Engine] products: run failed, kept 20 row(s) in out.parquet')
  })

  it('writes nothing when the run fails before the first flush', async () => {
    const transport = new FakeTransport(50)
    transport.failures.set(10, new TransportError('HTTP 502', 'TRANSPORT_ERROR', { status: 502 }))
    const sink = new MemoryStorage()

    await expect(run('products', {}, { sink, path: 'out.parquet' }, { transport, pageSize: 10 })).rejects.toBeInstanceOf(TransportError)
    expect(await sink.exists('out.parquet')).toBe(false)
  })
})

// =============================================================================
// Cancellation
// =============================================================================

describe('run cancellation', () => {
  it('fails at once with a signal that is already aborted', async () => {
    const transport = new FakeTransport(10)
    const controller = new AbortController()
    controller.abort()

    const result = run('products', {}, { sink: new MemoryStorage() }, { transport, signal: controller.signal })

    await expect(result).rejects.toBeInstanceOf(RunCancelledError)
    await expect(result).rejects.toMatchObject({ pagesCompleted: 0 })
    expect(transport.schemaRequests).toBe(0)
  })

  it('stops at the next page boundary', async () => {
    const transport = new FakeTransport(100)
    const controller = new AbortController()
    transport.onRequest = token => {
      if (token.offset === 20) controller.abort()
    }
    const sink = new MemoryStorage()

    const result = run('products', {}, { sink, path: 'out.parquet' }, { transport, pageSize: 10, signal: controller.signal })

    await expect(result).rejects.toBeInstanceOf(RunCancelledError)
    await expect(result).rejects.toMatchObject({ pagesCompleted: 1 })
    expect(transport.requests.map(token => token.offset)).toEqual([0, 10, 20])
    expect(await sink.exists('out.parquet')).toBe(false)
  })
})
