/**
 * Batch Writer Tests
 *
 * Every format is written by both backends and read back without the schema.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import { tableFromArrays, tableToIPC } from 'apache-arrow'
import { parquetMetadata } from 'hyparquet'
import { ValidationError, WriteError } from '../../../src/errors.js'
import { BACKEND_NAMES, type BackendName, type ColumnarBatch, getBackend } from '../../../src/columnar/index.js'
import { parsePage } from '../../../src/record/index.js'
import { resolveSchema } from '../../../src/schema/index.js'
import { MemoryStorage, StreamSink } from '../../../src/storage/index.js'
import { utf8 } from '../../../src/utils/index.js'
import {
  type DecodedOutput,
  type OutputFormat,
  createBatchWriter,
  readArrowStream,
  readParquet,
} from '../../../src/writer/index.js'
import { PRODUCTS_XML, PRODUCT_ROWS, generatedPage, productSchema } from '../fixtures.js'

const schema = productSchema()

function productBatch(backend: BackendName, flatten = false): ColumnarBatch {
  const builder = getBackend(backend).createBuilder(schema, { flatten })
  for (const record of parsePage(utf8(PRODUCTS_XML), 'xml', schema)) builder.append(record)
  return builder.finish()
}

function generatedBatch(backend: BackendName, ids: readonly number[]): ColumnarBatch {
  const builder = getBackend(backend).createBuilder(schema)
  for (const record of parsePage(utf8(generatedPage(ids)), 'xml', schema)) builder.append(record)
  return builder.finish()
}

const customerSchema = resolveSchema(
  'customers',
  '<prestashop><customer><id></id><birthday format="isBirthDate"></birthday><id_lang format="isUnsignedId"></id_lang></customer></prestashop>'
)

function customerBatch(backend: BackendName): ColumnarBatch {
  const page = '<prestashop><customers><customer><id>1</id><birthday>1990-05-17</birthday><id_lang>3000000000</id_lang></customer></customers></prestashop>'
  const builder = getBackend(backend).createBuilder(customerSchema)
  for (const record of parsePage(utf8(page), 'xml', customerSchema)) builder.append(record)
  return builder.finish()
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const file = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(file).set(bytes)
  return file
}

function collecting(chunks: Buffer[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk)
      callback()
    },
  })
}

async function readBack(format: OutputFormat, bytes: Uint8Array): Promise<DecodedOutput> {
  return format === 'parquet' ? readParquet(bytes) : readArrowStream(bytes)
}

async function writeError(promise: Promise<unknown>): Promise<WriteError> {
  try {
    await promise
  } catch (error) {
    if (error instanceof WriteError) return error
    throw error
  }
  throw new Error('expected a WriteError')
}

const CASES: [BackendName, OutputFormat][] = [
  ['arrow', 'arrow-stream'],
  ['arrow', 'parquet'],
  ['native', 'arrow-stream'],
  ['native', 'parquet'],
]

describe.each(CASES)('%s backend, %s format', (backend, format) => {
  it('round-trips a batch without the schema', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format, sink, path: 'products.out' })

    await writer.write(productBatch(backend))
    const summary = await writer.close()

    const bytes = await sink.read('products.out')
    expect(summary).toEqual({
      format,
      path: 'products.out',
      batchesWritten: 1,
      rowsWritten: 2,
      bytesWritten: bytes.length,
    })
    const decoded = await readBack(format, bytes)
    expect(decoded.layout).toEqual(productBatch(backend).layout)
    expect(decoded.rows).toEqual(PRODUCT_ROWS)
  })

  it('appends batches in order', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format, sink, path: 'out' })

    await writer.write(generatedBatch(backend, [1, 2]))
    await writer.write(generatedBatch(backend, [3]))
    const summary = await writer.close()

    expect(summary.batchesWritten).toBe(2)
    expect(summary.rowsWritten).toBe(3)
    const { rows } = await readBack(format, await sink.read('out'))
    expect(rows.map(row => [row['id'], row['price']])).toEqual([
      [1, 1.5],
      [2, 2.5],
      [3, 3.5],
    ])
  })

  it('writes flattened batches', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format, sink, path: 'flat' })

    await writer.write(productBatch(backend, true))
    await writer.close()

    const { rows } = await readBack(format, await sink.read('flat'))
    expect(rows.map(row => [row['id'], row['categories_id']])).toEqual([
      [1, 2],
      [1, 5],
      [2, null],
    ])
  })

  it('refuses a batch whose layout drifted and keeps earlier batches', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format, sink, path: 'drift' })
    await writer.write(productBatch(backend))

    const error = await writeError(writer.write(productBatch(backend, true)))
    expect(error.writeCode).toBe('SCHEMA_DRIFT')

    const summary = await writer.close()
    expect(summary.batchesWritten).toBe(1)
    const { rows } = await readBack(format, await sink.read('drift'))
    expect(rows).toEqual(PRODUCT_ROWS)
  })

  it('writes an empty file that still carries the layout', async () => {
    const sink = new MemoryStorage()
    const layout = productBatch(backend).layout
    const writer = createBatchWriter({ backend, format, sink, path: 'empty', layout })

    const summary = await writer.close()

    expect(summary.rowsWritten).toBe(0)
    const decoded = await readBack(format, await sink.read('empty'))
    expect(decoded).toEqual({ layout, rows: [] })
  })

  it('keeps dates and unsigned ids above the signed range', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format, sink, path: 'customers' })

    await writer.write(customerBatch(backend))
    await writer.close()

    const { rows } = await readBack(format, await sink.read('customers'))
    expect(rows).toEqual([{ id: 1, birthday: new Date(Date.UTC(1990, 4, 17)), id_lang: 3000000000 }])
  })

  it('reports a sink failure', async () => {
    const writer = createBatchWriter({ backend, format, sink: new MemoryStorage({ maxSize: 10 }), path: 'full' })

    const error = await writeError(writer.write(productBatch(backend)).then(() => writer.close()))
    expect(error.code).toBe('WRITE_SINK_FAILURE')
    expect(error.message).toMatch(/^failed to write full: Storage size limit exceeded: \d+ > 10$/)
  })
})

describe('writer state', () => {
  it('rejects writes after close and returns the same summary twice', async () => {
    const writer = createBatchWriter({ backend: 'native', format: 'parquet', sink: new MemoryStorage() })
    await writer.write(productBatch('native'))

    const first = writer.close()
    expect(writer.close()).toBe(first)
    expect((await first).path).toBe('output.parquet')
    expect(writer.closed).toBe(true)
    await expect(writer.write(productBatch('native'))).rejects.toThrow('write() called after close()')
  })

  it('refuses a batch from the other backend', async () => {
    const writer = createBatchWriter({ backend: 'arrow', format: 'arrow-stream', sink: new MemoryStorage() })
    await expect(writer.write(productBatch('native'))).rejects.toThrow('the arrow writer cannot encode a native batch')
    expect(writer.batchesWritten).toBe(0)
  })

  it('cannot close without a batch or a layout', async () => {
    const writer = createBatchWriter({ backend: 'arrow', format: 'parquet', sink: new MemoryStorage() })
    const error = await writeError(writer.close())
    expect(error.writeCode).toBe('ENCODE_FAILURE')
  })

  it('checks the first batch against an expected layout', async () => {
    const writer = createBatchWriter({
      backend: 'native',
      format: 'parquet',
      sink: new MemoryStorage(),
      layout: productBatch('native', true).layout,
    })
    await expect(writer.write(productBatch('native'))).rejects.toBeInstanceOf(WriteError)
  })

  it('splits batches into row groups', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend: 'native', format: 'parquet', sink, rowGroupSize: 1 })
    await writer.write(generatedBatch('native', [1, 2, 3]))
    await writer.close()

    expect(parquetMetadata(toArrayBuffer(await sink.read('output.parquet'))).row_groups).toHaveLength(3)
  })

  it('rejects a row group size that is not a positive integer', () => {
    expect(() =>
      createBatchWriter({ backend: 'arrow', format: 'parquet', sink: new MemoryStorage(), rowGroupSize: 0 })
    ).toThrow(ValidationError)
  })

  it('writes uncompressed parquet', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend: 'arrow', format: 'parquet', sink, compression: 'UNCOMPRESSED' })
    await writer.write(productBatch('arrow'))
    await writer.close()

    const { rows } = await readParquet(await sink.read('output.parquet'))
    expect(rows).toEqual(PRODUCT_ROWS)
  })
})

describe.each(BACKEND_NAMES)('%s backend, parquet schema', backend => {
  it('annotates timestamps and widens unsigned columns', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format: 'parquet', sink })
    await writer.write(customerBatch(backend))
    await writer.close()

    const { schema: elements } = parquetMetadata(toArrayBuffer(await sink.read('output.parquet')))
    const element = (name: string) => elements.find(e => e.name === name)
    expect(element('id')).toMatchObject({ type: 'INT32' })
    expect(element('birthday')).toMatchObject({ type: 'INT64', converted_type: 'TIMESTAMP_MILLIS' })
    expect(element('id_lang')).toMatchObject({ type: 'INT64' })
  })

  it('annotates datetime columns', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format: 'parquet', sink })
    await writer.write(productBatch(backend))
    await writer.close()

    const { schema: elements } = parquetMetadata(toArrayBuffer(await sink.read('output.parquet')))
    expect(elements.find(e => e.name === 'date_upd')).toMatchObject({ type: 'INT64', converted_type: 'TIMESTAMP_MILLIS' })
  })
})

describe.each(BACKEND_NAMES)('%s backend, ndjson format', backend => {
  it('writes one JSON object per row', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format: 'ndjson', sink })

    await writer.write(productBatch(backend))
    const summary = await writer.close()

    const bytes = await sink.read('output.ndjson')
    const text = Buffer.from(bytes).toString('utf8')
    expect(summary).toEqual({ format: 'ndjson', path: 'output.ndjson', batchesWritten: 1, rowsWritten: 2, bytesWritten: bytes.length })
    expect(text.endsWith('\n')).toBe(true)
    // dates come out as ISO strings
    expect(text.split('\n').slice(0, -1).map(line => JSON.parse(line))).toEqual(JSON.parse(JSON.stringify(PRODUCT_ROWS)))
  })

  it('writes scalars in column order', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format: 'ndjson', sink })

    await writer.write(customerBatch(backend))
    await writer.close()

    expect(Buffer.from(await sink.read('output.ndjson')).toString('utf8')).toBe(
      '{"id":1,"birthday":"1990-05-17T00:00:00.000Z","id_lang":3000000000}\n'
    )
  })

  it('creates an empty file for an empty output', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format: 'ndjson', sink, layout: productBatch(backend).layout })

    const summary = await writer.close()

    expect(summary.bytesWritten).toBe(0)
    expect(await sink.read('output.ndjson')).toEqual(new Uint8Array(0))
  })
})

describe.each(BACKEND_NAMES)('%s backend, streaming', backend => {
  it('hands every Arrow batch to the sink before close', async () => {
    const chunks: Buffer[] = []
    const writer = createBatchWriter({ backend, format: 'arrow-stream', sink: new StreamSink(collecting(chunks)) })

    await writer.write(generatedBatch(backend, [1, 2]))
    const afterFirst = Buffer.concat(chunks).length
    expect(afterFirst).toBeGreaterThan(0)

    await writer.write(generatedBatch(backend, [3]))
    const afterSecond = Buffer.concat(chunks).length
    expect(afterSecond).toBeGreaterThan(afterFirst)
    expect(writer.closed).toBe(false)

    const summary = await writer.close()
    const bytes = new Uint8Array(Buffer.concat(chunks))
    // close adds only the end-of-stream marker
    expect(bytes.length - afterSecond).toBe(8)
    expect(summary.bytesWritten).toBe(bytes.length)
    expect(readArrowStream(bytes).rows.map(row => row['id'])).toEqual([1, 2, 3])
  })

  it('keeps overlapping writes in call order', async () => {
    const sink = new MemoryStorage()
    const writer = createBatchWriter({ backend, format: 'ndjson', sink })

    await Promise.all([writer.write(generatedBatch(backend, [1])), writer.write(generatedBatch(backend, [2]))])
    await writer.close()

    const lines = Buffer.from(await sink.read('output.ndjson')).toString('utf8').trim().split('\n')
    expect(lines.map(line => JSON.parse(line).id)).toEqual([1, 2])
  })

  it('holds Parquet bytes until close', async () => {
    const chunks: Buffer[] = []
    const writer = createBatchWriter({ backend, format: 'parquet', sink: new StreamSink(collecting(chunks)) })

    await writer.write(generatedBatch(backend, [1, 2]))
    expect(chunks).toEqual([])

    await writer.close()
    const { rows } = await readParquet(new Uint8Array(Buffer.concat(chunks)))
    expect(rows.map(row => row['id'])).toEqual([1, 2])
  })
})

describe('read-back', () => {
  it('rejects an Arrow stream written elsewhere', () => {
    const bytes = tableToIPC(tableFromArrays({ a: new Int32Array([1, 2]) }), 'stream')
    expect(() => readArrowStream(bytes)).toThrow("Arrow stream has no 'colfetch.layout' metadata")
  })
})
