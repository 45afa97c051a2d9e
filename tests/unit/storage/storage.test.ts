/**
 * Output Sink Tests
 *
 * MemoryStorage and FileSystemStorage share one behavioral suite; the stream
 * sink is checked against an in-process Writable.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import { FileNotFoundError, StorageError, ValidationError } from '../../../src/errors.js'
import { FileSystemStorage, MemoryStorage, StreamSink, type StorageBackend } from '../../../src/storage/index.js'
import { utf8 } from '../../../src/utils/index.js'

let testDir = ''

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'colfetch-storage-'))
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

const BACKENDS: [string, () => StorageBackend][] = [
  ['MemoryStorage', () => new MemoryStorage()],
  ['FileSystemStorage', () => new FileSystemStorage({ path: testDir })],
]

describe.each(BACKENDS)('%s', (_name, create) => {
  let storage: StorageBackend

  beforeEach(() => {
    storage = create()
  })

  it('writes and reads a file', async () => {
    await storage.write('products.parquet', utf8('PAR1'))
    expect(await storage.read('products.parquet')).toEqual(utf8('PAR1'))
  })

  it('replaces an existing file', async () => {
    await storage.write('out.arrows', utf8('first'))
    await storage.write('out.arrows', utf8('second'))
    expect(await storage.read('out.arrows')).toEqual(utf8('second'))
  })

  it('creates nested paths', async () => {
    await storage.write('exports/2024/products.parquet', utf8('x'))
    expect(await storage.exists('exports/2024/products.parquet')).toBe(true)
  })

  it('throws FileNotFoundError for a missing file', async () => {
    await expect(storage.read('missing.parquet')).rejects.toBeInstanceOf(FileNotFoundError)
  })

  it('appends to an existing file', async () => {
    await storage.write('out.ndjson', utf8('{"id":1}\n'))
    await storage.append('out.ndjson', utf8('{"id":2}\n'))
    expect(await storage.read('out.ndjson')).toEqual(utf8('{"id":1}\n{"id":2}\n'))
  })

  it('creates the file on a first append', async () => {
    await storage.append('exports/new.ndjson', utf8('x'))
    expect(await storage.read('exports/new.ndjson')).toEqual(utf8('x'))
  })

  it('reports missing files', async () => {
    expect(await storage.exists('out.parquet')).toBe(false)
    await storage.write('out.parquet', utf8('12345'))
    expect(await storage.exists('out.parquet')).toBe(true)
  })
})

describe('MemoryStorage', () => {
  it('enforces its size limit', async () => {
    const storage = new MemoryStorage({ maxSize: 4 })
    await storage.write('a', utf8('1234'))

    await expect(storage.write('b', utf8('5'))).rejects.toThrow('Storage size limit exceeded: 5 > 4')
    await expect(storage.write('b', utf8('5'))).rejects.toBeInstanceOf(StorageError)
    // replacing a file only counts the difference
    await storage.write('a', utf8('12'))
    expect(storage.getTotalSize()).toBe(2)
  })

  it('rejects a negative size limit', () => {
    expect(() => new MemoryStorage({ maxSize: -1 })).toThrow(ValidationError)
  })

  it('counts appended bytes against its size limit', async () => {
    const storage = new MemoryStorage({ maxSize: 4 })
    await storage.write('a', utf8('12'))
    await storage.append('a', utf8('34'))
    expect(storage.getTotalSize()).toBe(4)

    await expect(storage.append('a', utf8('5'))).rejects.toThrow('Storage size limit exceeded: 5 > 4')
    expect(await storage.read('a')).toEqual(utf8('1234'))
  })

  it('returns copies', async () => {
    const storage = new MemoryStorage()
    const data = utf8('abc')
    await storage.write('a', data)
    data[0] = 0
    expect(await storage.read('a')).toEqual(utf8('abc'))
  })
})

describe('FileSystemStorage', () => {
  it('refuses paths outside its directory', async () => {
    const storage = new FileSystemStorage({ path: testDir })
    await expect(storage.write('../escape.parquet', utf8('x'))).rejects.toThrow('Invalid path: outside base directory')
    await expect(storage.write('%2e%2e/escape.parquet', utf8('x'))).rejects.toThrow(ValidationError)
  })

  it('leaves no temporary file behind', async () => {
    const storage = new FileSystemStorage({ path: testDir })
    await storage.write('out.parquet', utf8('x'))
    expect(await readdir(testDir)).toEqual(['out.parquet'])
  })
})

describe('StreamSink', () => {
  it('writes every chunk to its stream', async () => {
    const chunks: Buffer[] = []
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk)
        callback()
      },
    })
    const sink = new StreamSink(stream)

    await sink.write('ignored', utf8('ARROW1'))
    await sink.append('ignored', utf8('+more'))

    expect(Buffer.concat(chunks).toString('utf8')).toBe('ARROW1+more')
  })

  it('rejects when the stream fails', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'))
      },
    })
    stream.on('error', () => undefined)

    await expect(new StreamSink(stream).write('ignored', utf8('x'))).rejects.toThrow('EPIPE')
  })
})
