/**
 * In-Memory Storage Backend
 *
 * MemoryStorage implementation for testing and development.
 */

import { StorageError, FileNotFoundError, ValidationError } from '../errors.js'
import type { StorageBackend, MemoryStorageOptions } from './types.js'

// =============================================================================
// MEMORY STORAGE IMPLEMENTATION
// =============================================================================

/**
 * In-memory storage backend for testing.
 *
 * Stores all data in a Map. Each instance has its own isolated storage;
 * `maxSize` simulates a full disk.
 *
 * @public
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorage()
 * await run('products', {}, { sink: storage, path: 'products.parquet' }, options)
 * const bytes = await storage.read('products.parquet')
 * ```
 */
export class MemoryStorage implements StorageBackend {
  private readonly files = new Map<string, Uint8Array>()
  private readonly options: MemoryStorageOptions
  private currentSize = 0

  constructor(options: MemoryStorageOptions = {}) {
    if (options.maxSize !== undefined) {
      if (options.maxSize < 0 || !Number.isInteger(options.maxSize)) {
        throw new ValidationError('options.maxSize must be a non-negative integer', 'options.maxSize', options.maxSize)
      }
    }
    this.options = options
  }

  async read(path: string): Promise<Uint8Array> {
    const data = this.files.get(path)
    if (!data) {
      throw new FileNotFoundError(path, 'read')
    }

    // Return a copy to prevent external mutation
    return new Uint8Array(data)
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    this.store(path, new Uint8Array(data), 'write')
  }

  async append(path: string, data: Uint8Array): Promise<void> {
    const existing = this.files.get(path) ?? new Uint8Array(0)
    const combined = new Uint8Array(existing.length + data.length)
    combined.set(existing)
    combined.set(data, existing.length)
    this.store(path, combined, 'append')
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path)
  }

  /**
   * Total bytes currently stored.
   */
  getTotalSize(): number {
    return this.currentSize
  }

  /**
   * Replace a file, keeping the total within maxSize.
   *
   * @throws {StorageError} When the size limit would be exceeded
   */
  private store(path: string, data: Uint8Array, operation: 'write' | 'append'): void {
    const existingSize = this.files.get(path)?.length ?? 0
    const newTotalSize = this.currentSize - existingSize + data.length

    if (this.options.maxSize !== undefined && newTotalSize > this.options.maxSize) {
      throw new StorageError(`Storage size limit exceeded: ${newTotalSize} > ${this.options.maxSize}`, path, operation)
    }

    this.files.set(path, data)
    this.currentSize = newTotalSize
  }
}
