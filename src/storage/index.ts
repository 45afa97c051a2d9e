/**
 * Storage module
 *
 * @module storage
 */

export type { OutputSink, StorageBackend, MemoryStorageOptions } from './types.js'
export { MemoryStorage } from './memory.js'
export { FileSystemStorage } from './filesystem.js'
export { StreamSink } from './stdout.js'
