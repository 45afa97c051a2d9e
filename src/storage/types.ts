/**
 * Storage Types and Interfaces
 *
 * Where output files go. Writers only need `OutputSink`; the full
 * `StorageBackend` adds the reads tests and tooling use to inspect output.
 */

// =============================================================================
// OUTPUT SINK
// =============================================================================

/**
 * Minimal destination for output files.
 *
 * A writer starts a file with `write` and streams the rest of it with `append`.
 *
 * @public
 */
export interface OutputSink {
  /**
   * Write data to a path, creating or replacing it.
   *
   * @param path - Path of the file (relative to the sink's root)
   * @param data - File contents so far
   */
  write(path: string, data: Uint8Array): Promise<void>

  /**
   * Add data to the end of a file, creating it when missing.
   */
  append(path: string, data: Uint8Array): Promise<void>
}

// =============================================================================
// STORAGE BACKEND INTERFACE
// =============================================================================

/**
 * Core storage backend interface.
 *
 * Implemented by MemoryStorage (tests) and FileSystemStorage (local output).
 *
 * @public
 */
export interface StorageBackend extends OutputSink {
  /**
   * Read the entire contents of a file.
   *
   * @throws {FileNotFoundError} If file does not exist
   */
  read(path: string): Promise<Uint8Array>

  /**
   * Check if a file exists.
   */
  exists(path: string): Promise<boolean>
}

// =============================================================================
// MEMORY STORAGE OPTIONS
// =============================================================================

/**
 * @public
 */
export interface MemoryStorageOptions {
  /** Maximum total bytes stored; writes beyond it fail with StorageError */
  maxSize?: number | undefined
}
