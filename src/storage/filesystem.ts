/**
 * File System Storage Backend
 *
 * FileSystemStorage implementation for local output files.
 */

import { FileNotFoundError, ValidationError } from '../errors.js'
import { getLogger } from '../utils/index.js'
import type { StorageBackend } from './types.js'

// =============================================================================
// FILESYSTEM STORAGE IMPLEMENTATION
// =============================================================================

/**
 * File system storage backend.
 *
 * Uses Node.js fs/promises for file operations. All paths are relative to
 * the configured base path and are protected against path traversal attacks.
 *
 * `write` goes to a temp file that is renamed into place, so a reader never
 * sees a half-written first chunk; `append` extends the file in place.
 *
 * @public
 *
 * @example
 * ```typescript
 * const storage = new FileSystemStorage({ path: './out' })
 * await storage.write('products.parquet', bytes)
 * ```
 */
export class FileSystemStorage implements StorageBackend {
  private readonly basePath: string

  constructor(options: { path: string }) {
    if (typeof options.path !== 'string') {
      throw new ValidationError('options.path must be a string', 'options.path', options.path)
    }
    // Note: Empty path is allowed (current directory)
    this.basePath = options.path
  }

  /**
   * Resolve and validate a path relative to basePath.
   *
   * 1. Reject null bytes
   * 2. Decode URL-encoded characters (prevents %2e%2e bypass)
   * 3. Canonicalize path using path.resolve()
   * 4. Verify resolved path is within base directory
   */
  private async resolvePath(relativePath: string): Promise<string> {
    const path = await import('node:path')

    if (relativePath.includes('\0')) {
      throw new ValidationError('Invalid path: contains null byte', 'path', relativePath)
    }

    let decodedPath: string
    try {
      decodedPath = decodeURIComponent(relativePath)
    } catch (e) {
      getLogger().warn(`[Storage] Failed to decode URI component for path "${relativePath}", using original:`, e)
      decodedPath = relativePath
    }

    // Check for null bytes again after decoding (catches %00)
    if (decodedPath.includes('\0')) {
      throw new ValidationError('Invalid path: contains null byte (after decoding)', 'path', relativePath)
    }

    const resolvedBasePath = path.resolve(this.basePath)

    // Remove leading slashes to ensure it's treated as relative
    const normalizedPath = path.normalize(decodedPath).replace(/^\/+/, '')
    const fullPath = path.resolve(resolvedBasePath, normalizedPath)

    // Use startsWith with path separator to prevent prefix attacks:
    // e.g., basePath="/data" should not allow "/data-evil/file"
    if (!fullPath.startsWith(resolvedBasePath + path.sep) && fullPath !== resolvedBasePath) {
      throw new ValidationError('Invalid path: outside base directory', 'path', relativePath)
    }

    return fullPath
  }

  async read(path: string): Promise<Uint8Array> {
    const fs = await import('node:fs/promises')
    const fullPath = await this.resolvePath(path)

    try {
      const buffer = await fs.readFile(fullPath)
      return new Uint8Array(buffer)
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new FileNotFoundError(path, 'read')
      }
      throw error
    }
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    const fs = await import('node:fs/promises')
    const nodePath = await import('node:path')
    const fullPath = await this.resolvePath(path)

    await fs.mkdir(nodePath.dirname(fullPath), { recursive: true })

    const tempPath = `${fullPath}.tmp.${Date.now()}.${Math.random().toString(36).substring(2, 9)}`
    await fs.writeFile(tempPath, data)
    await fs.rename(tempPath, fullPath)
  }

  async append(path: string, data: Uint8Array): Promise<void> {
    const fs = await import('node:fs/promises')
    const nodePath = await import('node:path')
    const fullPath = await this.resolvePath(path)

    await fs.mkdir(nodePath.dirname(fullPath), { recursive: true })
    await fs.appendFile(fullPath, data)
  }

  async exists(path: string): Promise<boolean> {
    const fs = await import('node:fs/promises')
    const fullPath = await this.resolvePath(path)

    try {
      return (await fs.stat(fullPath)).isFile()
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false
      }
      throw error
    }
  }
}
