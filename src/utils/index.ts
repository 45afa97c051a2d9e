/**
 * Shared Utilities
 *
 * Logging abstraction, exhaustiveness checking and small byte helpers
 * used across the schema, record, columnar and engine modules.
 *
 * @module utils
 */

// =============================================================================
// LOGGING ABSTRACTION
// =============================================================================

/**
 * Logger interface for the colfetch library.
 *
 * Provides a pluggable logging abstraction that allows library consumers
 * to integrate with their own logging infrastructure (e.g., pino, winston).
 *
 * @example
 * ```typescript
 * import { setLogger } from 'colfetch'
 *
 * // Or silence all logging
 * setLogger({
 *   debug: () => {},
 *   info: () => {},
 *   warn: () => {},
 *   error: () => {},
 * })
 * ```
 */
export interface Logger {
  /** Log debug-level messages (not shown by default) */
  debug(message: string, ...args: unknown[]): void
  /** Log info-level messages */
  info(message: string, ...args: unknown[]): void
  /** Log warning-level messages */
  warn(message: string, ...args: unknown[]): void
  /** Log error-level messages */
  error(message: string, ...args: unknown[]): void
}

/**
 * Default logger implementation.
 *
 * - debug: silenced (no-op)
 * - info: console.info
 * - warn: console.warn
 * - error: console.error
 */
export const defaultLogger: Logger = {
  debug: () => {},
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
}

/** Current active logger instance */
let currentLogger: Logger = defaultLogger

/**
 * Set a custom logger for the library.
 *
 * The CLI installs a pino logger through this hook (see `cli/logger.ts`).
 */
export function setLogger(logger: Logger): void {
  currentLogger = logger
}

/**
 * Get the current logger instance.
 */
export function getLogger(): Logger {
  return currentLogger
}

// =============================================================================
// EXHAUSTIVENESS CHECKING
// =============================================================================

/**
 * Utility for exhaustiveness checking in switch statements.
 * TypeScript will error at compile time if a case is not handled.
 *
 * @example
 * ```typescript
 * type Format = 'arrow-stream' | 'parquet'
 * function ext(f: Format) {
 *   switch (f) {
 *     case 'arrow-stream': return '.arrows'
 *     case 'parquet': return '.parquet'
 *     default: return assertNever(f)
 *   }
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`)
}

// =============================================================================
// BYTES AND TEXT
// =============================================================================

const textEncoder = new TextEncoder()

/**
 * Number of UTF-8 bytes needed for the first `charIndex` UTF-16 units of `text`.
 * Used to report decoder positions as byte offsets.
 */
export function byteOffsetOf(text: string, charIndex: number): number {
  const clamped = Math.max(0, Math.min(charIndex, text.length))
  return textEncoder.encode(text.slice(0, clamped)).length
}

/** Encode a string as UTF-8 bytes */
export function utf8(text: string): Uint8Array {
  return textEncoder.encode(text)
}

/**
 * Concatenate byte chunks into one buffer.
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0
  for (const chunk of chunks) total += chunk.length
  const out = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return out
}

/**
 * Type guard for plain objects (not arrays, not class instances).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  )
}
