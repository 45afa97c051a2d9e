/**
 * colfetch Error Hierarchy
 *
 * Consistent error handling patterns for the entire library.
 * All errors extend from ColfetchError for unified error handling.
 *
 * ## Error Hierarchy
 *
 * - ColfetchError (base)
 *   - SchemaError
 *   - QueryError
 *   - ParseError
 *   - CoercionError
 *   - WriteError
 *   - TransportError
 *   - StorageError
 *     - FileNotFoundError
 *   - BuilderStateError
 *   - RunCancelledError
 *   - ConfigError
 *   - ValidationError
 *
 * Schema and query errors are raised before the first page is fetched.
 * Only TransportError may be retried, and only by the transport itself.
 *
 * @example
 * ```typescript
 * try {
 *   await run('products', constraints, target, options)
 * } catch (error) {
 *   if (error instanceof CoercionError) {
 *     console.log(`${error.field} rejected ${JSON.stringify(error.value)}`)
 *   }
 *   if (error instanceof ColfetchError) {
 *     console.log(`colfetch error [${error.code}]: ${error.message}`)
 *   }
 * }
 * ```
 */

// =============================================================================
// BASE ERROR
// =============================================================================

/**
 * Base error class for all colfetch errors.
 * Provides a consistent `code` property for programmatic error handling.
 *
 * @public
 */
export class ColfetchError extends Error {
  /**
   * Error code for programmatic handling.
   * Each error subclass defines its own set of codes.
   */
  readonly code: string

  /**
   * Optional underlying cause of the error.
   */
  readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'ColfetchError'
    this.code = code
    this.cause = cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

// =============================================================================
// SCHEMA AND QUERY ERRORS
// =============================================================================

/**
 * Error thrown when a resource schema description cannot be resolved.
 *
 * @public
 */
export class SchemaError extends ColfetchError {
  /** Resource type whose schema was being resolved */
  readonly resourceType: string

  /** Field involved, when the problem is local to one declaration */
  readonly field?: string | undefined

  constructor(message: string, resourceType: string, field?: string, cause?: unknown) {
    super(`Schema error for '${resourceType}': ${message}`, 'SCHEMA_ERROR', cause)
    this.name = 'SchemaError'
    this.resourceType = resourceType
    this.field = field
  }
}

/**
 * Error thrown when user constraints do not fit the resolved schema.
 *
 * @public
 *
 * @example
 * ```typescript
 * try {
 *   buildQuery(schema, { filters: [{ type: 'dateRange', field: 'name', low, high }] })
 * } catch (error) {
 *   if (error instanceof QueryError) {
 *     console.log(`${error.field}: expected ${error.expected}`)
 *   }
 * }
 * ```
 */
export class QueryError extends ColfetchError {
  /** The offending field name */
  readonly field: string

  /** What the field would have had to be for the constraint to apply */
  readonly expected: string

  constructor(message: string, field: string, expected: string) {
    super(message, 'QUERY_ERROR')
    this.name = 'QueryError'
    this.field = field
    this.expected = expected
  }
}

// =============================================================================
// PAGE PROCESSING ERRORS
// =============================================================================

/**
 * Error thrown when a page of records cannot be decoded.
 * The page fails as a whole; no record of it reaches a batch.
 *
 * @public
 */
export class ParseError extends ColfetchError {
  /** Byte offset into the page where decoding failed */
  readonly offset: number

  /** Short description of the violation */
  readonly reason: string

  /** Page identifier (record offset of the page), when known */
  readonly page?: number | undefined

  constructor(reason: string, offset: number, page?: number, cause?: unknown) {
    super(
      `Parse error at byte ${offset}${page !== undefined ? ` of page ${page}` : ''}: ${reason}`,
      'PARSE_ERROR',
      cause
    )
    this.name = 'ParseError'
    this.offset = offset
    this.reason = reason
    this.page = page
  }

  /** Copy of this error tagged with the page it came from */
  withPage(page: number): ParseError {
    return new ParseError(this.reason, this.offset, page, this.cause)
  }
}

/**
 * Error thrown when a record value does not match its declared field kind.
 *
 * @public
 */
export class CoercionError extends ColfetchError {
  /** Field path, `association.field` for association elements */
  readonly field: string

  /** The literal value that failed, or null when a required value was missing */
  readonly value: string | null

  /** The kind the value was coerced to */
  readonly expected: string

  /** Page identifier (record offset of the page), when known */
  readonly page?: number | undefined

  constructor(field: string, value: string | null, expected: string, page?: number) {
    const shown = value === null ? 'missing value' : `value ${JSON.stringify(value)}`
    super(
      `Cannot coerce ${shown} of field '${field}' to ${expected}${page !== undefined ? ` (page ${page})` : ''}`,
      'COERCION_ERROR'
    )
    this.name = 'CoercionError'
    this.field = field
    this.value = value
    this.expected = expected
    this.page = page
  }

  /** Copy of this error tagged with the page it came from */
  withPage(page: number): CoercionError {
    return new CoercionError(this.field, this.value, this.expected, page)
  }
}

/**
 * Error thrown when an append follows finish() on a batch builder.
 *
 * @public
 */
export class BuilderStateError extends ColfetchError {
  constructor(message: string) {
    super(message, 'BUILDER_STATE')
    this.name = 'BuilderStateError'
  }
}

// =============================================================================
// OUTPUT ERRORS
// =============================================================================

/**
 * Write error codes for categorized error handling.
 *
 * @public
 */
export type WriteErrorCode = 'SCHEMA_DRIFT' | 'SINK_FAILURE' | 'ENCODE_FAILURE' | 'CLOSED'

/**
 * Error thrown when a batch cannot be written to its output.
 * Batches accepted before the failure stay valid once the writer is closed.
 *
 * @public
 */
export class WriteError extends ColfetchError {
  /** Write-specific error code */
  readonly writeCode: WriteErrorCode

  constructor(message: string, writeCode: WriteErrorCode, cause?: unknown) {
    super(message, `WRITE_${writeCode}`, cause)
    this.name = 'WriteError'
    this.writeCode = writeCode
  }
}

/**
 * Error thrown when storage operations fail.
 *
 * @public
 */
export class StorageError extends ColfetchError {
  /** The storage path involved in the error */
  readonly path: string

  /** The operation that failed (e.g., 'read', 'write', 'append') */
  readonly operation: string

  constructor(message: string, path: string, operation: string, cause?: unknown, code: string = 'STORAGE_ERROR') {
    super(message, code, cause)
    this.name = 'StorageError'
    this.path = path
    this.operation = operation
  }
}

/**
 * Error thrown when a file is not found.
 *
 * @public
 */
export class FileNotFoundError extends StorageError {
  constructor(path: string, operation: string = 'read') {
    super(`File not found: ${path}`, path, operation, undefined, 'FILE_NOT_FOUND')
    this.name = 'FileNotFoundError'
  }
}

// =============================================================================
// TRANSPORT ERRORS
// =============================================================================

/**
 * Options for creating a TransportError.
 *
 * @public
 */
export interface TransportErrorOptions {
  /** Request URL with credentials removed */
  url?: string | undefined
  /** HTTP status, when a response arrived */
  status?: number | undefined
  /** Whether another attempt may succeed */
  retryable?: boolean | undefined
  cause?: unknown
}

/**
 * Error thrown when the remote service cannot be reached or answers with a failure.
 *
 * Timeouts, connection failures, 429 and 5xx responses are retryable.
 *
 * @public
 */
export class TransportError extends ColfetchError {
  readonly url?: string | undefined
  readonly status?: number | undefined

  /** Indicates this error is retryable */
  readonly retryable: boolean

  constructor(message: string, code: 'TRANSPORT_ERROR' | 'TRANSPORT_TIMEOUT' = 'TRANSPORT_ERROR', options: TransportErrorOptions = {}) {
    super(message, code, options.cause)
    this.name = 'TransportError'
    this.url = options.url
    this.status = options.status
    this.retryable = options.retryable ?? code === 'TRANSPORT_TIMEOUT'
  }
}

// =============================================================================
// RUN CONTROL ERRORS
// =============================================================================

/**
 * Error thrown when a run is aborted through its AbortSignal.
 * Raised at a page boundary, so no page is ever half appended.
 *
 * @public
 */
export class RunCancelledError extends ColfetchError {
  /** Pages fully appended before cancellation */
  readonly pagesCompleted: number

  constructor(pagesCompleted: number, cause?: unknown) {
    super(`Run cancelled after ${pagesCompleted} page(s)`, 'RUN_CANCELLED', cause)
    this.name = 'RunCancelledError'
    this.pagesCompleted = pagesCompleted
  }
}

/**
 * Error thrown when a configuration file is missing or invalid.
 *
 * @public
 */
export class ConfigError extends ColfetchError {
  /** One entry per problem found */
  readonly issues: readonly string[]

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message, 'CONFIG_ERROR')
    this.name = 'ConfigError'
    this.issues = issues
  }
}

// =============================================================================
// VALIDATION ERRORS
// =============================================================================

/**
 * Error thrown when input validation fails.
 *
 * Covers programmer-facing arguments such as options objects and paths.
 *
 * @public
 */
export class ValidationError extends ColfetchError {
  /** The field or parameter that failed validation (optional) */
  readonly field?: string | undefined

  /** The invalid value that was provided (optional) */
  readonly value?: unknown

  constructor(message: string, field?: string, value?: unknown) {
    super(message, 'VALIDATION_ERROR')
    this.name = 'ValidationError'
    if (field !== undefined) {
      this.field = field
    }
    this.value = value
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is a ColfetchError.
 *
 * @public
 */
export function isColfetchError(error: unknown): error is ColfetchError {
  return error instanceof ColfetchError
}

/**
 * Check if an error is a SchemaError.
 *
 * @public
 */
export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError
}

/**
 * Check if an error is a QueryError.
 *
 * @public
 */
export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError
}

/**
 * Check if an error is a ParseError.
 *
 * @public
 */
export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError
}

/**
 * Check if an error is a CoercionError.
 *
 * @public
 */
export function isCoercionError(error: unknown): error is CoercionError {
  return error instanceof CoercionError
}

/**
 * Check if an error is a WriteError.
 *
 * @public
 */
export function isWriteError(error: unknown): error is WriteError {
  return error instanceof WriteError
}

/**
 * Check if an error is a TransportError.
 *
 * @public
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

/**
 * Check if an error is a StorageError.
 *
 * @public
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

/**
 * Check if an error is a FileNotFoundError.
 *
 * @public
 */
export function isFileNotFoundError(error: unknown): error is FileNotFoundError {
  return error instanceof FileNotFoundError
}

/**
 * Check if an error is a ValidationError.
 *
 * @public
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Type guard to check if an error has a retryable property.
 *
 * @internal
 */
export function hasRetryableProperty(error: Error): error is Error & { retryable: boolean } {
  return 'retryable' in error && typeof error.retryable === 'boolean'
}

/**
 * Check if an error is retryable.
 * Returns true for a TransportError flagged retryable and any error with `retryable: true`.
 *
 * @public
 */
export function isRetryableError(error: unknown): boolean {
  if (error == null) return false
  if (!(error instanceof Error)) return false
  if (error instanceof TransportError) return error.retryable
  if (hasRetryableProperty(error) && error.retryable === true) return true
  return false
}
