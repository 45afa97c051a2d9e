/**
 * Columnar module
 *
 * Backend registry plus the shared layout, coercion and row materialization.
 *
 * @module columnar
 */

import { ValidationError } from '../errors.js'
import { arrowBackend } from './arrow/index.js'
import { nativeBackend } from './native/index.js'
import { BACKEND_NAMES, type BackendName, type ColumnarBackend } from './types.js'

export * from './types.js'
export * from './layout.js'
export { coerceScalar, unescapeHtml, formatServiceDate, TRUE_TOKENS, FALSE_TOKENS } from './coerce.js'
export { coerceRecord, materializeRows, explodeRow } from './rows.js'
export { BaseBatchBuilder } from './builder.js'
export { arrowBackend, ArrowColumnarBatch, ArrowBatchBuilder, ArrowBatchWriter } from './arrow/index.js'
export { nativeBackend, NativeColumnarBatch, NativeBatchBuilder, NativeBatchWriter } from './native/index.js'

const BACKENDS: Readonly<Record<BackendName, ColumnarBackend>> = {
  arrow: arrowBackend,
  native: nativeBackend,
}

/** Default columnar runtime */
export const DEFAULT_BACKEND: BackendName = 'arrow'

/**
 * Type guard for backend names.
 */
export function isBackendName(value: string): value is BackendName {
  return BACKEND_NAMES.some(name => name === value)
}

/**
 * Look up a backend by name.
 *
 * @throws {ValidationError} For an unknown name
 */
export function getBackend(name: string): ColumnarBackend {
  if (!isBackendName(name)) {
    throw new ValidationError(`unknown backend '${name}' (expected ${BACKEND_NAMES.join(' or ')})`, 'backend', name)
  }
  return BACKENDS[name]
}
