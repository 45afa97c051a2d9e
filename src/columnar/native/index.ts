/**
 * Native backend: plain JS column arrays shaped as hyparquet-writer column sources.
 *
 * @module columnar/native
 */

import type { Schema } from '../../schema/types.js'
import type { BatchWriterOptions } from '../../writer/types.js'
import type { BatchBuilderOptions, ColumnarBackend } from '../types.js'
import { NativeBatchBuilder } from './builder.js'
import { NativeBatchWriter } from './writer.js'

export { NativeColumnarBatch } from './batch.js'
export { NativeBatchBuilder } from './builder.js'
export { NativeBatchWriter } from './writer.js'
export { toParquetSchema, toParquetValue, fromParquetValue, type ParquetValue } from './type-system.js'

export const nativeBackend: ColumnarBackend = {
  name: 'native',
  createBuilder: (schema: Schema, options?: BatchBuilderOptions) => new NativeBatchBuilder(schema, options),
  createWriter: (options: BatchWriterOptions) => new NativeBatchWriter(options),
}
