/**
 * Arrow backend: apache-arrow builders, vectors and record batches.
 *
 * @module columnar/arrow
 */

import type { Schema } from '../../schema/types.js'
import type { BatchWriterOptions } from '../../writer/types.js'
import type { BatchBuilderOptions, ColumnarBackend } from '../types.js'
import { ArrowBatchBuilder } from './builder.js'
import { ArrowBatchWriter } from './writer.js'

export { ArrowColumnarBatch } from './batch.js'
export { ArrowBatchBuilder } from './builder.js'
export { ArrowBatchWriter } from './writer.js'
export { toArrowSchema, toArrowType, fromArrowValue, recordBatchFromRows, KIND_METADATA_KEY } from './type-system.js'

export const arrowBackend: ColumnarBackend = {
  name: 'arrow',
  createBuilder: (schema: Schema, options?: BatchBuilderOptions) => new ArrowBatchBuilder(schema, options),
  createWriter: (options: BatchWriterOptions) => new ArrowBatchWriter(options),
}
