/**
 * Schema module
 *
 * @module schema
 */

export * from './types.js'
export { resolveSchema, ID_FIELD, type ResolveSchemaOptions, type UnknownHintPolicy } from './resolver.js'
export { getHintTable, createHintTable, kindFromName, type HintMapping } from './hints.js'
export { formatSchema } from './format.js'
