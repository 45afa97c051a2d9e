/**
 * Schema Types
 *
 * The closed kind model every resource type is described with.
 * A Schema is resolved once per run and frozen.
 */

// =============================================================================
// KINDS
// =============================================================================

/**
 * Scalar kinds a field value can be coerced to.
 *
 * `integer` is signed 32-bit and `unsigned` is 0..2^32-1, the range of the
 * service's unsigned id and count columns. `html` is text whose markup entities are unescaped during coercion.
 *
 * @public
 */
export type ScalarKind = 'integer' | 'unsigned' | 'decimal' | 'boolean' | 'text' | 'html' | 'date' | 'datetime'

/** All scalar kinds, in declaration order */
export const SCALAR_KINDS: readonly ScalarKind[] = ['integer', 'unsigned', 'decimal', 'boolean', 'text', 'html', 'date', 'datetime']

/**
 * A single scalar value per record.
 *
 * @public
 */
export interface ScalarFieldKind {
  readonly type: 'scalar'
  readonly scalar: ScalarKind
}

/**
 * A nested one-to-many relation. Each element follows `elementSchema`.
 *
 * @public
 */
export interface AssociationFieldKind {
  readonly type: 'association'
  /** Tag of one element on the wire (`category` inside `categories`) */
  readonly elementName: string
  readonly elementSchema: Schema
  readonly cardinality: 'many'
}

/**
 * A text value given once per language, `[{ languageId, value }]`.
 *
 * @public
 */
export interface TranslatedFieldKind {
  readonly type: 'translated'
}

/**
 * @public
 */
export type FieldKind = ScalarFieldKind | AssociationFieldKind | TranslatedFieldKind

// =============================================================================
// SCHEMA
// =============================================================================

/**
 * @public
 */
export interface FieldSpec {
  readonly name: string
  readonly kind: FieldKind
  readonly nullable: boolean
}

/**
 * Ordered field declarations of one resource type, or of one association element.
 *
 * @public
 */
export interface Schema {
  /** Resource type the schema describes (`products`) */
  readonly resourceType: string
  /** Tag of one record on the wire (`product`) */
  readonly recordName: string
  readonly fields: readonly FieldSpec[]
}

// =============================================================================
// HELPERS
// =============================================================================

/** Scalar field kind constructor */
export function scalar(kind: ScalarKind): ScalarFieldKind {
  return { type: 'scalar', scalar: kind }
}

/** Look up a field by name */
export function findField(schema: Schema, name: string): FieldSpec | undefined {
  return schema.fields.find(f => f.name === name)
}

/** Human-readable name of a field kind, used in error messages */
export function describeKind(kind: FieldKind): string {
  switch (kind.type) {
    case 'scalar':
      return kind.scalar
    case 'association':
      return `list<${kind.elementName}>`
    case 'translated':
      return 'translated text'
  }
}

/**
 * Deep-freeze a schema so it can be shared by every pipeline stage.
 */
export function freezeSchema(schema: Schema): Schema {
  for (const field of schema.fields) {
    if (field.kind.type === 'association') {
      freezeSchema(field.kind.elementSchema)
    }
    Object.freeze(field.kind)
    Object.freeze(field)
  }
  Object.freeze(schema.fields)
  return Object.freeze(schema)
}
