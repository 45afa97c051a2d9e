/**
 * Schema Resolver
 *
 * Turns a synopsis document (`GET /api/<resource>?schema=synopsis`) into a
 * frozen Schema. Resolution is a pure function of the bytes: no retries,
 * no I/O.
 *
 * Synopsis layout:
 * ```xml
 * <prestashop>
 *   <product>
 *     <price required="true" format="isPrice"></price>
 *     <name format="isCatalogName"><language id="1"></language></name>
 *     <associations>
 *       <categories nodeType="category" api="categories">
 *         <category><id></id></category>
 *       </categories>
 *     </associations>
 *   </product>
 * </prestashop>
 * ```
 */

import { ParseError, SchemaError } from '../errors.js'
import { decodeUtf8 } from '../record/index.js'
import {
  ASSOCIATIONS_ELEMENT,
  hasElementChildren,
  isLanguageList,
  parseXmlDocument,
  type XmlElement,
} from '../record/xml.js'
import { getLogger } from '../utils/index.js'
import { getHintTable, kindFromName, type HintMapping } from './hints.js'
import { type FieldSpec, type Schema, freezeSchema, scalar } from './types.js'

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * What to do with a `format` hint missing from the hint table.
 *
 * - `text`: nullable text, so new service hints do not break a run
 * - `error`: SchemaError ("unknown declared field type")
 *
 * @public
 */
export type UnknownHintPolicy = 'text' | 'error'

/**
 * @public
 */
export interface ResolveSchemaOptions {
  /** Default: 'text' */
  readonly unknownHints?: UnknownHintPolicy | undefined
  /** Hint table to use instead of the built-in one */
  readonly hints?: ReadonlyMap<string, HintMapping> | undefined
}

interface ResolveContext {
  readonly resourceType: string
  readonly unknownHints: UnknownHintPolicy
  readonly hints: ReadonlyMap<string, HintMapping>
}

/** Name of the identifier field every record carries */
export const ID_FIELD = 'id'

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Resolve the schema of a resource type from its synopsis document.
 *
 * @param resourceType - Resource type the document describes (`products`)
 * @param document - Synopsis bytes or text
 * @throws {SchemaError} On malformed XML, unexpected structure, duplicate
 *   field names, or an unknown hint under the `error` policy
 *
 * @example
 * ```typescript
 * const schema = resolveSchema('products', await transport.fetchSchema('products'))
 * console.log(schema.fields.map(f => f.name))
 * ```
 */
export function resolveSchema(
  resourceType: string,
  document: Uint8Array | string,
  options: ResolveSchemaOptions = {}
): Schema {
  const ctx: ResolveContext = {
    resourceType,
    unknownHints: options.unknownHints ?? 'text',
    hints: options.hints ?? getHintTable(),
  }

  let root: XmlElement
  try {
    const text = typeof document === 'string' ? document : decodeUtf8(document)
    root = parseXmlDocument(text)
  } catch (error) {
    if (error instanceof ParseError) {
      throw new SchemaError(`malformed synopsis (${error.message})`, resourceType, undefined, error)
    }
    throw error
  }

  if (root.children.length !== 1) {
    throw new SchemaError(
      `expected exactly one record element under <${root.name}>, found ${root.children.length}`,
      resourceType
    )
  }
  const [template] = root.children
  if (!template) {
    throw new SchemaError(`no record element under <${root.name}>`, resourceType)
  }

  const fields = fieldsOf(template, ctx)
  if (!fields.some(f => f.name === ID_FIELD)) {
    fields.unshift({ name: ID_FIELD, kind: scalar('integer'), nullable: false })
  }

  return freezeSchema({ resourceType, recordName: template.name, fields })
}

function fieldsOf(template: XmlElement, ctx: ResolveContext): FieldSpec[] {
  const fields: FieldSpec[] = []
  const seen = new Set<string>()
  const add = (field: FieldSpec) => {
    if (seen.has(field.name)) {
      throw new SchemaError(`duplicate field name '${field.name}'`, ctx.resourceType, field.name)
    }
    seen.add(field.name)
    fields.push(field)
  }

  for (const child of template.children) {
    if (child.name === ASSOCIATIONS_ELEMENT) {
      for (const declaration of child.children) {
        add(associationField(declaration, ctx))
      }
    } else if (child.attributes['nodeType'] !== undefined) {
      add(associationField(child, ctx))
    } else if (isLanguageList(child)) {
      add({ name: child.name, kind: { type: 'translated' }, nullable: !isRequired(child) })
    } else if (hasElementChildren(child)) {
      throw new SchemaError(`unexpected nested element <${child.children[0]?.name ?? '?'}>`, ctx.resourceType, child.name)
    } else {
      add(scalarField(child, ctx))
    }
  }
  return fields
}

function associationField(declaration: XmlElement, ctx: ResolveContext): FieldSpec {
  if (declaration.children.length !== 1) {
    throw new SchemaError(
      `association must declare exactly one element template, found ${declaration.children.length}`,
      ctx.resourceType,
      declaration.name
    )
  }
  const [template] = declaration.children
  if (!template) {
    throw new SchemaError('association has no element template', ctx.resourceType, declaration.name)
  }
  const fields = fieldsOf(template, ctx)
  if (fields.length === 0) {
    throw new SchemaError(`association element <${template.name}> declares no fields`, ctx.resourceType, declaration.name)
  }

  return {
    name: declaration.name,
    kind: {
      type: 'association',
      elementName: template.name,
      elementSchema: {
        resourceType: declaration.attributes['api'] ?? declaration.name,
        recordName: template.name,
        fields,
      },
      cardinality: 'many',
    },
    // An absent association decodes as an empty element list, never as null
    nullable: false,
  }
}

function scalarField(element: XmlElement, ctx: ResolveContext): FieldSpec {
  const hint = element.attributes['format']
  const required = isRequired(element)

  if (hint === undefined) {
    return { name: element.name, kind: scalar(kindFromName(element.name) ?? 'text'), nullable: !required }
  }

  const mapping = ctx.hints.get(hint)
  if (mapping) {
    return { name: element.name, kind: scalar(mapping.kind), nullable: mapping.nullable ?? !required }
  }

  if (ctx.unknownHints === 'error') {
    throw new SchemaError(`unknown declared field type '${hint}'`, ctx.resourceType, element.name)
  }
  getLogger().warn(`[SchemaResolver] ${ctx.resourceType}.${element.name}: unknown format hint '${hint}', using nullable text`)
  return { name: element.name, kind: scalar('text'), nullable: true }
}

function isRequired(element: XmlElement): boolean {
  return element.attributes['required'] === 'true'
}
