/**
 * Shared test fixtures: a product synopsis, listing pages in both encodings,
 * and an in-process transport serving generated pages.
 */

import type { QueryDescriptor } from '../../src/query/index.js'
import type { PageEncoding } from '../../src/record/index.js'
import { resolveSchema } from '../../src/schema/index.js'
import type { Schema } from '../../src/schema/types.js'
import { type FetchedPage, type PageToken, type RequestOptions, type Transport, nextPageToken } from '../../src/transport/types.js'
import { utf8 } from '../../src/utils/index.js'

// =============================================================================
// Synopsis
// =============================================================================

export const PRODUCT_SYNOPSIS = `<?xml version="1.0" encoding="UTF-8"?>
<prestashop xmlns:xlink="http://www.w3.org/1999/xlink">
  <product>
    <id></id>
    <id_manufacturer format="isUnsignedId"></id_manufacturer>
    <reference></reference>
    <price format="isPrice" required="true"></price>
    <active format="isBool"></active>
    <date_upd format="isDate"></date_upd>
    <name><language id="1"></language><language id="2"></language></name>
    <description format="isCleanHtml"></description>
    <associations>
      <categories nodeType="category" api="categories">
        <category>
          <id format="isUnsignedId"></id>
        </category>
      </categories>
    </associations>
  </product>
</prestashop>`

export function productSchema(): Schema {
  return resolveSchema('products', PRODUCT_SYNOPSIS)
}

// =============================================================================
// Two-record page, both encodings
// =============================================================================

export const PRODUCTS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<prestashop>
  <products>
    <product>
      <id>1</id>
      <id_manufacturer>3</id_manufacturer>
      <reference>A-1</reference>
      <price>19.90</price>
      <active>1</active>
      <date_upd>2024-01-15 10:30:00</date_upd>
      <name><language id="1">Mug</language><language id="2">Tasse</language></name>
      <description><![CDATA[Fish &amp; Chips]]></description>
      <associations>
        <categories><category><id>2</id></category><category><id>5</id></category></categories>
      </associations>
    </product>
    <product>
      <id>2</id>
      <id_manufacturer></id_manufacturer>
      <reference>B-2</reference>
      <price>5</price>
      <active>0</active>
      <date_upd>2024-02-01 00:00:00</date_upd>
      <name><language id="1">Plate</language></name>
      <description></description>
      <associations>
        <categories></categories>
      </associations>
    </product>
  </products>
</prestashop>`

export const PRODUCTS_JSON = JSON.stringify({
  products: [
    {
      id: 1,
      id_manufacturer: '3',
      reference: 'A-1',
      price: '19.90',
      active: '1',
      date_upd: '2024-01-15 10:30:00',
      name: [
        { id: '1', value: 'Mug' },
        { id: '2', value: 'Tasse' },
      ],
      description: 'Fish &amp; Chips',
      associations: { categories: [{ id: '2' }, { id: '5' }] },
    },
    {
      id: 2,
      id_manufacturer: '',
      reference: 'B-2',
      price: '5',
      active: '0',
      date_upd: '2024-02-01 00:00:00',
      name: [{ id: '1', value: 'Plate' }],
      description: '',
    },
  ],
})

/** Coerced rows of the two-record page, without flattening */
export const PRODUCT_ROWS = [
  {
    id: 1,
    id_manufacturer: 3,
    reference: 'A-1',
    price: 19.9,
    active: true,
    date_upd: new Date(Date.UTC(2024, 0, 15, 10, 30, 0)),
    name: [
      { languageId: 1, value: 'Mug' },
      { languageId: 2, value: 'Tasse' },
    ],
    description: 'Fish & Chips',
    categories: [{ id: 2 }, { id: 5 }],
  },
  {
    id: 2,
    id_manufacturer: null,
    reference: 'B-2',
    price: 5,
    active: false,
    date_upd: new Date(Date.UTC(2024, 1, 1, 0, 0, 0)),
    name: [{ languageId: 1, value: 'Plate' }],
    description: '',
    categories: [],
  },
]

// =============================================================================
// Generated listings
// =============================================================================

/**
 * Listing page of minimal products. Product `n` costs `n + 0.5` and was
 * updated on day `n` of January 2024.
 */
export function generatedPage(ids: readonly number[]): string {
  const records = ids.map(
    id =>
      `<product><id>${id}</id><price>${id}.5</price>` +
      `<date_upd>2024-01-${String(id).padStart(2, '0')} 00:00:00</date_upd></product>`
  )
  return `<?xml version="1.0" encoding="UTF-8"?>\n<prestashop><products>${records.join('')}</products></prestashop>`
}

/**
 * Transport serving `total` generated products (ids 1..total) in service order.
 */
export class FakeTransport implements Transport {
  readonly encoding: PageEncoding = 'xml'

  /** Windows requested, in call order */
  readonly requests: PageToken[] = []
  schemaRequests = 0

  /** Replaces the body of the page at an offset */
  readonly overrides = new Map<number, string>()
  /** Called on every page request, before the page is built */
  onRequest: ((token: PageToken) => void) | undefined
  /** Error thrown by the request at an offset */
  readonly failures = new Map<number, Error>()

  constructor(
    private readonly total: number,
    private readonly synopsis: string = PRODUCT_SYNOPSIS
  ) {}

  async fetchSchema(_resourceType: string, _options?: RequestOptions): Promise<Uint8Array> {
    this.schemaRequests++
    return utf8(this.synopsis)
  }

  async fetchPage(descriptor: QueryDescriptor, token: PageToken, _options?: RequestOptions): Promise<FetchedPage> {
    this.requests.push(token)
    this.onRequest?.(token)
    const failure = this.failures.get(token.offset)
    if (failure !== undefined) throw failure

    const ids: number[] = []
    for (let id = token.offset + 1; id <= Math.min(token.offset + token.count, this.total); id++) {
      ids.push(id)
    }
    const body = this.overrides.get(token.offset) ?? generatedPage(ids)
    return { body: utf8(body), next: nextPageToken(descriptor, token) }
  }

  async listResources(_options?: RequestOptions): Promise<string[]> {
    return ['products']
  }
}
