/**
 * Transport contract and page windows.
 */

import type { QueryDescriptor } from '../query/index.js'
import type { PageEncoding } from '../record/index.js'

// =============================================================================
// PAGE TOKENS
// =============================================================================

/**
 * Window of one request: `count` records starting at `offset`.
 *
 * @public
 */
export interface PageToken {
  readonly offset: number
  readonly count: number
}

/**
 * @public
 */
export interface FetchedPage {
  /** Raw response body */
  readonly body: Uint8Array
  /** Window of the following request, or null when the limit is exhausted */
  readonly next: PageToken | null
}

/**
 * First window of a run, or null when the limit asks for no records.
 */
export function firstPageToken(descriptor: QueryDescriptor, pageSize: number): PageToken | null {
  const limit = descriptor.limit
  if (limit === undefined) return { offset: 0, count: pageSize }
  if (limit.count === 0) return null
  return { offset: limit.offset, count: Math.min(pageSize, limit.count) }
}

/**
 * Window after `token`. Without a limit paging only stops on a short page,
 * which the caller detects from the records it parsed.
 */
export function nextPageToken(descriptor: QueryDescriptor, token: PageToken): PageToken | null {
  const offset = token.offset + token.count
  const limit = descriptor.limit
  if (limit === undefined) return { offset, count: token.count }

  const end = limit.offset + limit.count
  if (offset >= end) return null
  return { offset, count: Math.min(token.count, end - offset) }
}

// =============================================================================
// TRANSPORT
// =============================================================================

/**
 * @public
 */
export interface RequestOptions {
  readonly signal?: AbortSignal | undefined
}

/**
 * Access to the remote service. Implementations retry transient failures
 * themselves; any error they throw is final.
 *
 * @public
 */
export interface Transport {
  /** Wire encoding of the pages `fetchPage` returns */
  readonly encoding: PageEncoding

  /** Synopsis document of a resource type */
  fetchSchema(resourceType: string, options?: RequestOptions): Promise<Uint8Array>

  fetchPage(descriptor: QueryDescriptor, token: PageToken, options?: RequestOptions): Promise<FetchedPage>

  /** Resource types the key may read */
  listResources(options?: RequestOptions): Promise<string[]>
}
