/**
 * HTTP Transport
 *
 * Talks to the webservice over `fetch`. Every request carries a timeout and is
 * retried with exponential backoff while the failure is transient.
 */

import { ParseError, TransportError, ValidationError, isTransportError } from '../errors.js'
import { type QueryDescriptor, toQueryParams } from '../query/index.js'
import { type PageEncoding, decodeUtf8, parseXmlDocument } from '../record/index.js'
import { getLogger } from '../utils/index.js'
import { type RetryConfig, withRetry } from './retry.js'
import { type FetchedPage, type PageToken, type RequestOptions, type Transport, nextPageToken } from './types.js'

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Where the API key goes: the Basic auth user name, or the `ws_key` query parameter.
 */
export type AuthorizationMode = 'header' | 'query'

/**
 * @public
 */
export interface HttpTransportOptions {
  /** API root, e.g. `https://shop.example/api` */
  readonly baseUrl: string
  readonly key: string
  /** Default: 'header' */
  readonly authorization?: AuthorizationMode | undefined
  /** Default: 'xml' */
  readonly encoding?: PageEncoding | undefined
  /** Per-attempt timeout. Default: 30000 */
  readonly timeoutMs?: number | undefined
  readonly retry?: Omit<RetryConfig, 'signal' | 'onRetry' | 'isRetryable'> | undefined
  /** Fetch implementation. Default: global fetch */
  readonly fetch?: typeof fetch | undefined
}

export const DEFAULT_TIMEOUT_MS = 30_000

const QUERY_KEY_PARAM = 'ws_key'

// =============================================================================
// TRANSPORT
// =============================================================================

/**
 * @example
 * ```typescript
 * const transport = new HttpTransport({ baseUrl: 'https://shop.example/api', key: process.env.SHOP_KEY ?? '' })
 * const names = await transport.listResources()
 * ```
 */
export class HttpTransport implements Transport {
  readonly encoding: PageEncoding

  private readonly baseUrl: string
  private readonly key: string
  private readonly authorization: AuthorizationMode
  private readonly timeoutMs: number
  private readonly retry: HttpTransportOptions['retry']
  private readonly fetchFn: typeof fetch

  constructor(options: HttpTransportOptions) {
    if (!options.baseUrl) {
      throw new ValidationError('HttpTransport requires a baseUrl', 'baseUrl', options.baseUrl)
    }
    if (!options.key) {
      throw new ValidationError('HttpTransport requires an API key', 'key')
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.key = options.key
    this.authorization = options.authorization ?? 'header'
    this.encoding = options.encoding ?? 'xml'
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.retry = options.retry
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis)
  }

  async fetchSchema(resourceType: string, options: RequestOptions = {}): Promise<Uint8Array> {
    return this.request(resourceType, [['schema', 'synopsis']], 'xml', options)
  }

  async fetchPage(descriptor: QueryDescriptor, token: PageToken, options: RequestOptions = {}): Promise<FetchedPage> {
    const body = await this.request(descriptor.resourceType, toQueryParams(descriptor, token), this.encoding, options)
    return { body, next: nextPageToken(descriptor, token) }
  }

  /**
   * Names under the `<api>` element of the API root.
   *
   * @throws {ParseError} When the root document has no `<api>` element
   */
  async listResources(options: RequestOptions = {}): Promise<string[]> {
    const body = await this.request('', [], 'xml', options)
    const root = parseXmlDocument(decodeUtf8(body))
    const api = root.name === 'api' ? root : root.children.find(child => child.name === 'api')
    if (api === undefined) {
      throw new ParseError('API root has no <api> element', 0)
    }
    return api.children.map(child => child.name)
  }

  // ===========================================================================
  // REQUESTS
  // ===========================================================================

  /**
   * URL of a request, credentials included.
   */
  buildUrl(path: string, params: readonly (readonly [string, string])[], encoding: PageEncoding): URL {
    const url = new URL(path ? `${this.baseUrl}/${encodeURIComponent(path)}` : `${this.baseUrl}/`)
    for (const [name, value] of params) {
      url.searchParams.append(name, value)
    }
    if (encoding === 'json') {
      url.searchParams.append('output_format', 'JSON')
    }
    if (this.authorization === 'query') {
      url.searchParams.append(QUERY_KEY_PARAM, this.key)
    }
    return url
  }

  private headers(): Record<string, string> {
    if (this.authorization !== 'header') return {}
    return { Authorization: `Basic ${Buffer.from(`${this.key}:`).toString('base64')}` }
  }

  private async request(
    path: string,
    params: readonly (readonly [string, string])[],
    encoding: PageEncoding,
    options: RequestOptions
  ): Promise<Uint8Array> {
    const url = this.buildUrl(path, params, encoding)
    const safeUrl = redactUrl(url)
    const logger = getLogger()

    return withRetry(
      async attempt => {
        logger.debug(`[HttpTransport] GET ${safeUrl} (attempt ${attempt})`)
        return this.attempt(url, safeUrl, options.signal)
      },
      {
        ...this.retry,
        signal: options.signal,
        onRetry: ({ attempt, error, delay }) => {
          logger.warn(`[HttpTransport] retry ${attempt} of ${safeUrl} in ${delay} ms: ${error.message}`)
        },
      }
    )
  }

  private async attempt(url: URL, safeUrl: string, signal: AbortSignal | undefined): Promise<Uint8Array> {
    const signals = [AbortSignal.timeout(this.timeoutMs)]
    if (signal !== undefined) signals.push(signal)

    try {
      const response = await this.fetchFn(url, { headers: this.headers(), signal: AbortSignal.any(signals) })
      if (!response.ok) {
        const status = response.status
        const statusText = response.statusText ? ` ${response.statusText}` : ''
        throw new TransportError(`HTTP ${status}${statusText} from ${safeUrl}`, 'TRANSPORT_ERROR', {
          url: safeUrl,
          status,
          retryable: status === 429 || status >= 500,
        })
      }
      return new Uint8Array(await response.arrayBuffer())
    } catch (error) {
      if (isTransportError(error)) throw error
      if (signal?.aborted === true) {
        throw new TransportError(`request to ${safeUrl} was aborted`, 'TRANSPORT_ERROR', { url: safeUrl, retryable: false, cause: error })
      }
      if (isTimeout(error)) {
        throw new TransportError(`request to ${safeUrl} timed out after ${this.timeoutMs} ms`, 'TRANSPORT_TIMEOUT', {
          url: safeUrl,
          cause: error,
        })
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new TransportError(`request to ${safeUrl} failed: ${reason}`, 'TRANSPORT_ERROR', {
        url: safeUrl,
        retryable: true,
        cause: error,
      })
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError'
}

/**
 * URL text with the API key masked, for logs and errors.
 */
export function redactUrl(url: URL): string {
  if (!url.searchParams.has(QUERY_KEY_PARAM)) return url.toString()
  const copy = new URL(url)
  copy.searchParams.set(QUERY_KEY_PARAM, '***')
  return copy.toString()
}
