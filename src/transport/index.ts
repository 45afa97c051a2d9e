/**
 * Transport module
 *
 * Remote access to the webservice: schema synopses, listing pages and the
 * resource directory.
 *
 * @module transport
 */

export * from './types.js'
export { HttpTransport, redactUrl, DEFAULT_TIMEOUT_MS, type HttpTransportOptions, type AuthorizationMode } from './http.js'
export { withRetry, calculateDelay, DEFAULT_RETRY_CONFIG, type RetryConfig, type RetryInfo } from './retry.js'
