/**
 * Retry with Exponential Backoff
 *
 * Retries transient transport failures (timeouts, connection resets, 429 and
 * 5xx answers). Delays grow as `baseDelay * multiplier^(attempt - 1)`, with
 * optional jitter, capped at `maxDelay`.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { isRetryableError } from '../errors.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Information passed to the onRetry callback
 */
export interface RetryInfo {
  /** The retry attempt number (1-indexed, so first retry is 1) */
  attempt: number
  /** The error that triggered the retry */
  error: Error
  /** The delay in milliseconds before this retry */
  delay: number
}

/**
 * Configuration options for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number | undefined
  /** Base delay in milliseconds (default: 200) */
  baseDelay?: number | undefined
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelay?: number | undefined
  /** Multiplier for exponential backoff (default: 2) */
  multiplier?: number | undefined
  /** Whether to add random jitter to delays (default: true) */
  jitter?: boolean | undefined
  /** Jitter factor (default: 0.2, meaning +/- 20%) */
  jitterFactor?: number | undefined
  /** Custom predicate to determine if error is retryable */
  isRetryable?: ((error: Error) => boolean) | undefined
  /** Called before each retry attempt. Return false to abort retries. */
  onRetry?: ((info: RetryInfo) => boolean | void) | undefined
  /** Stops retrying; the last error is rethrown */
  signal?: AbortSignal | undefined
  /** Custom delay function, for tests */
  delayFn?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined
}

// =============================================================================
// DEFAULT CONFIG
// =============================================================================

export const DEFAULT_RETRY_CONFIG = {
  maxRetries: 3,
  baseDelay: 200,
  maxDelay: 5000,
  multiplier: 2,
  jitter: true,
  jitterFactor: 0.2,
} as const

// =============================================================================
// DELAY
// =============================================================================

async function defaultDelay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, signal !== undefined ? { signal } : undefined)
}

/**
 * Delay before retry `attempt` (1-indexed).
 */
export function calculateDelay(
  attempt: number,
  config: { baseDelay: number; maxDelay: number; multiplier: number; jitter: boolean; jitterFactor: number },
  random: () => number = Math.random
): number {
  let delay = config.baseDelay * Math.pow(config.multiplier, attempt - 1)
  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor
    delay += (random() * 2 - 1) * jitterRange
  }
  return Math.floor(Math.min(Math.max(0, delay), config.maxDelay))
}

// =============================================================================
// MAIN RETRY FUNCTION
// =============================================================================

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or runs out of
 * retries. The failing error is rethrown as is.
 *
 * @param fn - Receives the 1-indexed attempt number
 *
 * @example
 * ```typescript
 * const body = await withRetry(() => transport.fetchPage(query, token), {
 *   maxRetries: 5,
 *   onRetry: ({ attempt, error }) => logger.warn(`retry ${attempt}: ${error.message}`),
 * })
 * ```
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, config: RetryConfig = {}): Promise<T> {
  const maxRetries = config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries
  const delayConfig = {
    baseDelay: config.baseDelay ?? DEFAULT_RETRY_CONFIG.baseDelay,
    maxDelay: config.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier: config.multiplier ?? DEFAULT_RETRY_CONFIG.multiplier,
    jitter: config.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
    jitterFactor: config.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  }
  const isRetryable = config.isRetryable ?? isRetryableError
  const delayFn = config.delayFn ?? defaultDelay

  let attempts = 0
  while (true) {
    attempts++
    try {
      return await fn(attempts)
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))
      if (!isRetryable(err) || attempts > maxRetries || config.signal?.aborted === true) {
        throw err
      }

      const delay = calculateDelay(attempts, delayConfig)
      if (config.onRetry?.({ attempt: attempts, error: err, delay }) === false) {
        throw err
      }

      try {
        await delayFn(delay, config.signal)
      } catch (delayError) {
        // An aborted wait ends the retries with the error that caused them
        if (config.signal?.aborted === true) throw err
        throw delayError
      }
    }
  }
}
