/**
 * Configuration
 *
 * JSON config file for the CLI: service location, credentials and paging.
 * String values may reference the environment as `${NAME}` or
 * `${NAME:-default}`.
 *
 * @module config
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import type { HttpTransportOptions } from '../transport/http.js'
import { isPlainObject } from '../utils/index.js'

// =============================================================================
// SCHEMA
// =============================================================================

const retrySchema = z
  .object({
    /** Total attempts per request, the first one included */
    attempts: z.number().int().min(1).max(10).default(4),
    baseDelayMs: z.number().int().min(0).max(60_000).default(200),
    maxDelayMs: z.number().int().min(0).max(300_000).default(5000),
  })
  .strict()

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    /** Shop root (`https://shop.example`) or API root (`https://shop.example/api`) */
    host: z.string().url(),
    key: z.string().min(1),
    authorization: z.enum(['header', 'query']).default('header'),
    encoding: z.enum(['xml', 'json']).default('xml'),
    timeoutMs: z.number().int().min(1).max(300_000).default(30_000),
    retry: retrySchema.default({}),
    pageSize: z.number().int().min(1).max(100_000).default(1000),
    prefetch: z.number().int().min(1).max(4).default(1),
    batchRows: z.number().int().min(1).optional(),
    language: z.number().int().min(1).optional(),
    unknownHints: z.enum(['text', 'error']).optional(),
  })
  .strict()

export type ColfetchConfig = z.infer<typeof configFileSchema>

// =============================================================================
// ENVIRONMENT EXPANSION
// =============================================================================

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a JSON value.
 *
 * @throws {ConfigError} For a variable that is unset and has no default
 */
export function expandEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
      const [rawName, rawDefault] = inner.split(':-', 2)
      const name = (rawName ?? '').trim()
      if (!name) return match

      const envValue = env[name]
      if (envValue !== undefined && envValue !== '') return envValue
      if (rawDefault !== undefined) return rawDefault
      throw new ConfigError(`Missing required environment variable: ${name}`)
    })
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandEnvVars(item, env))
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, env)
    }
    return out
  }
  return value
}

// =============================================================================
// LOADING
// =============================================================================

/**
 * Validate a parsed config document.
 *
 * @throws {ConfigError} With one issue per invalid entry
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ColfetchConfig {
  const result = configFileSchema.safeParse(expandEnvVars(raw, env))
  if (!result.success) {
    throw new ConfigError('Invalid config', formatIssues(result.error))
  }
  return result.data
}

/**
 * Read and validate a config file.
 *
 * @throws {ConfigError} When the file is missing, is not JSON, or is invalid
 */
export async function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<ColfetchConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Cannot read config ${path}: ${reason}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Config ${path} is not valid JSON: ${reason}`)
  }
  return parseConfig(raw, env)
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}

// =============================================================================
// DERIVED SETTINGS
// =============================================================================

/**
 * API root of a configured host: `/api` is appended unless already present.
 */
export function apiUrl(host: string): string {
  const trimmed = host.replace(/\/+$/, '')
  return trimmed.endsWith('/api') ? trimmed : `${trimmed}/api`
}

/**
 * Transport settings of a config. `fetch` is left to the caller.
 */
export function transportOptions(config: ColfetchConfig): HttpTransportOptions {
  return {
    baseUrl: apiUrl(config.host),
    key: config.key,
    authorization: config.authorization,
    encoding: config.encoding,
    timeoutMs: config.timeoutMs,
    retry: {
      maxRetries: config.retry.attempts - 1,
      baseDelay: config.retry.baseDelayMs,
      maxDelay: config.retry.maxDelayMs,
    },
  }
}
