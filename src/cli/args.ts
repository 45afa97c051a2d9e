/**
 * CLI Argument Parser
 *
 * Pure functions for parsing command line arguments.
 * Nothing here touches the network or the filesystem.
 */

import { ValidationError } from '../errors.js'
import { BACKEND_NAMES, type BackendName } from '../columnar/types.js'
import {
  type FilterConstraint,
  type QueryConstraints,
  type QueryLimit,
  type SortDirection,
  parseDateRange,
  parseLimit,
  parseMembershipArgument,
} from '../query/index.js'
import type { CompressionCodec, OutputFormat } from '../writer/types.js'

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    config: string
    /** Output path; stdout when absent */
    output?: string | undefined
    format: OutputFormat
    backend: BackendName
    compression: CompressionCodec
    flatten: boolean
    /** Undefined for `all` or when not given */
    limit?: QueryLimit | undefined
    fields?: string[] | undefined
    filters: FilterConstraint[]
    sort?: { field: string; direction: SortDirection } | undefined
    language?: number | undefined
    json: boolean
    depth?: number | undefined
    logLevel: LogLevel
  }
}

/** Config file read when `--config` is not given */
export const DEFAULT_CONFIG_PATH = 'colfetch.json'

/** Date fields behind the `--date-add` and `--date-upd` flags */
const DATE_FLAGS: Readonly<Record<string, string>> = {
  '--date-add': 'date_add',
  '--date-upd': 'date_upd',
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws {ValidationError} For an unknown option or a malformed option value
 * @throws {QueryError} For a malformed limit, filter or date range
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      config: DEFAULT_CONFIG_PATH,
      format: 'parquet',
      backend: 'arrow',
      compression: 'SNAPPY',
      flatten: false,
      filters: [],
      json: false,
      logLevel: 'info',
    },
  }

  let i = 0
  const value = (flag: string): string => {
    const next = argv[++i]
    if (next === undefined) {
      throw new ValidationError(`Missing value for ${flag}`, flag)
    }
    return next
  }

  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '-c':
        case '--config':
          result.options.config = value(arg)
          break
        case '-o':
        case '--output':
          result.options.output = value(arg)
          break
        case '-f':
        case '--format':
          result.options.format = parseFormat(value(arg))
          break
        case '-b':
        case '--backend':
          result.options.backend = parseBackend(value(arg))
          break
        case '--compression':
          result.options.compression = parseCompression(value(arg))
          break
        case '--flatten':
          result.options.flatten = true
          break
        case '-l':
        case '--limit':
          result.options.limit = parseLimit(value(arg))
          break
        case '--fields':
          result.options.fields = parseFieldList(value(arg))
          break
        case '--filter': {
          const { field, values } = parseMembershipArgument(value(arg))
          result.options.filters.push({ type: 'membership', field, values })
          break
        }
        case '--date-add':
        case '--date-upd': {
          const field = DATE_FLAGS[arg] ?? arg
          const { low, high } = parseDateRange(value(arg), field)
          result.options.filters.push({ type: 'dateRange', field, low, high })
          break
        }
        case '--sort':
          result.options.sort = parseSort(value(arg))
          break
        case '--language':
          result.options.language = parsePositiveInteger(arg, value(arg))
          break
        case '--json':
          result.options.json = true
          break
        case '--depth':
          result.options.depth = parsePositiveInteger(arg, value(arg))
          break
        case '--verbose':
          result.options.logLevel = 'debug'
          break
        case '-q':
        case '--quiet':
          result.options.logLevel = 'warn'
          break
        default:
          throw new ValidationError(`Unknown option: ${arg}`, 'argv', arg)
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      // Rest are command arguments
      result.args.push(arg)
    }
    i++
  }

  return result
}

/**
 * Query constraints carried by parsed arguments.
 */
export function toConstraints(args: ParsedArgs, language?: number): QueryConstraints {
  return {
    fields: args.options.fields,
    filters: args.options.filters,
    limit: args.options.limit,
    sort: args.options.sort,
    language: args.options.language ?? language,
  }
}

// =============================================================================
// Option values
// =============================================================================

function parseFormat(text: string): OutputFormat {
  switch (text) {
    case 'arrow':
    case 'arrow-stream':
      return 'arrow-stream'
    case 'parquet':
      return 'parquet'
    case 'json':
    case 'ndjson':
      return 'ndjson'
    default:
      throw new ValidationError(`Invalid format: ${text}. Valid formats: arrow, parquet, ndjson`, '--format', text)
  }
}

function parseBackend(text: string): BackendName {
  const backend = BACKEND_NAMES.find(name => name === text)
  if (backend === undefined) {
    throw new ValidationError(`Invalid backend: ${text}. Valid backends: ${BACKEND_NAMES.join(', ')}`, '--backend', text)
  }
  return backend
}

function parseCompression(text: string): CompressionCodec {
  switch (text.toLowerCase()) {
    case 'snappy':
      return 'SNAPPY'
    case 'none':
    case 'uncompressed':
      return 'UNCOMPRESSED'
    default:
      throw new ValidationError(`Invalid compression: ${text}. Valid codecs: snappy, none`, '--compression', text)
  }
}

function parseFieldList(text: string): string[] {
  const fields = text
    .split(',')
    .map(field => field.trim())
    .filter(field => field.length > 0)
  if (fields.length === 0) {
    throw new ValidationError('--fields needs at least one field name', '--fields', text)
  }
  return fields
}

/** `field`, `field_ASC` or `field_DESC`, as the service writes it */
function parseSort(text: string): { field: string; direction: SortDirection } {
  const match = /^(.+?)(?:_(ASC|DESC))?$/i.exec(text.trim())
  const field = match?.[1]
  if (field === undefined) {
    throw new ValidationError(`Invalid sort: ${text}`, '--sort', text)
  }
  return { field, direction: match?.[2]?.toUpperCase() === 'DESC' ? 'DESC' : 'ASC' }
}

function parsePositiveInteger(flag: string, text: string): number {
  const n = Number(text)
  if (!Number.isInteger(n) || n <= 0) {
    throw new ValidationError(`Invalid ${flag}: ${text}`, flag, text)
  }
  return n
}
