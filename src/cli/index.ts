/**
 * colfetch CLI
 *
 * Commands:
 *   get <resource>        Export a resource listing to Arrow or Parquet
 *   schema <resource>     Show the resolved schema of a resource type
 *   resources             List the resource types the key may read
 */

import { loadConfig, transportOptions } from '../config/index.js'
import { HttpTransport } from '../transport/http.js'
import { setLogger } from '../utils/index.js'
import { type ParsedArgs, parseArgs } from './args.js'
import { getCommand } from './commands/get.js'
import { resourcesCommand } from './commands/resources.js'
import { schemaCommand } from './commands/schema.js'
import { createPinoLogger } from './logger.js'
import type { CliContext } from './types.js'

export { parseArgs, toConstraints, DEFAULT_CONFIG_PATH, type ParsedArgs, type LogLevel } from './args.js'
export { createPinoLogger } from './logger.js'
export type { CliContext } from './types.js'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

export const HELP_TEXT = `
colfetch v${VERSION}

Export webservice resource listings to Arrow IPC streams and Parquet files.

USAGE:
  colfetch <command> [options]

COMMANDS:
  get <resource>                Export a listing (stdout unless --output is given)
  schema <resource>             Show the resolved schema
  resources                     List readable resource types

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -c, --config <path>           Config file (default: colfetch.json)
  -o, --output <path>           Output file (default: stdout)
  -f, --format <format>         arrow, parquet or ndjson (default: parquet)
  -b, --backend <backend>       arrow or native (default: arrow)
      --compression <codec>     snappy or none (default: snappy)
      --flatten                 One row per association element
  -l, --limit <limit>           all, N or OFFSET,N
      --fields <a,b,c>          Fields to export (id is always included)
      --filter <field=v1|v2>    Keep records whose field is one of the values (repeatable)
      --date-add <from..to>     Keep records added in [from, to)
      --date-upd <from..to>     Keep records updated in [from, to)
      --sort <field[_DESC]>     Sort order
      --language <id>           Only this language for translated fields
      --json                    JSON output (schema, resources)
      --depth <n>               Association depth shown by schema
      --verbose                 Debug logging
  -q, --quiet                   Warnings and errors only

EXAMPLES:
  colfetch get products --fields reference,price -o products.parquet
  colfetch get orders --date-upd 2024-01-01..2024-02-01 --flatten -f arrow > orders.arrows
  colfetch get customers -f ndjson | head
  colfetch schema products --depth 1
`

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Context wired to the real config file, network and standard streams.
 */
export function createDefaultContext(signal?: AbortSignal): CliContext {
  return {
    loadConfig: path => loadConfig(path),
    createTransport: config => new HttpTransport(transportOptions(config)),
    stdout: process.stdout,
    print,
    printError,
    installLogger: level => setLogger(createPinoLogger(level)),
    signal,
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[] = process.argv.slice(2), ctx?: CliContext): Promise<number> {
  const context = ctx ?? createDefaultContext()
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.version) {
      context.print(`colfetch v${VERSION}`)
      return 0
    }
    if (parsed.options.help || !parsed.command || parsed.command === 'help') {
      context.print(HELP_TEXT)
      return 0
    }

    context.installLogger?.(parsed.options.logLevel)
    return await dispatch(parsed, context)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    context.printError(message)
    return 1
  }
}

async function dispatch(parsed: ParsedArgs, ctx: CliContext): Promise<number> {
  switch (parsed.command) {
    case 'get':
      return getCommand(parsed, ctx)
    case 'schema':
      return schemaCommand(parsed, ctx)
    case 'resources':
      return resourcesCommand(parsed, ctx)
    default:
      ctx.printError(`Unknown command: ${parsed.command}`)
      ctx.print('\nRun "colfetch --help" for usage.')
      return 1
  }
}
