/**
 * Get Command
 *
 * Export a resource listing to Arrow or Parquet.
 *
 * Usage:
 *   colfetch get products --fields reference,price --limit 100 -o products.parquet
 *   colfetch get orders --date-upd 2024-01-01..2024-02-01 --flatten -f arrow > orders.arrows
 */

import { basename, dirname, resolve } from 'node:path'
import { run } from '../../engine/index.js'
import { FileSystemStorage } from '../../storage/filesystem.js'
import { StreamSink } from '../../storage/stdout.js'
import { toConstraints } from '../args.js'
import type { CliContext, ParsedArgs } from '../types.js'

/** Path reported for data written to stdout */
export const STDOUT_PATH = '-'

/**
 * Execute the get command
 */
export async function getCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const resourceType = args.args[0]
  if (!resourceType) {
    ctx.printError('get: missing resource type (e.g. "colfetch get products")')
    return 2
  }

  const config = await ctx.loadConfig(args.options.config)
  const output = args.options.output
  const target =
    output !== undefined && output !== STDOUT_PATH
      ? { sink: new FileSystemStorage({ path: dirname(resolve(output)) }), path: basename(output) }
      : { sink: new StreamSink(ctx.stdout), path: STDOUT_PATH }

  const summary = await run(resourceType, toConstraints(args, config.language), target, {
    transport: ctx.createTransport(config),
    backend: args.options.backend,
    format: args.options.format,
    flatten: args.options.flatten,
    compression: args.options.compression,
    prefetch: config.prefetch,
    pageSize: config.pageSize,
    batchRows: config.batchRows,
    unknownHints: config.unknownHints,
    signal: ctx.signal,
  })

  if (target.path !== STDOUT_PATH) {
    ctx.print(`${summary.rowsWritten} row(s) from ${summary.pagesFetched} page(s) written to ${output ?? summary.path}`)
  }
  return 0
}
