/**
 * Resources Command
 *
 * Lists the resource types the configured key may read, one per line.
 */

import type { CliContext, ParsedArgs } from '../types.js'

/**
 * Execute the resources command
 */
export async function resourcesCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const config = await ctx.loadConfig(args.options.config)
  const names = await ctx.createTransport(config).listResources({ signal: ctx.signal })
  if (args.options.json) {
    ctx.print(JSON.stringify(names))
  } else {
    for (const name of names) ctx.print(name)
  }
  return 0
}
