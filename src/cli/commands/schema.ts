/**
 * Schema Command
 *
 * Usage:
 *   colfetch schema products              # Indented field tree
 *   colfetch schema products --depth 1    # Associations collapsed
 *   colfetch schema products --json       # Resolved schema as JSON
 */

import { formatSchema, resolveSchema } from '../../schema/index.js'
import type { CliContext, ParsedArgs } from '../types.js'

/**
 * Execute the schema command
 */
export async function schemaCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const resourceType = args.args[0]
  if (!resourceType) {
    ctx.printError('schema: missing resource type (e.g. "colfetch schema products")')
    return 2
  }

  const config = await ctx.loadConfig(args.options.config)
  const transport = ctx.createTransport(config)
  const document = await transport.fetchSchema(resourceType, { signal: ctx.signal })
  const schema = resolveSchema(resourceType, document, { unknownHints: config.unknownHints })

  ctx.print(args.options.json ? JSON.stringify(schema, null, 2) : formatSchema(schema, args.options.depth))
  return 0
}
