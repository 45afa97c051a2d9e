/**
 * CLI Types
 *
 * Shared by the commands and the entry point. Commands reach the outside world
 * only through a CliContext, so tests can run them against fakes.
 */

import type { Writable } from 'node:stream'
import type { ColfetchConfig } from '../config/index.js'
import type { Transport } from '../transport/types.js'
import type { LogLevel } from './args.js'

export type { ParsedArgs } from './args.js'

/**
 * @public
 */
export interface CliContext {
  loadConfig(path: string): Promise<ColfetchConfig>
  createTransport(config: ColfetchConfig): Transport
  /** Data output when no `--output` path is given */
  readonly stdout: Writable
  /** One line of text output */
  print(message: string): void
  printError(message: string): void
  /** Route library logging at `level` and above */
  installLogger?(level: LogLevel): void
  readonly signal?: AbortSignal | undefined
}
