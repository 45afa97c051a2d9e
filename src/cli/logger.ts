/**
 * pino-backed logger for the CLI. Log lines go to stderr so that stdout stays
 * free for output data.
 */

import pino from 'pino'
import type { Logger } from '../utils/index.js'
import type { LogLevel } from './args.js'

/**
 * Adapt a pino instance to the library's Logger interface.
 *
 * @param destination - Default: stderr
 */
export function createPinoLogger(level: LogLevel, destination: pino.DestinationStream = pino.destination(2)): Logger {
  const logger = pino({ name: 'colfetch', level }, destination)
  return {
    debug: (msg, ...args) => (args.length > 0 ? logger.debug({ args }, msg) : logger.debug(msg)),
    info: (msg, ...args) => (args.length > 0 ? logger.info({ args }, msg) : logger.info(msg)),
    warn: (msg, ...args) => (args.length > 0 ? logger.warn({ args }, msg) : logger.warn(msg)),
    error: (msg, ...args) => (args.length > 0 ? logger.error({ args }, msg) : logger.error(msg)),
  }
}
