/**
 * Standard output sink, for piping a run's output into another program.
 */

import type { Writable } from 'node:stream'
import type { OutputSink } from './types.js'

/**
 * Writes every chunk it is given to a stream (process.stdout by default), so
 * output reaches the reader as each batch is written. The path is ignored.
 *
 * @public
 */
export class StreamSink implements OutputSink {
  constructor(private readonly stream: Writable = process.stdout) {}

  write(path: string, data: Uint8Array): Promise<void> {
    return this.append(path, data)
  }

  append(_path: string, data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(data, error => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }
}
