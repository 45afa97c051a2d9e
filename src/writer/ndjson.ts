/**
 * Newline-delimited JSON encoder.
 */

import type { CellRow } from '../columnar/types.js'
import { utf8 } from '../utils/index.js'

/**
 * One JSON object per row, keys in column order, each line ending in `\n`.
 * Dates are ISO-8601 UTC strings; list columns are arrays of element objects.
 */
export function encodeNdjsonRows(rows: readonly CellRow[]): Uint8Array {
  let text = ''
  for (const row of rows) {
    text += `${JSON.stringify(row)}\n`
  }
  return utf8(text)
}
