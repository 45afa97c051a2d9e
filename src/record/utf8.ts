/**
 * UTF-8 validation with byte positions.
 */

/**
 * Offset of the first byte that does not start or continue a valid UTF-8
 * sequence, or -1 when the whole buffer is valid.
 *
 * Rejects overlong encodings, surrogate code points and code points above U+10FFFF.
 */
export function findInvalidUtf8(bytes: Uint8Array): number {
  let i = 0
  const n = bytes.length
  while (i < n) {
    const b0 = bytes[i] ?? 0
    if (b0 < 0x80) {
      i++
      continue
    }

    let need: number
    let min: number
    let cp: number
    if (b0 >= 0xc2 && b0 <= 0xdf) {
      need = 1
      min = 0x80
      cp = b0 & 0x1f
    } else if (b0 >= 0xe0 && b0 <= 0xef) {
      need = 2
      min = 0x800
      cp = b0 & 0x0f
    } else if (b0 >= 0xf0 && b0 <= 0xf4) {
      need = 3
      min = 0x10000
      cp = b0 & 0x07
    } else {
      return i
    }

    // truncated sequence
    if (i + need >= n) {
      return i
    }
    for (let k = 1; k <= need; k++) {
      const b = bytes[i + k] ?? 0
      if ((b & 0xc0) !== 0x80) return i
      cp = (cp << 6) | (b & 0x3f)
    }
    if (cp < min || cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
      return i
    }
    i += need + 1
  }
  return -1
}
