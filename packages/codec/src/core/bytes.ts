import type { ByteSource } from "../ports/codepoint"

/**
 * Normalize a byte source to a Uint8Array.
 *
 * Uint8Array input is returned as is. Arrays are copied after every element
 * has been checked to be an integer in `0..255`.
 */
export function toBytes(source: ByteSource): Uint8Array {
  if (source instanceof Uint8Array) return source

  for (let i = 0; i < source.length; i++) {
    const b = source[i]

    if (b === undefined || !Number.isInteger(b) || b < 0 || b > 0xff) {
      throw new RangeError(`bytes[${i}] must be an integer in 0..255 (got ${String(b)})`)
    }
  }

  return Uint8Array.from(source)
}
