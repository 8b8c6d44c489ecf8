import type { Codec } from "../ports/codec"
import type { Codepoint } from "../ports/codepoint"
import { decode } from "../core/decoder"
import { encode } from "../core/encoder"

/**
 * Codepoint arrays to and from UTF-8.
 *
 * Unlike `encodeAll`, `encode` here stops at the first invalid entry.
 */
export const codepointCodec: Codec<readonly Codepoint[]> = {
  encode(codepoints) {
    const parts = codepoints.map((cp) => encode(cp))
    const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))

    let offset = 0
    for (const part of parts) {
      out.set(part, offset)
      offset += part.length
    }

    return out
  },

  decode(bytes) {
    return decode(bytes)
  },
}
