import type { ByteSource } from "../ports/codepoint"
import { toBytes } from "./bytes"
import { MAX_ONE_BYTE } from "./constants"
import { DecodeError } from "./errors/decode-error"

/**
 * Decode 7-bit ASCII: each byte is its own character.
 *
 * @throws {DecodeError} `non_ascii_byte` for any byte above 0x7F
 */
export function decodeAscii(source: ByteSource): string {
  const bytes = toBytes(source)
  let out = ""

  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i] ?? 0

    if (b > MAX_ONE_BYTE) {
      throw new DecodeError("non_ascii_byte", i, { byte: b })
    }

    out += String.fromCharCode(b)
  }

  return out
}
