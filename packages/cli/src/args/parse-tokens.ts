import { UsageError } from "../errors/usage-error"

const HEX_RUN = /^(?:0x)?((?:[0-9a-f]{2})+)$/i
const CODEPOINT = /^(?:u\+|0x)([0-9a-f]+)$|^(\d+)$/i

/**
 * Parse hex byte tokens. Each token is one or more two-digit pairs with an
 * optional `0x` prefix, so `c2 a2`, `0xC2 0xA2` and `c2a2` are equivalent.
 */
export function parseHexBytes(tokens: readonly string[]): Uint8Array {
  const out: number[] = []

  for (const token of tokens) {
    const match = HEX_RUN.exec(token)
    const digits = match?.[1]

    if (digits === undefined) {
      throw new UsageError(`not a hex byte sequence: ${token}`)
    }

    for (let i = 0; i < digits.length; i += 2) {
      out.push(Number.parseInt(digits.slice(i, i + 2), 16))
    }
  }

  return Uint8Array.from(out)
}

/**
 * Parse codepoint tokens: decimal (`8364`), `0x20AC` or `U+20AC`.
 *
 * Values are not range-checked here; the encoder reports invalid ones.
 */
export function parseCodepoints(tokens: readonly string[]): number[] {
  return tokens.map((token) => {
    const match = CODEPOINT.exec(token)
    const hex = match?.[1]
    const dec = match?.[2]

    if (hex !== undefined) return Number.parseInt(hex, 16)
    if (dec !== undefined) return Number.parseInt(dec, 10)

    throw new UsageError(`not a codepoint: ${token}`)
  })
}
