import type { Byte, Codepoint, SequenceLength } from "../ports/codepoint"
import {
  B2_LEAD,
  B3_LEAD,
  B4_LEAD,
  MAX_CODEPOINT,
  MAX_ONE_BYTE,
  MAX_THREE_BYTE,
  MAX_TWO_BYTE,
  MB_LEAD,
  MB_MASK,
  SURROGATE_MAX,
  SURROGATE_MIN,
} from "./constants"
import { EncodeError } from "./errors/encode-error"

export type EncodeFailure = {
  /** Position of the rejected entry in the input. */
  readonly index: number
  readonly codepoint: number
  readonly error: EncodeError
}

export type EncodeBatchResult = {
  /** Encodings of every accepted entry, in input order. */
  readonly bytes: Uint8Array
  readonly failures: readonly EncodeFailure[]
}

/**
 * Number of bytes needed to encode `cp`.
 *
 * @throws {EncodeError} when `cp` is not a Unicode scalar value
 */
export function encodedLength(cp: number): SequenceLength {
  if (!Number.isInteger(cp)) throw new EncodeError(cp, "not_an_integer")
  if (cp < 0 || cp > MAX_CODEPOINT) throw new EncodeError(cp, "out_of_range")
  if (cp >= SURROGATE_MIN && cp <= SURROGATE_MAX) throw new EncodeError(cp, "surrogate")

  if (cp <= MAX_ONE_BYTE) return 1
  if (cp <= MAX_TWO_BYTE) return 2
  if (cp <= MAX_THREE_BYTE) return 3
  return 4
}

export function encode(cp: Codepoint): Uint8Array {
  switch (encodedLength(cp)) {
    case 1:
      return Uint8Array.of(cp)
    case 2:
      return Uint8Array.of(B2_LEAD | (cp >> 6), MB_LEAD | (cp & MB_MASK))
    case 3:
      return Uint8Array.of(
        B3_LEAD | (cp >> 12),
        MB_LEAD | ((cp >> 6) & MB_MASK),
        MB_LEAD | (cp & MB_MASK),
      )
    case 4:
      return Uint8Array.of(
        B4_LEAD | (cp >> 18),
        MB_LEAD | ((cp >> 12) & MB_MASK),
        MB_LEAD | ((cp >> 6) & MB_MASK),
        MB_LEAD | (cp & MB_MASK),
      )
  }
}

/**
 * Encode each codepoint independently.
 *
 * A rejected entry is reported in `failures` and contributes no bytes; the
 * bytes of every other entry are kept.
 */
export function encodeAll(codepoints: Iterable<number>): EncodeBatchResult {
  const out: Byte[] = []
  const failures: EncodeFailure[] = []
  let index = 0

  for (const cp of codepoints) {
    try {
      out.push(...encode(cp))
    } catch (err) {
      if (!(err instanceof EncodeError)) throw err
      failures.push({ index, codepoint: cp, error: err })
    }
    index++
  }

  return { bytes: Uint8Array.from(out), failures }
}

/**
 * Encode a JavaScript string, one code point at a time.
 *
 * @throws {EncodeError} for a lone surrogate in the string
 */
export function encodeText(text: string): Uint8Array {
  const out: Byte[] = []

  for (const ch of text) {
    // a string iterator never yields an empty string
    const cp = ch.codePointAt(0) ?? 0
    out.push(...encode(cp))
  }

  return Uint8Array.from(out)
}
