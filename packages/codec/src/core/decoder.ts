import type { ByteSource, Codepoint, SequenceLength } from "../ports/codepoint"
import type { DecodeStep } from "../ports/decode-step"
import {
  B2_LEAD,
  B2_MASK,
  B3_LEAD,
  B3_MASK,
  B4_LEAD,
  B4_MASK,
  CONTINUATION_BITS,
  MAX_CODEPOINT,
  MB_LEAD,
  MB_MARKER_MASK,
  MB_MASK,
  MIN_VALUE_FOR_LENGTH,
  SURROGATE_MAX,
  SURROGATE_MIN,
} from "./constants"
import { type ByteCursor, createCursor } from "./cursor"
import { DecodeError } from "./errors/decode-error"

type LeadShape = { length: Exclude<SequenceLength, 1>; mask: number }

function leadShape(lead: number): LeadShape | undefined {
  if (lead < B2_LEAD) return undefined // stray continuation byte
  if (lead < B3_LEAD) return { length: 2, mask: B2_MASK }
  if (lead < B4_LEAD) return { length: 3, mask: B3_MASK }
  if (lead < 0xf8) return { length: 4, mask: B4_MASK }
  return undefined
}

/**
 * Read one codepoint at the cursor.
 *
 * The cursor moves past the sequence only when the result is a `value`.
 * Malformed input is rejected: invalid lead and continuation bytes,
 * overlong forms, surrogates and values above U+10FFFF all come back as
 * `invalid` with the reason.
 */
export function nextCodepoint(cursor: ByteCursor): DecodeStep {
  const lead = cursor.peek()
  if (lead === undefined) return { kind: "end_of_input" }

  if (lead < MB_LEAD) {
    cursor.advance(1)
    return { kind: "value", codepoint: lead, length: 1 }
  }

  const offset = cursor.position
  const shape = leadShape(lead)

  if (!shape) return { kind: "invalid", reason: "invalid_lead_byte", offset }

  const { length, mask } = shape
  let cp = (lead & mask) << (CONTINUATION_BITS * (length - 1))

  for (let i = 1; i < length; i++) {
    const b = cursor.peek(i)

    if (b === undefined) {
      return { kind: "truncated", offset, expected: length, available: cursor.remaining }
    }

    if ((b & MB_MARKER_MASK) !== MB_LEAD) {
      return { kind: "invalid", reason: "invalid_continuation_byte", offset }
    }

    cp |= (b & MB_MASK) << (CONTINUATION_BITS * (length - 1 - i))
  }

  if (cp < MIN_VALUE_FOR_LENGTH[length]) {
    return { kind: "invalid", reason: "overlong_encoding", offset }
  }

  if (cp >= SURROGATE_MIN && cp <= SURROGATE_MAX) {
    return { kind: "invalid", reason: "surrogate_codepoint", offset }
  }

  if (cp > MAX_CODEPOINT) {
    return { kind: "invalid", reason: "out_of_range_codepoint", offset }
  }

  cursor.advance(length)
  return { kind: "value", codepoint: cp, length }
}

/**
 * Decode a whole buffer.
 *
 * @throws {DecodeError} on the first truncated or malformed sequence. No
 * partial result is returned.
 */
export function decode(bytes: ByteSource): Codepoint[] {
  const cursor = createCursor(bytes)
  const codepoints: Codepoint[] = []

  for (;;) {
    const step = nextCodepoint(cursor)

    switch (step.kind) {
      case "value":
        codepoints.push(step.codepoint)
        break
      case "end_of_input":
        return codepoints
      case "truncated":
        throw new DecodeError("truncated_sequence", step.offset, {
          expected: step.expected,
          available: step.available,
        })
      case "invalid":
        throw new DecodeError(step.reason, step.offset, {
          lead: cursor.peek(),
        })
    }
  }
}

// String.fromCodePoint spreads its arguments onto the stack.
const FROM_CODEPOINT_CHUNK = 4096

export function decodeToString(bytes: ByteSource): string {
  const codepoints = decode(bytes)
  let out = ""

  for (let i = 0; i < codepoints.length; i += FROM_CODEPOINT_CHUNK) {
    out += String.fromCodePoint(...codepoints.slice(i, i + FROM_CODEPOINT_CHUNK))
  }

  return out
}
