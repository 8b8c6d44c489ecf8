import type { Codepoint, SequenceLength } from "./codepoint"

export type InvalidSequenceReason =
  | "invalid_lead_byte"
  | "invalid_continuation_byte"
  | "overlong_encoding"
  | "surrogate_codepoint"
  | "out_of_range_codepoint"

export type DecodedValue = {
  readonly kind: "value"
  readonly codepoint: Codepoint
  /** Bytes consumed by this codepoint. */
  readonly length: SequenceLength
}

export type EndOfInput = {
  readonly kind: "end_of_input"
}

export type TruncatedSequence = {
  readonly kind: "truncated"
  /** Absolute index of the lead byte. */
  readonly offset: number
  /** Length announced by the lead byte. */
  readonly expected: SequenceLength
  /** Bytes left in the buffer, lead byte included. */
  readonly available: number
}

export type InvalidSequence = {
  readonly kind: "invalid"
  readonly reason: InvalidSequenceReason
  /** Absolute index of the lead byte. */
  readonly offset: number
}

/**
 * Outcome of reading one codepoint from a cursor.
 *
 * @remarks
 * Only `value` moves the cursor. The other kinds leave it on the lead byte
 * so the caller can report or inspect the failing position.
 */
export type DecodeStep = DecodedValue | EndOfInput | TruncatedSequence | InvalidSequence
