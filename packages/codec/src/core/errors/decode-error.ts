import type { InvalidSequenceReason } from "../../ports/decode-step"
import { CodecError, type ErrorContext } from "./codec-error"

export type DecodeErrorCode = InvalidSequenceReason | "truncated_sequence" | "non_ascii_byte"

export class DecodeError extends CodecError<DecodeErrorCode> {
  /** Absolute index of the byte that started the failing sequence. */
  readonly offset: number

  constructor(code: DecodeErrorCode, offset: number, context: ErrorContext = {}) {
    super(describe(code, offset), { code, context: { offset, ...context } })

    this.offset = offset
  }
}

function describe(code: DecodeErrorCode, offset: number): string {
  switch (code) {
    case "truncated_sequence":
      return `Input ends inside a multi-byte sequence starting at offset ${offset}`
    case "invalid_lead_byte":
      return `Byte at offset ${offset} cannot start a UTF-8 sequence`
    case "invalid_continuation_byte":
      return `Sequence at offset ${offset} has a continuation byte without the 10 marker`
    case "overlong_encoding":
      return `Sequence at offset ${offset} is an overlong encoding`
    case "surrogate_codepoint":
      return `Sequence at offset ${offset} encodes a surrogate codepoint`
    case "out_of_range_codepoint":
      return `Sequence at offset ${offset} encodes a value above U+10FFFF`
    case "non_ascii_byte":
      return `Byte at offset ${offset} is outside the ASCII range`
  }
}
