import { CodecError } from "./codec-error"

export type InvalidCodepointReason = "not_an_integer" | "out_of_range" | "surrogate"

export class EncodeError extends CodecError<"invalid_codepoint"> {
  readonly codepoint: number
  readonly reason: InvalidCodepointReason

  constructor(codepoint: number, reason: InvalidCodepointReason) {
    super(`Cannot encode ${String(codepoint)}: ${reason.replaceAll("_", " ")}`, {
      code: "invalid_codepoint",
      context: { codepoint, reason },
    })

    this.codepoint = codepoint
    this.reason = reason
  }
}
