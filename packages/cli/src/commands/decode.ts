import { decode as decodeBytes } from "@utf8kit/codec"
import { parseHexBytes } from "../args/parse-tokens"
import { UsageError } from "../errors/usage-error"
import { formatCodepoints } from "../format"
import type { Command } from "./command"

export const decode: Command = (operands, { format, io, logger }) => {
  if (operands.length === 0) throw new UsageError("decode expects hex bytes, e.g. c2 a2")

  const bytes = parseHexBytes(operands)
  const codepoints = decodeBytes(bytes)

  logger.debug("decoded bytes", { bytes: bytes.length, codepoints: codepoints.length })
  io.out(formatCodepoints(codepoints, format))

  return 0
}
