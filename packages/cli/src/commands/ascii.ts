import { decodeAscii } from "@utf8kit/codec"
import { parseHexBytes } from "../args/parse-tokens"
import { UsageError } from "../errors/usage-error"
import type { Command } from "./command"

export const ascii: Command = (operands, { io }) => {
  if (operands.length === 0) throw new UsageError("ascii expects hex bytes, e.g. 48 69")

  io.out(decodeAscii(parseHexBytes(operands)))

  return 0
}
