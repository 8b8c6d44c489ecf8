import { decode, encodeText } from "@utf8kit/codec"
import { UsageError } from "../errors/usage-error"
import { formatCodepoints } from "../format"
import type { Command } from "./command"

/**
 * Decode the UTF-8 bytes of the configured demo text and print the
 * codepoints, space separated.
 */
export const demo: Command = (operands, { config, format, io, logger }) => {
  if (operands.length > 0) throw new UsageError("demo takes no arguments")

  const bytes = encodeText(config.demo.text)
  const codepoints = decode(bytes)

  logger.debug("decoded demo text", { bytes: bytes.length, codepoints: codepoints.length })
  io.out(formatCodepoints(codepoints, format))

  return 0
}
