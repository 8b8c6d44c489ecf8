import { encodeAll } from "@utf8kit/codec"
import { parseCodepoints } from "../args/parse-tokens"
import { UsageError } from "../errors/usage-error"
import { formatBytes } from "../format"
import type { Command } from "./command"

/**
 * Print the UTF-8 bytes of every valid codepoint. Invalid entries are
 * reported on stderr and turn the exit code to 1, but never suppress the
 * bytes of the others.
 */
export const encode: Command = (operands, { io, logger }) => {
  if (operands.length === 0) throw new UsageError("encode expects codepoints, e.g. U+20AC")

  const { bytes, failures } = encodeAll(parseCodepoints(operands))

  logger.debug("encoded codepoints", { bytes: bytes.length, failures: failures.length })

  if (bytes.length > 0) io.out(formatBytes(bytes))

  for (const failure of failures) {
    logger.error("codepoint rejected", { err: failure.error, index: failure.index })
    io.err(`error: argument ${failure.index + 1}: ${failure.error.message}`)
  }

  return failures.length > 0 ? 1 : 0
}
