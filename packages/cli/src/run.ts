import { isCodecError } from "@utf8kit/codec"
import { parseArgs } from "./args/parse-args"
import { type CliIo, commands } from "./commands"
import { loadCliConfig } from "./config/load-cli-config"
import type { CliConfig } from "./config/schema"
import { ConfigError } from "./errors/config-error"
import { UsageError } from "./errors/usage-error"
import { PinoLogger } from "./logging/adapters/pino-logger"
import type { Logger } from "./logging/ports/logger"

export const HELP = `Usage: utf8kit <command> [options] [operands]

Commands:
  demo                  Decode the demo text and print its codepoints
  decode <hex...>       Decode UTF-8 bytes (c2 a2, 0xC2 0xA2 or c2a2)
  encode <codepoint...> Encode codepoints (8364, 0x20AC or U+20AC)
  ascii <hex...>        Decode ASCII bytes to text

Options:
  -f, --format <fmt>    Codepoint output: decimal or hex
  -h, --help            Show this help

Environment:
  UTF8KIT_LOG_LEVEL, UTF8KIT_LOG_PRETTY, UTF8KIT_OUTPUT_FORMAT, UTF8KIT_DEMO_TEXT`

export const ExitCode = {
  Ok: 0,
  CodecFailure: 1,
  Usage: 2,
} as const

export type RunOptions = {
  env?: Record<string, string | undefined>
  io?: CliIo
  /** Replaces the logger built from config. */
  logger?: Logger
}

const processIo: CliIo = {
  out: (line) => {
    process.stdout.write(`${line}\n`)
  },
  err: (line) => {
    process.stderr.write(`${line}\n`)
  },
}

export function runCli(argv: readonly string[], options: RunOptions = {}): number {
  const io = options.io ?? processIo

  let config: CliConfig
  try {
    config = loadCliConfig(options.env ?? process.env)
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    io.err(`error: ${err.message}`)
    return ExitCode.Usage
  }

  const root = options.logger ?? new PinoLogger(config.logging, { service: "utf8kit" })

  try {
    const args = parseArgs(argv)

    if (args.help || args.command === undefined || args.command === "help") {
      io.out(HELP)
      return ExitCode.Ok
    }

    const command = commands.get(args.command)
    if (!command) throw new UsageError(`unknown command: ${args.command}`)

    const format = args.format ?? config.output.format
    const logger = root.child({ command: args.command, format })

    logger.debug("running command", { operands: args.operands.length })

    return command(args.operands, { config, format, io, logger })
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`error: ${err.message}`)
      io.err("run 'utf8kit --help' for usage")
      return ExitCode.Usage
    }

    if (isCodecError(err)) {
      root.error("command failed", { err, code: err.code })
      io.err(`error: ${err.message}`)
      return ExitCode.CodecFailure
    }

    throw err
  }
}
