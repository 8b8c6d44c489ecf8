import type { CliConfig, OutputFormat } from "../config/schema"
import type { Logger } from "../logging/ports/logger"

export type CliIo = {
  out(line: string): void
  err(line: string): void
}

export type CommandContext = {
  config: CliConfig
  format: OutputFormat
  io: CliIo
  logger: Logger
}

/** Runs one subcommand and returns its exit code. */
export type Command = (operands: readonly string[], ctx: CommandContext) => number
