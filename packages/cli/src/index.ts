export { parseArgs, type ParsedArgs } from "./args/parse-args"
export { parseCodepoints, parseHexBytes } from "./args/parse-tokens"
export type { CliIo, Command, CommandContext } from "./commands"
export { loadCliConfig, mapEnvToConfig, readPrefixedEnv } from "./config/load-cli-config"
export type { CliConfig, OutputFormat } from "./config/schema"
export { ConfigError } from "./errors/config-error"
export { UsageError } from "./errors/usage-error"
export { NullLogger } from "./logging/adapters/null-logger"
export { PinoLogger, type PinoLoggerOptions } from "./logging/adapters/pino-logger"
export { type LogLevelName, logLevelNames } from "./logging/ports/log-level"
export type { LogContext, Logger, LoggerOptions, LogMeta } from "./logging/ports/logger"
export { ExitCode, HELP, type RunOptions, runCli } from "./run"
