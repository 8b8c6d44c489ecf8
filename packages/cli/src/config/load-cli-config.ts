import { z } from "zod"
import { ConfigError } from "../errors/config-error"
import { type CliConfig, type EnvConfig, envSchema } from "./schema"

export const ENV_PREFIX = "UTF8KIT_"

/**
 * Variables carrying `prefix`, with the prefix stripped. Everything else in
 * the environment is ignored.
 */
export function readPrefixedEnv(
  env: Record<string, string | undefined>,
  prefix: string = ENV_PREFIX,
): Record<string, string> {
  const filtered: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}

export function mapEnvToConfig(env: EnvConfig): CliConfig {
  return {
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    output: {
      format: env.OUTPUT_FORMAT,
    },
    demo: {
      text: env.DEMO_TEXT,
    },
  }
}

export function loadCliConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const result = envSchema.safeParse(readPrefixedEnv(env))

  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return mapEnvToConfig(result.data)
}
