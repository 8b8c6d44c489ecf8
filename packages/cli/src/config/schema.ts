import { z } from "zod"
import { logLevelNames } from "../logging/ports/log-level"

export const outputFormats = ["decimal", "hex"] as const

export type OutputFormat = (typeof outputFormats)[number]

export const envSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
  OUTPUT_FORMAT: z.enum(outputFormats).default("decimal"),
  DEMO_TEXT: z.string().min(1).default("¢€한𐍈"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type CliConfig = {
  logging: {
    level: EnvConfig["LOG_LEVEL"]
    prettify: boolean
  }
  output: {
    format: OutputFormat
  }
  demo: {
    text: string
  }
}
