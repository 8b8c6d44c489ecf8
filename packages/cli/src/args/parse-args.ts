import { type OutputFormat, outputFormats } from "../config/schema"
import { UsageError } from "../errors/usage-error"

export type ParsedArgs = {
  command: string | undefined
  operands: string[]
  format?: OutputFormat
  help: boolean
}

function isOutputFormat(v: string): v is OutputFormat {
  return outputFormats.some((f) => f === v)
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: undefined, operands: [], help: false }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? ""

    if (arg === "-h" || arg === "--help") {
      parsed.help = true
    } else if (arg === "-f" || arg === "--format") {
      const value = argv[++i]
      if (value === undefined || !isOutputFormat(value)) {
        throw new UsageError(`${arg} expects one of: ${outputFormats.join(", ")}`)
      }
      parsed.format = value
    } else if (arg === "--") {
      parsed.operands.push(...argv.slice(i + 1))
      break
    } else if (arg.startsWith("-") && !/^-\d/.test(arg)) {
      throw new UsageError(`unknown option: ${arg}`)
    } else if (parsed.command === undefined) {
      parsed.command = arg
    } else {
      parsed.operands.push(arg)
    }
  }

  return parsed
}
