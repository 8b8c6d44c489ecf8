import type { OutputFormat } from "./config/schema"

export function formatCodepoint(cp: number, format: OutputFormat): string {
  if (format === "decimal") return String(cp)

  return `U+${cp.toString(16).toUpperCase().padStart(4, "0")}`
}

export function formatCodepoints(codepoints: readonly number[], format: OutputFormat): string {
  return codepoints.map((cp) => formatCodepoint(cp, format)).join(" ")
}

export function formatBytes(bytes: Uint8Array): string {
  return [...bytes].map((b) => b.toString(16).padStart(2, "0")).join(" ")
}
