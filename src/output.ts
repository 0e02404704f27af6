import type { OutputFormat } from "@/types"

/**
 * Resolves CLI flags to a typed output format.
 * --json wins over --format; anything other than "json" renders as text.
 */
export function resolveFormat(opts: {
  format?: string
  json?: boolean
}): OutputFormat {
  if (opts.json || opts.format === "json") return "json"
  return "text"
}

/**
 * In json mode, writes `data` to stdout and returns true so the caller can
 * return early. In text mode returns false and the caller renders with Ink.
 */
export function formatOutput(format: OutputFormat, data: unknown): boolean {
  if (format !== "json") return false
  console.log(JSON.stringify(data, null, 2))
  return true
}
