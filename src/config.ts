import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs"
import { join } from "path"
import { z } from "zod"

import { ConfigError, NotInitializedError, ValidationError } from "@/errors"

/** Configuration for basediff stored in `.basediff/config.json`. */
export interface BasediffConfig {
  /** Root of the upstream checkout (the directory holding `.repo/`). */
  upstreamPath: string | null
  /** Root of the vendor checkout. */
  vendorPath: string | null
  /** Bound parameters per statement when chunking IN-lists. */
  batchSize: number
  /** Page size used when a query names no limit. */
  defaultPageSize: number
  /** Largest page a caller may request. */
  maxPageSize: number
  /** Largest result set an explicit `--all` read may return. */
  maxUnboundedRows: number
  /** Number of project logs read in parallel during a scan. */
  scanConcurrency: number
  /** Cap on commits read per project, or null for full history. */
  maxCommitsPerProject: number | null
}

/** Default configuration values. */
export const DEFAULTS: BasediffConfig = {
  upstreamPath: null,
  vendorPath: null,
  batchSize: 500,
  defaultPageSize: 50,
  maxPageSize: 1000,
  maxUnboundedRows: 100_000,
  scanConcurrency: 4,
  maxCommitsPerProject: null,
}

const positiveInt = z.number().int().min(1)

// SQLite's default SQLITE_MAX_VARIABLE_NUMBER is 999
const configSchema = z.object({
  upstreamPath: z.string().min(1).nullable(),
  vendorPath: z.string().min(1).nullable(),
  batchSize: positiveInt.max(999),
  defaultPageSize: positiveInt,
  maxPageSize: positiveInt,
  maxUnboundedRows: positiveInt,
  scanConcurrency: positiveInt,
  maxCommitsPerProject: positiveInt.nullable(),
})

const partialSchema = configSchema.partial()

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return "invalid value"
  const key = issue.path.map(String).join(".")
  return key ? `"${key}": ${issue.message}` : issue.message
}

/**
 * Merges a partial config onto a base and checks cross-field constraints.
 * Throws ConfigError naming the first offending key.
 */
function mergeConfig(
  base: BasediffConfig,
  raw: unknown,
  source: string,
): BasediffConfig {
  const parsed = partialSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config (${source}): ${describeIssue(parsed.error)}`,
    )
  }

  const config: BasediffConfig = { ...base }
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value === undefined) continue
    Object.assign(config, { [key]: value })
  }

  if (config.defaultPageSize > config.maxPageSize) {
    throw new ConfigError(
      `Invalid config (${source}): "defaultPageSize" must not exceed "maxPageSize"`,
    )
  }
  return config
}

/** Returns true when `.basediff/config.json` exists. */
export function configExists(basediffDir: string): boolean {
  return existsSync(join(basediffDir, "config.json"))
}

/**
 * Creates `.basediff/config.json` with defaults merged with optional overrides.
 * Creates the `.basediff/` directory if it does not exist.
 * Throws if config already exists or if overrides contain invalid values.
 */
export function createConfig(
  basediffDir: string,
  overrides?: Partial<BasediffConfig>,
): BasediffConfig {
  if (configExists(basediffDir)) {
    throw new ConfigError(
      "Already initialized. Edit .basediff/config.json to change settings.",
    )
  }

  const config = overrides
    ? mergeConfig(DEFAULTS, overrides, "overrides")
    : { ...DEFAULTS }

  if (!existsSync(basediffDir)) {
    mkdirSync(basediffDir, { recursive: true })
  }
  writeFileSync(
    join(basediffDir, "config.json"),
    JSON.stringify(config, null, 2) + "\n",
  )

  return config
}

/**
 * Loads config from `.basediff/config.json`.
 * Missing keys are backfilled from defaults in memory only.
 * Throws when config file does not exist or contains invalid values.
 */
export function loadConfig(basediffDir: string): BasediffConfig {
  const configPath = join(basediffDir, "config.json")

  if (!existsSync(configPath)) {
    throw new NotInitializedError()
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"))
  } catch {
    throw new ConfigError(`Invalid config: ${configPath} is not valid JSON`)
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid config: ${configPath} must be a JSON object`)
  }

  return mergeConfig(DEFAULTS, raw, configPath)
}

/** The two tree roots a scan or classification compares. */
export interface TreePaths {
  upstream: string
  vendor: string
}

/**
 * Resolves the tree roots from CLI flags, falling back to config.
 * Flags win over config values.
 */
export function resolveTreePaths(
  config: BasediffConfig,
  flags: { upstream?: string; vendor?: string },
): TreePaths {
  const upstream = flags.upstream ?? config.upstreamPath
  const vendor = flags.vendor ?? config.vendorPath
  if (!upstream || !vendor) {
    const missing = !upstream ? "upstream" : "vendor"
    throw new ValidationError(
      `no ${missing} tree path configured`,
      `pass --${missing} <path> or set "${missing}Path" in .basediff/config.json`,
    )
  }
  return { upstream, vendor }
}
