import debug from "debug"
import { execFile } from "child_process"
import { existsSync } from "fs"
import { join } from "path"

import { GitError } from "@/errors"
import type { LogEntry } from "@/types"

const log = debug("basediff:git")

const RECORD_SEP = "<<GIT_COMMIT_SEP>>"
const FIELD_SEP = "<<FIELD_SEP>>"
const LOG_FORMAT = `--pretty=format:${RECORD_SEP}%H${FIELD_SEP}%an${FIELD_SEP}%ad${FIELD_SEP}%s${FIELD_SEP}%B`

const CHANGE_ID_PATTERN = /Change-Id:\s*([A-Za-z0-9]+)/i
const REVIEWED_ON_PATTERN = /Reviewed-on:\s*(\S+)/i

/** Runs git with the given arguments and resolves with its stdout. */
export type GitRunner = (args: readonly string[]) => Promise<string>

/** Spawns the git binary. Non-zero exits reject with a GitError. */
export const execGit: GitRunner = (args) =>
  new Promise((resolve, reject) => {
    execFile(
      "git",
      [...args],
      { maxBuffer: 512 * 1024 * 1024, timeout: 300_000 },
      (err, stdout, stderr) => {
        if (err) {
          const detail = stderr.trim() || err.message
          const command = args.slice(2, 3).join(" ")
          reject(new GitError(`git ${command} failed: ${detail}`))
          return
        }
        resolve(stdout)
      },
    )
  })

/** First `Change-Id:` trailer value in a message, or null. */
export function extractChangeId(message: string): string | null {
  return CHANGE_ID_PATTERN.exec(message)?.[1] ?? null
}

/** First `Reviewed-on:` trailer value in a message, or null. */
export function extractReviewUrl(message: string): string | null {
  return REVIEWED_ON_PATTERN.exec(message)?.[1] ?? null
}

/**
 * Splits `s` on `sep` at most `limit - 1` times; the last part keeps the
 * remainder, separators included.
 */
function splitN(s: string, sep: string, limit: number): string[] {
  const parts: string[] = []
  let rest = s
  while (parts.length < limit - 1) {
    const at = rest.indexOf(sep)
    if (at === -1) break
    parts.push(rest.slice(0, at))
    rest = rest.slice(at + sep.length)
  }
  parts.push(rest)
  return parts
}

/**
 * Parses `git log` output produced with the record and field separators.
 * Records with fewer than four fields are dropped. The body is the full
 * message minus its first line, trimmed.
 */
export function parseLog(output: string): LogEntry[] {
  const entries: LogEntry[] = []
  for (const raw of output.split(RECORD_SEP)) {
    const text = raw.trim()
    if (!text) continue
    const parts = splitN(text, FIELD_SEP, 5)
    if (parts.length < 4) continue

    const message = (parts[4] ?? "").trim()
    const lines = message.split("\n")
    entries.push({
      contentHash: parts[0].trim(),
      author: parts[1].trim(),
      timestamp: parts[2].trim(),
      subject: parts[3].trim(),
      body: lines.length > 1 ? lines.slice(1).join("\n").trim() : "",
      changeIdentifier: extractChangeId(message),
      reviewUrl: extractReviewUrl(message),
    })
  }
  return entries
}

/** Log of one project checkout. */
export interface ProjectLog {
  entries: LogEntry[]
  /** Why the project yielded nothing, when it was skipped. */
  warning?: string
}

/** Reads commit logs from project checkouts. */
export class GitLogService {
  private run: GitRunner
  private maxCount: number | null

  /**
   * @param run - Command runner; tests pass a fake.
   * @param maxCount - Commits per project, or null for full history.
   */
  constructor(run: GitRunner = execGit, maxCount: number | null = null) {
    this.run = run
    this.maxCount = maxCount
  }

  /**
   * Returns the project's commits, most recent first. A missing path or a
   * directory that is not a git checkout yields no entries and a warning.
   * @throws GitError when git itself fails.
   */
  async readLog(path: string): Promise<ProjectLog> {
    if (!existsSync(path)) {
      log("skipping %s: path does not exist", path)
      return { entries: [], warning: `path does not exist: ${path}` }
    }
    if (!existsSync(join(path, ".git"))) {
      log("skipping %s: not a git repository", path)
      return { entries: [], warning: `not a git repository: ${path}` }
    }

    const args = ["-C", path, "log", LOG_FORMAT, "--date=iso"]
    if (this.maxCount !== null) args.push("-n", String(this.maxCount))

    const entries = parseLog(await this.run(args))
    log("%s: %d commits", path, entries.length)
    return { entries }
  }
}
