import type { Database } from "better-sqlite3"
import {
  closeSync,
  constants,
  existsSync,
  mkdirSync,
  openSync,
  unlinkSync,
  writeFileSync,
} from "fs"
import { join, resolve } from "path"

import type { BasediffConfig } from "@/config"
import { DEFAULTS, loadConfig } from "@/config"
import { LockError, NotInitializedError, handleError } from "@/errors"
import { resolveFormat } from "@/output"
import type { OutputFormat } from "@/types"
import { createDatabase } from "@db/database"

export interface CommandContext {
  format: OutputFormat
  cwd: string
  /** Absolute path of the `.basediff/` workspace directory. */
  basediffDir: string
  db: Database
  dbPath: string
  config: BasediffConfig
}

export interface CommandRequirements {
  /** When false, a missing database is created. Defaults to true. */
  dbMustExist?: boolean
  /** Whether this command performs writes and needs an exclusive lock. */
  needsLock?: boolean
  /** Whether this command requires an initialized config. Defaults to true. */
  needsConfig?: boolean
}

export function getBasediffDir(): string {
  return resolve(process.cwd(), ".basediff")
}

export function getDbPath(): string {
  return join(getBasediffDir(), "index.db")
}

function getLockPath(): string {
  return join(getBasediffDir(), "index.lock")
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}

function acquireLock(): string {
  const lockPath = getLockPath()
  try {
    const fd = openSync(
      lockPath,
      constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY,
    )
    writeFileSync(fd, `${process.pid}\n`)
    closeSync(fd)
    return lockPath
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") {
      throw new LockError()
    }
    throw err
  }
}

function releaseLock(lockPath: string): void {
  if (existsSync(lockPath)) unlinkSync(lockPath)
}

/**
 * Loads config, opens the database and takes the write lock as the command
 * requires, runs the handler, then releases everything. Any error ends the
 * process through `handleError` with the error's exit code.
 */
export async function runCommand(
  programOpts: { format?: string; json?: boolean },
  requirements: CommandRequirements,
  handler: (ctx: CommandContext) => void | Promise<void>,
): Promise<void> {
  const format = resolveFormat(programOpts)
  const cwd = process.cwd()
  const basediffDir = getBasediffDir()

  let db: Database | undefined
  let lockPath: string | undefined
  try {
    const config =
      requirements.needsConfig === false
        ? { ...DEFAULTS }
        : loadConfig(basediffDir)

    const dbPath = getDbPath()
    if (!existsSync(dbPath)) {
      if (requirements.dbMustExist !== false) throw new NotInitializedError()
      mkdirSync(basediffDir, { recursive: true })
    }
    if (requirements.needsLock) {
      lockPath = acquireLock()
    }
    const opened = createDatabase(dbPath)
    db = opened

    await handler({ format, cwd, basediffDir, db: opened, dbPath, config })
  } catch (err) {
    cleanup(db, lockPath)
    handleError(err, format)
  }
  cleanup(db, lockPath)
}

function cleanup(db: Database | undefined, lockPath: string | undefined): void {
  if (db?.open) db.close()
  if (lockPath) releaseLock(lockPath)
}
