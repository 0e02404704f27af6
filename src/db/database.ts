import Database from "better-sqlite3"
import debug from "debug"
import { copyFileSync, existsSync } from "fs"

const log = debug("basediff:db")

/** Labels every new database starts with. */
export const DEFAULT_LABELS = [
  "security_fix",
  "security_risk",
  "bugfix",
  "feature",
  "refactor",
  "behavior_change",
  "vendor_customization",
  "remove_upstream",
  "other",
] as const

/**
 * Opens (or creates) the SQLite database at the given path, enables WAL mode
 * and foreign keys, and ensures all required tables exist.
 * @param path - Absolute path to the SQLite database file, or ":memory:".
 * @returns The initialized Database instance.
 */
export function createDatabase(path: string): Database.Database {
  const db = new Database(path)
  db.pragma("journal_mode = WAL")
  db.pragma("foreign_keys = ON")
  db.pragma("synchronous = NORMAL")
  db.pragma("cache_size = -64000")
  db.pragma("temp_store = MEMORY")
  db.pragma("busy_timeout = 5000")
  registerFunctions(db)
  createSchema(db)
  if (needsMigration(db)) {
    if (path !== ":memory:" && existsSync(path)) {
      db.pragma("wal_checkpoint(TRUNCATE)")
      copyFileSync(path, `${path}.backup`)
    }
    migrateSchema(db)
  }
  createIndexes(db)
  seedLabels(db)
  return db
}

/**
 * SQL functions the query layer relies on. `casefold(text)` lowercases the
 * full Unicode range; SQLite's own `lower()` and `LIKE` fold ASCII only.
 */
function registerFunctions(db: Database.Database): void {
  db.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : null,
  )
}

/**
 * Creates all required tables if they don't already exist.
 * `commits.project` deliberately has no foreign key: commits whose project
 * is missing from `projects` are kept.
 */
function createSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS projects (
      project TEXT PRIMARY KEY,
      remote_url TEXT,
      path TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS commits (
      hash TEXT PRIMARY KEY,
      project TEXT NOT NULL,
      change_id TEXT,
      author TEXT NOT NULL,
      committed_at TEXT NOT NULL,
      subject TEXT NOT NULL,
      body TEXT NOT NULL,
      classification TEXT CHECK (
        classification IS NULL
        OR classification IN ('shared', 'upstream_only', 'vendor_only')
      ),
      review_url TEXT
    );

    CREATE TABLE IF NOT EXISTS labels (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      is_default INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS commit_labels (
      commit_hash TEXT NOT NULL REFERENCES commits(hash) ON DELETE CASCADE,
      label_id INTEGER NOT NULL REFERENCES labels(id) ON DELETE CASCADE,
      PRIMARY KEY (commit_hash, label_id)
    );
  `)
}

/** Indexes backing the query predicates and the correlation key. */
function createIndexes(db: Database.Database): void {
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_commits_project ON commits(project);
    CREATE INDEX IF NOT EXISTS idx_commits_classification ON commits(classification);
    CREATE INDEX IF NOT EXISTS idx_commits_change_id ON commits(change_id);
    CREATE INDEX IF NOT EXISTS idx_commits_author ON commits(author);
    CREATE INDEX IF NOT EXISTS idx_commits_committed_at ON commits(committed_at);
    CREATE INDEX IF NOT EXISTS idx_commit_labels_label ON commit_labels(label_id);
  `)
}

function seedLabels(db: Database.Database): void {
  const insert = db.prepare<[string]>(
    "INSERT OR IGNORE INTO labels (name, is_default) VALUES (?, 1)",
  )
  db.transaction(() => {
    for (const name of DEFAULT_LABELS) insert.run(name)
  })()
}

function hasColumn(
  db: Database.Database,
  table: string,
  column: string,
): boolean {
  const cols = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM pragma_table_info(?)",
    )
    .all(table)
  return cols.some((c) => c.name === column)
}

/** Returns true if any known migration needs to run. */
function needsMigration(db: Database.Database): boolean {
  return !hasColumn(db, "commits", "review_url")
}

/**
 * Adds columns that databases created by earlier versions lack.
 * Ensures both fresh and upgraded databases have the same schema.
 */
function migrateSchema(db: Database.Database): void {
  if (!hasColumn(db, "commits", "review_url")) {
    log("adding commits.review_url")
    db.exec("ALTER TABLE commits ADD COLUMN review_url TEXT")
  }
}

/** Reads a value from the metadata table. */
export function getMetadata(db: Database.Database, key: string): string | null {
  const row = db
    .prepare<[string], { value: string }>(
      "SELECT value FROM metadata WHERE key = ?",
    )
    .get(key)
  return row?.value ?? null
}

/** Writes a value to the metadata table, replacing any previous value. */
export function setMetadata(
  db: Database.Database,
  key: string,
  value: string,
): void {
  db.prepare<[string, string]>(
    "INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)",
  ).run(key, value)
}

/** Removes metadata keys. */
export function deleteMetadata(
  db: Database.Database,
  keys: readonly string[],
): void {
  const stmt = db.prepare<[string]>("DELETE FROM metadata WHERE key = ?")
  for (const key of keys) stmt.run(key)
}
