import type { Database } from "better-sqlite3"
import debug from "debug"
import { z } from "zod"

import { MalformedInputError, wrapStorage } from "@/errors"
import type { Classification, CommitInput } from "@/types"
import { BatchPlanner, placeholders } from "@db/batch"
import type { ClassificationCounts, CommitRow } from "@db/types"

const log = debug("basediff:db")

/** Full object id: SHA-1 (40 hex) or SHA-256 (64 hex). */
export const CONTENT_HASH_PATTERN = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/i

const commitInputSchema = z.object({
  project: z.string().min(1, "project must be a non-empty string"),
  contentHash: z
    .string()
    .regex(CONTENT_HASH_PATTERN, "content hash must be 40 or 64 hex characters"),
  changeIdentifier: z.string().nullable(),
  author: z.string(),
  timestamp: z.string(),
  subject: z.string(),
  body: z.string(),
  reviewUrl: z.string().nullable(),
})

/** Outcome of a bulk insert. */
export interface InsertResult {
  /** Rows actually written; duplicates of stored hashes are not counted. */
  inserted: number
  /** Records rejected before reaching the database. */
  skipped: MalformedInputError[]
}

/** SQL condition matching commits that carry no change identifier. */
const NO_CHANGE_ID = "(change_id IS NULL OR change_id = '')"

type InsertParams = [
  hash: string,
  project: string,
  changeId: string | null,
  author: string,
  committedAt: string,
  subject: string,
  body: string,
  reviewUrl: string | null,
]

/** Repository for reading and writing commit records in the SQLite database. */
export class CommitRepository {
  private db: Database
  private planner: BatchPlanner

  /**
   * @param db - The SQLite database instance.
   * @param planner - Chunking policy for IN-list statements.
   */
  constructor(db: Database, planner: BatchPlanner = new BatchPlanner()) {
    this.db = db
    this.planner = planner
  }

  /**
   * Validates and inserts commits in a single transaction.
   * Existing commits (by hash) are silently skipped, so the first write wins.
   * Malformed records are reported in the result and never abort the batch.
   */
  insertCommits(records: readonly unknown[]): InsertResult {
    const skipped: MalformedInputError[] = []
    const valid: CommitInput[] = []

    records.forEach((record, index) => {
      const parsed = commitInputSchema.safeParse(record)
      if (parsed.success) {
        valid.push(parsed.data)
        return
      }
      const issue = parsed.error.issues[0]
      skipped.push(
        new MalformedInputError(
          index,
          issue ? issue.message : "invalid record",
        ),
      )
    })

    if (skipped.length > 0) {
      log("skipping %d malformed commit records", skipped.length)
    }

    const insert = this.db.prepare<InsertParams>(`
      INSERT OR IGNORE INTO commits
        (hash, project, change_id, author, committed_at, subject, body, review_url)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `)

    const inserted = wrapStorage("insert commits", () =>
      this.db.transaction((commits: CommitInput[]) => {
        let count = 0
        for (const c of commits) {
          count += insert.run(
            c.contentHash,
            c.project,
            c.changeIdentifier,
            c.author,
            c.timestamp,
            c.subject,
            c.body,
            c.reviewUrl,
          ).changes
        }
        return count
      })(valid),
    )

    return { inserted, skipped }
  }

  /** Retrieves a single commit by its hash, or null if not found. */
  getCommit(hash: string): CommitRow | null {
    return (
      this.db
        .prepare<[string], CommitRow>("SELECT * FROM commits WHERE hash = ?")
        .get(hash) ?? null
    )
  }

  /** Returns the total number of commits stored in the database. */
  getTotalCommitCount(): number {
    return this.count("SELECT COUNT(*) AS count FROM commits")
  }

  /** Returns the number of commits that carry a classification. */
  getClassifiedCommitCount(): number {
    return this.count(
      "SELECT COUNT(*) AS count FROM commits WHERE classification IS NOT NULL",
    )
  }

  private count(sql: string): number {
    return wrapStorage(
      "count commits",
      () => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0,
    )
  }

  /** Returns commit counts grouped by classification. */
  countByClassification(): ClassificationCounts {
    const rows = wrapStorage("count classifications", () =>
      this.db
        .prepare<[], { classification: Classification | null; count: number }>(
          "SELECT classification, COUNT(*) AS count FROM commits GROUP BY classification",
        )
        .all(),
    )
    const counts: ClassificationCounts = {
      total: 0,
      shared: 0,
      upstream_only: 0,
      vendor_only: 0,
      unclassified: 0,
    }
    for (const row of rows) {
      counts.total += row.count
      if (row.classification === null) counts.unclassified += row.count
      else counts[row.classification] += row.count
    }
    return counts
  }

  /**
   * Distinct non-empty change identifiers among commits in the given
   * projects, read in chunks and unioned.
   */
  getDistinctChangeIds(projects: readonly string[]): Set<string> {
    return wrapStorage("load change identifiers", () =>
      this.planner.collect(projects, (part) =>
        this.db
          .prepare<string[], { change_id: string }>(
            `SELECT DISTINCT change_id FROM commits
             WHERE project IN (${placeholders(part.length)})
               AND change_id IS NOT NULL AND change_id != ''`,
          )
          .all(...part)
          .map((r) => r.change_id),
      ),
    )
  }

  /** Resets every commit's classification to null. Returns rows changed. */
  clearClassifications(): number {
    return wrapStorage(
      "clear classifications",
      () =>
        this.db
          .prepare(
            "UPDATE commits SET classification = NULL WHERE classification IS NOT NULL",
          )
          .run().changes,
    )
  }

  /**
   * Labels every commit whose change identifier is in `changeIds`.
   * All chunks run inside one IMMEDIATE transaction: either every matching
   * row gets the label or none does.
   */
  setClassificationByChangeIds(
    changeIds: readonly string[],
    classification: Classification,
  ): number {
    const write = this.db.transaction((ids: readonly string[]) =>
      this.planner.sum(
        ids,
        (part) =>
          this.db
            .prepare<[string, ...string[]]>(
              `UPDATE commits SET classification = ?
               WHERE change_id IN (${placeholders(part.length)})`,
            )
            .run(classification, ...part).changes,
        1,
      ),
    )
    return wrapStorage(`write ${classification} partition`, () =>
      write.immediate(changeIds),
    )
  }

  /**
   * Labels commits without a change identifier by project membership, in
   * one IMMEDIATE transaction: everything becomes `shared`, then commits in
   * upstream-only projects become `upstream_only` and commits in vendor-only
   * projects become `vendor_only`.
   */
  setFallbackClassification(
    upstreamOnlyProjects: readonly string[],
    vendorOnlyProjects: readonly string[],
  ): number {
    const byProject = (projects: readonly string[], label: Classification) =>
      this.planner.sum(
        projects,
        (part) =>
          this.db
            .prepare<[string, ...string[]]>(
              `UPDATE commits SET classification = ?
               WHERE ${NO_CHANGE_ID} AND project IN (${placeholders(part.length)})`,
            )
            .run(label, ...part).changes,
        1,
      )

    const write = this.db.transaction(() => {
      const total = this.db
        .prepare(
          `UPDATE commits SET classification = 'shared' WHERE ${NO_CHANGE_ID}`,
        )
        .run().changes
      byProject(upstreamOnlyProjects, "upstream_only")
      byProject(vendorOnlyProjects, "vendor_only")
      return total
    })
    return wrapStorage("write fallback partition", () => write.immediate())
  }

  /** Distinct project names that have commits, sorted. */
  getDistinctProjects(): string[] {
    return wrapStorage("list projects", () =>
      this.db
        .prepare<[], { project: string }>(
          "SELECT DISTINCT project FROM commits ORDER BY project",
        )
        .all()
        .map((r) => r.project),
    )
  }

  /** Distinct author names, sorted. */
  getDistinctAuthors(): string[] {
    return wrapStorage("list authors", () =>
      this.db
        .prepare<[], { author: string }>(
          "SELECT DISTINCT author FROM commits ORDER BY author",
        )
        .all()
        .map((r) => r.author),
    )
  }

  /**
   * Removes every commit, project and label link. Labels themselves stay.
   * Destructive; there is no undo.
   */
  clearAll(): void {
    wrapStorage("reset store", () =>
      this.db.transaction(() => {
        this.db.exec("DELETE FROM commit_labels")
        this.db.exec("DELETE FROM commits")
        this.db.exec("DELETE FROM projects")
      }).immediate(),
    )
  }
}
