import type { Database } from "better-sqlite3"

import { LimitExceededError, ValidationError, wrapStorage } from "@/errors"
import { BatchPlanner, placeholders } from "@db/batch"
import {
  type CommitFilters,
  compilePredicates,
  toPredicates,
  whereClause,
} from "@db/predicates"
import type {
  CommitRow,
  CommitView,
  LabelRef,
  QueryPage,
  RelatedCommit,
} from "@db/types"

/** How many same-identifier counterparts are attached to a shared commit. */
export const RELATED_COMMIT_LIMIT = 5

/** Paging request. `all` opts in to an unbounded read. */
export interface PageRequest {
  limit?: number
  offset?: number
  all?: boolean
}

/** Page-size bounds taken from config. */
export interface PagePolicy {
  defaultPageSize: number
  maxPageSize: number
  maxUnboundedRows: number
}

type JoinedRow = CommitRow & { remote_url: string | null }
type LabelJoinRow = { commit_hash: string; id: number; name: string }

/**
 * Link for a commit: the review URL when the message carried one, otherwise
 * `{remoteUrl}/{project}/commit/{hash}` when the project has a remote.
 */
export function deriveUrl(
  reviewUrl: string | null,
  remoteUrl: string | null,
  project: string,
  hash: string,
): string | null {
  if (reviewUrl) return reviewUrl
  if (remoteUrl) return `${remoteUrl}/${project}/commit/${hash}`
  return null
}

/**
 * Paged, filtered commit listing with labels, derived URLs and cross-tree
 * counterparts attached.
 */
export class CommitQueryService {
  private db: Database
  private planner: BatchPlanner
  private policy: PagePolicy

  constructor(
    db: Database,
    policy: PagePolicy,
    planner: BatchPlanner = new BatchPlanner(),
  ) {
    this.db = db
    this.policy = policy
    this.planner = planner
  }

  /**
   * Returns one page of commits matching every filter, newest first.
   * Ties on timestamp keep insertion order.
   * @throws LimitExceededError when the page or an unbounded read is too large.
   */
  query(filters: CommitFilters = {}, page: PageRequest = {}): QueryPage {
    const { limit, offset } = this.resolvePage(page)
    const compiled = compilePredicates(toPredicates(filters))
    const where = whereClause(compiled)

    const total = wrapStorage(
      "count matching commits",
      () =>
        this.db
          .prepare<(string | number)[], { count: number }>(
            `SELECT COUNT(*) AS count FROM commits c ${where}`,
          )
          .get(...compiled.params)?.count ?? 0,
    )

    if (page.all && total > this.policy.maxUnboundedRows) {
      throw new LimitExceededError(
        `--all would return ${total} commits, above the ${this.policy.maxUnboundedRows} row ceiling`,
        "narrow the filters or page with --limit/--offset",
      )
    }

    const rows = wrapStorage("query commits", () =>
      this.db
        .prepare<(string | number)[], JoinedRow>(
          `SELECT c.*, p.remote_url
           FROM commits c
           LEFT JOIN projects p ON p.project = c.project
           ${where}
           ORDER BY c.committed_at DESC, c.rowid ASC
           LIMIT ? OFFSET ?`,
        )
        .all(...compiled.params, limit, offset),
    )

    const labels = this.getLabels(rows.map((r) => r.hash))
    const sharedIds = [
      ...new Set(
        rows
          .filter((r) => r.classification === "shared" && r.change_id)
          .map((r) => r.change_id ?? ""),
      ),
    ]
    const related = this.getRelated(sharedIds)

    return {
      total,
      rows: rows.map((row) => {
        const view = toView(row, labels.get(row.hash) ?? [])
        if (row.classification === "shared" && row.change_id) {
          view.relatedCommits = (related.get(row.change_id) ?? [])
            .filter((r) => r.hash !== row.hash)
            .slice(0, RELATED_COMMIT_LIMIT)
        }
        return view
      }),
    }
  }

  /** Applies paging policy. An unbounded read maps to SQLite's `LIMIT -1`. */
  private resolvePage(page: PageRequest): { limit: number; offset: number } {
    const offset = page.offset ?? 0
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError(
        `offset must be a non-negative integer, got ${offset}`,
      )
    }
    if (page.all) {
      if (page.limit !== undefined) {
        throw new ValidationError("--all and --limit cannot be combined")
      }
      return { limit: -1, offset }
    }
    const limit = page.limit ?? this.policy.defaultPageSize
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(
        `limit must be a positive integer, got ${limit}`,
      )
    }
    if (limit > this.policy.maxPageSize) {
      throw new LimitExceededError(
        `limit ${limit} exceeds the maximum page size of ${this.policy.maxPageSize}`,
        "use --offset to page, or --all to opt in to an unbounded read",
      )
    }
    return { limit, offset }
  }

  /** Labels for the given commits, keyed by hash, ordered by label id. */
  private getLabels(hashes: readonly string[]): Map<string, LabelRef[]> {
    const result = new Map<string, LabelRef[]>()
    const none: LabelJoinRow[] = []
    const rows = wrapStorage("load labels", () =>
      this.planner.run(
        hashes,
        (part) =>
          this.db
            .prepare<string[], LabelJoinRow>(
              `SELECT cl.commit_hash, l.id, l.name
               FROM commit_labels cl
               JOIN labels l ON l.id = cl.label_id
               WHERE cl.commit_hash IN (${placeholders(part.length)})
               ORDER BY l.id`,
            )
            .all(...part),
        (acc: typeof none, part) => acc.concat(part),
        none,
      ),
    )
    for (const row of rows) {
      const list = result.get(row.commit_hash)
      const label = { id: row.id, name: row.name }
      if (list) list.push(label)
      else result.set(row.commit_hash, [label])
    }
    return result
  }

  /**
   * Every commit carrying one of the given change identifiers, grouped by
   * identifier and ordered by ascending hash within a group.
   */
  private getRelated(
    changeIds: readonly string[],
  ): Map<string, RelatedCommit[]> {
    const result = new Map<string, RelatedCommit[]>()
    const none: JoinedRow[] = []
    const rows = wrapStorage("load related commits", () =>
      this.planner.run(
        changeIds,
        (part) =>
          this.db
            .prepare<string[], JoinedRow>(
              `SELECT c.*, p.remote_url
               FROM commits c
               LEFT JOIN projects p ON p.project = c.project
               WHERE c.change_id IN (${placeholders(part.length)})
               ORDER BY c.hash`,
            )
            .all(...part),
        (acc: JoinedRow[], part) => acc.concat(part),
        none,
      ),
    )
    for (const row of rows) {
      if (!row.change_id) continue
      const related: RelatedCommit = {
        hash: row.hash,
        project: row.project,
        subject: row.subject,
        classification: row.classification,
        url: deriveUrl(row.review_url, row.remote_url, row.project, row.hash),
      }
      const group = result.get(row.change_id)
      if (group) group.push(related)
      else result.set(row.change_id, [related])
    }
    return result
  }
}

function toView(row: JoinedRow, labels: LabelRef[]): CommitView {
  return {
    hash: row.hash,
    project: row.project,
    changeId: row.change_id,
    author: row.author,
    committedAt: row.committed_at,
    subject: row.subject,
    body: row.body,
    classification: row.classification,
    reviewUrl: row.review_url,
    remoteUrl: row.remote_url,
    url: deriveUrl(row.review_url, row.remote_url, row.project, row.hash),
    labels,
  }
}
