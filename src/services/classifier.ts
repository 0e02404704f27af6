import type { Database } from "better-sqlite3"
import debug from "debug"

import { LockError, wrapStorage } from "@/errors"
import { ProgressChannel } from "@/progress"
import type { Classification, ClassifySummary } from "@/types"
import type { CommitRepository } from "@db/commits"
import { setMetadata } from "@db/database"

const log = debug("basediff:classifier")

/** Identifier partitions computed from the two trees' id sets. */
export interface Partitions {
  shared: string[]
  aOnly: string[]
  bOnly: string[]
}

/**
 * Splits two identifier sets into intersection and the two differences.
 * Each partition is sorted so write-back order is deterministic.
 */
export function partition(
  idsA: ReadonlySet<string>,
  idsB: ReadonlySet<string>,
): Partitions {
  const shared: string[] = []
  const aOnly: string[] = []
  const bOnly: string[] = []
  for (const id of idsA) {
    if (idsB.has(id)) shared.push(id)
    else aOnly.push(id)
  }
  for (const id of idsB) {
    if (!idsA.has(id)) bOnly.push(id)
  }
  return { shared: shared.sort(), aOnly: aOnly.sort(), bOnly: bOnly.sort() }
}

/**
 * Labels every stored commit by the presence of its change identifier in
 * the upstream (A) and vendor (B) project sets.
 */
export class DiffClassifier {
  private db: Database
  private commits: CommitRepository
  private running = false

  /**
   * @param db - Database the summary metadata is written to.
   * @param commits - Repository owning the commit rows.
   */
  constructor(db: Database, commits: CommitRepository) {
    this.db = db
    this.commits = commits
  }

  /**
   * Runs one classification pass.
   *
   * Classifications are cleared first, then each partition is written in its
   * own transaction. A failure part way leaves earlier partitions written;
   * rerunning converges on the same labels.
   * @throws LockError when a pass is already running on this classifier.
   */
  classify(
    treeAProjects: readonly string[],
    treeBProjects: readonly string[],
    progress: ProgressChannel = new ProgressChannel(),
  ): ClassifySummary {
    if (this.running) {
      throw new LockError("a classification pass is already running")
    }
    this.running = true
    try {
      return this.run(treeAProjects, treeBProjects, progress)
    } catch (err) {
      progress.emit({
        phase: "error",
        current: 0,
        total: 0,
        message: err instanceof Error ? err.message : String(err),
      })
      throw err
    } finally {
      this.running = false
    }
  }

  private run(
    treeAProjects: readonly string[],
    treeBProjects: readonly string[],
    progress: ProgressChannel,
  ): ClassifySummary {
    const projectsA = [...new Set(treeAProjects)]
    const projectsB = [...new Set(treeBProjects)]

    progress.emit({ phase: "loading", current: 0, total: 2, item: "upstream" })
    const idsA = this.commits.getDistinctChangeIds(projectsA)
    progress.emit({ phase: "loading", current: 1, total: 2, item: "vendor" })
    const idsB = this.commits.getDistinctChangeIds(projectsB)
    log("loaded %d upstream and %d vendor identifiers", idsA.size, idsB.size)

    progress.emit({ phase: "partitioning", current: 0, total: 1 })
    const parts = partition(idsA, idsB)
    progress.emit({ phase: "partitioning", current: 1, total: 1 })

    const writes: [string, readonly string[], Classification][] = [
      ["shared", parts.shared, "shared"],
      ["upstream_only", parts.aOnly, "upstream_only"],
      ["vendor_only", parts.bOnly, "vendor_only"],
    ]
    const total = writes.length + 2

    progress.emit({ phase: "writing", current: 0, total, item: "clear" })
    const cleared = this.commits.clearClassifications()
    log("cleared %d classifications", cleared)

    writes.forEach(([item, ids, label], i) => {
      progress.emit({ phase: "writing", current: i + 1, total, item })
      const changed = this.commits.setClassificationByChangeIds(ids, label)
      log("%s: %d identifiers, %d commits", label, ids.length, changed)
    })

    progress.emit({
      phase: "writing",
      current: total - 1,
      total,
      item: "fallback",
    })
    const inB = new Set(projectsB)
    const inA = new Set(projectsA)
    const fallback = this.commits.setFallbackClassification(
      projectsA.filter((p) => !inB.has(p)),
      projectsB.filter((p) => !inA.has(p)),
    )
    log("fallback: %d commits without identifiers", fallback)

    const summary: ClassifySummary = {
      totalA: idsA.size,
      totalB: idsB.size,
      shared: parts.shared.length,
      aOnly: parts.aOnly.length,
      bOnly: parts.bOnly.length,
    }
    wrapStorage("record classification summary", () =>
      setMetadata(this.db, "last_classification", JSON.stringify(summary)),
    )
    progress.emit({ phase: "done", current: total, total })
    return summary
  }
}
