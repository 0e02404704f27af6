import type { Database } from "better-sqlite3"
import debug from "debug"

import { wrapStorage } from "@/errors"
import { ProgressChannel } from "@/progress"
import type {
  CommitInput,
  ManifestProject,
  ProjectScanResult,
  ScanSummary,
  TreeSide,
} from "@/types"
import type { CommitRepository } from "@db/commits"
import { deleteMetadata, setMetadata } from "@db/database"
import type { ProjectRepository } from "@db/projects"
import type { DiffClassifier } from "@services/classifier"
import type { ProjectLog } from "@services/git"

const log = debug("basediff:scanner")

/** Anything that yields a tree's project list. */
export interface ManifestSource {
  read(root: string): ManifestProject[]
}

/** Anything that yields one project's commit log. */
export interface LogSource {
  readLog(path: string): Promise<ProjectLog>
}

interface ScanTarget {
  project: ManifestProject
  tree: TreeSide
}

/**
 * Runs a full scan cycle: read both manifests, reset the store, read every
 * project's log, ingest, then classify.
 */
export class ScanService {
  private db: Database
  private manifests: ManifestSource
  private logs: LogSource
  private commits: CommitRepository
  private projects: ProjectRepository
  private classifier: DiffClassifier
  private concurrency: number

  /**
   * @param concurrency - Number of project logs read in parallel per window.
   */
  constructor(
    db: Database,
    manifests: ManifestSource,
    logs: LogSource,
    commits: CommitRepository,
    projects: ProjectRepository,
    classifier: DiffClassifier,
    concurrency: number = 4,
  ) {
    this.db = db
    this.manifests = manifests
    this.logs = logs
    this.commits = commits
    this.projects = projects
    this.classifier = classifier
    this.concurrency = concurrency
  }

  /**
   * Scans both trees. A project whose log cannot be read is recorded in
   * `failedProjects` and the scan continues.
   */
  async scan(
    upstreamRoot: string,
    vendorRoot: string,
    progress: ProgressChannel = new ProgressChannel(),
  ): Promise<ScanSummary> {
    progress.emit({
      phase: "manifests",
      current: 0,
      total: 2,
      item: upstreamRoot,
    })
    const upstream = this.manifests.read(upstreamRoot)
    progress.emit({
      phase: "manifests",
      current: 1,
      total: 2,
      item: vendorRoot,
    })
    const vendor = this.manifests.read(vendorRoot)
    progress.emit({ phase: "manifests", current: 2, total: 2 })
    log(
      "manifests: %d upstream, %d vendor projects",
      upstream.length,
      vendor.length,
    )

    progress.emit({ phase: "resetting", current: 0, total: 1 })
    this.commits.clearAll()
    wrapStorage("clear scan metadata", () =>
      deleteMetadata(this.db, ["last_scan", "last_classification"]),
    )
    this.projects.upsertProjects([...upstream, ...vendor])

    const targets: ScanTarget[] = [
      ...upstream.map((project) => ({ project, tree: "upstream" as const })),
      ...vendor.map((project) => ({ project, tree: "vendor" as const })),
    ]
    const { results, skippedRecords } = await this.readAll(targets, progress)

    const failedProjects = results.filter((r) => r.error !== undefined)
    const classification = this.classifier.classify(
      upstream.map((p) => p.projectName),
      vendor.map((p) => p.projectName),
      progress,
    )

    wrapStorage("record scan metadata", () => {
      setMetadata(this.db, "last_scan", new Date().toISOString())
      setMetadata(this.db, "upstream_path", upstreamRoot)
      setMetadata(this.db, "vendor_path", vendorRoot)
    })

    return {
      upstreamProjects: upstream.length,
      vendorProjects: vendor.length,
      totalCommits: this.commits.getTotalCommitCount(),
      skippedRecords,
      failedProjects,
      classification,
    }
  }

  /**
   * Reads logs in windows of `concurrency`, ingesting each window as it
   * settles.
   */
  private async readAll(
    targets: readonly ScanTarget[],
    progress: ProgressChannel,
  ): Promise<{ results: ProjectScanResult[]; skippedRecords: number }> {
    let skippedRecords = 0
    const results: ProjectScanResult[] = []
    const total = targets.length
    progress.emit({ phase: "scanning", current: 0, total })

    for (let i = 0; i < targets.length; i += this.concurrency) {
      const window = targets.slice(i, i + this.concurrency)
      const settled = await Promise.allSettled(
        window.map((t) => this.logs.readLog(t.project.filesystemPath)),
      )

      settled.forEach((outcome, j) => {
        const { project, tree } = window[j]
        const name = project.projectName
        if (outcome.status === "rejected") {
          const reason =
            outcome.reason instanceof Error
              ? outcome.reason.message
              : String(outcome.reason)
          log("%s failed: %s", name, reason)
          results.push({
            project: name,
            tree,
            read: 0,
            inserted: 0,
            error: reason,
          })
          return
        }

        const { entries, warning } = outcome.value
        const records: CommitInput[] = entries.map((e) => ({
          ...e,
          project: name,
        }))
        const { inserted, skipped } = this.commits.insertCommits(records)
        skippedRecords += skipped.length
        const result: ProjectScanResult = {
          project: name,
          tree,
          read: entries.length,
          inserted,
        }
        if (warning) result.error = warning
        results.push(result)
      })

      const done = Math.min(i + window.length, total)
      progress.emit({
        phase: "scanning",
        current: done,
        total,
        item: window[window.length - 1]?.project.projectName,
      })
    }
    return { results, skippedRecords }
  }
}
