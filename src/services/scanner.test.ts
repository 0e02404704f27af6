import type { Database } from "better-sqlite3"
import { beforeEach, describe, expect, test } from "vitest"

import { NotFoundError } from "@/errors"
import { type ProgressEvent, ProgressChannel } from "@/progress"
import type { LogEntry, ManifestProject } from "@/types"
import { CommitRepository } from "@db/commits"
import { createDatabase, getMetadata, setMetadata } from "@db/database"
import { ProjectRepository } from "@db/projects"
import { DiffClassifier } from "@services/classifier"
import type { ProjectLog } from "@services/git"
import { type LogSource, type ManifestSource, ScanService } from "@services/scanner"
import { hashOf, makeCommit } from "@/test-helpers"

function project(name: string, root: string): ManifestProject {
  return {
    projectName: name,
    filesystemPath: `${root}/${name}`,
    remoteUrl: "https://git.example.com",
  }
}

function entry(n: number, changeId: string | null): LogEntry {
  const { project: _project, ...rest } = makeCommit(n, "unused", changeId)
  return rest
}

class FakeManifests implements ManifestSource {
  constructor(private trees: Record<string, ManifestProject[]>) {}

  read(root: string): ManifestProject[] {
    const projects = this.trees[root]
    if (!projects) throw new NotFoundError(`manifest not found: ${root}`)
    return projects
  }
}

class FakeLogs implements LogSource {
  calls: string[] = []

  constructor(private logs: Record<string, ProjectLog | Error>) {}

  async readLog(path: string): Promise<ProjectLog> {
    this.calls.push(path)
    const log = this.logs[path]
    if (log instanceof Error) throw log
    return log ?? { entries: [] }
  }
}

describe("ScanService", () => {
  let db: Database
  let commits: CommitRepository
  let projects: ProjectRepository

  beforeEach(() => {
    db = createDatabase(":memory:")
    commits = new CommitRepository(db)
    projects = new ProjectRepository(db)
  })

  function service(manifests: ManifestSource, logs: LogSource, concurrency = 2) {
    return new ScanService(
      db,
      manifests,
      logs,
      commits,
      projects,
      new DiffClassifier(db, commits),
      concurrency,
    )
  }

  const manifests = new FakeManifests({
    "/up": [project("core", "/up"), project("art", "/up")],
    "/ven": [project("core-vendor", "/ven"), project("hal", "/ven")],
  })

  test("reads both trees, stores commits and classifies them", async () => {
    const logs = new FakeLogs({
      "/up/core": { entries: [entry(1, "Ishared"), entry(2, "Iup")] },
      "/up/art": { entries: [entry(3, null)] },
      "/ven/core-vendor": { entries: [entry(4, "Ishared")] },
      "/ven/hal": { entries: [entry(5, "Iven")] },
    })

    const summary = await service(manifests, logs).scan("/up", "/ven")

    expect(summary).toEqual({
      upstreamProjects: 2,
      vendorProjects: 2,
      totalCommits: 5,
      skippedRecords: 0,
      failedProjects: [],
      classification: { totalA: 2, totalB: 2, shared: 1, aOnly: 1, bOnly: 1 },
    })
    expect(commits.getCommit(hashOf(1))?.project).toBe("core")
    expect(commits.getCommit(hashOf(4))?.classification).toBe("shared")
    expect(commits.getCommit(hashOf(3))?.classification).toBe("upstream_only")
    expect(commits.getCommit(hashOf(5))?.classification).toBe("vendor_only")
    expect(projects.getProjectCount()).toBe(4)
    expect(getMetadata(db, "upstream_path")).toBe("/up")
    expect(getMetadata(db, "vendor_path")).toBe("/ven")
    expect(getMetadata(db, "last_scan")).not.toBeNull()
  })

  test("a failing project is reported and the scan continues", async () => {
    const logs = new FakeLogs({
      "/up/core": new Error("git log failed: corrupt object"),
      "/up/art": { entries: [], warning: "not a git repository: /up/art" },
      "/ven/hal": { entries: [entry(5, "Iven")] },
    })

    const summary = await service(manifests, logs).scan("/up", "/ven")

    expect(summary.failedProjects).toEqual([
      { project: "core", tree: "upstream", read: 0, inserted: 0, error: "git log failed: corrupt object" },
      { project: "art", tree: "upstream", read: 0, inserted: 0, error: "not a git repository: /up/art" },
    ])
    expect(summary.totalCommits).toBe(1)
    expect(logs.calls).toHaveLength(4)
  })

  test("counts malformed records as skipped", async () => {
    const logs = new FakeLogs({
      "/up/core": { entries: [entry(1, "I1"), { ...entry(2, "I2"), contentHash: "not-a-hash" }] },
    })

    const summary = await service(manifests, logs).scan("/up", "/ven")

    expect(summary.skippedRecords).toBe(1)
    expect(summary.totalCommits).toBe(1)
  })

  test("discards commits from the previous scan", async () => {
    commits.insertCommits([makeCommit(99, "stale", "Istale")])

    const summary = await service(manifests, new FakeLogs({})).scan("/up", "/ven")

    expect(summary.totalCommits).toBe(0)
    expect(commits.getCommit(hashOf(99))).toBeNull()
  })

  test("reports scanning progress per window", async () => {
    const progress = new ProgressChannel()
    const scanning: ProgressEvent[] = []
    progress.subscribe((e) => {
      if (e.phase === "scanning") scanning.push(e)
    })

    await service(manifests, new FakeLogs({}), 3).scan("/up", "/ven", progress)

    expect(scanning.map((e) => [e.current, e.total, e.item])).toEqual([
      [0, 4, undefined],
      [3, 4, "core-vendor"],
      [4, 4, "hal"],
    ])
    expect(progress.snapshot().phase).toBe("done")
  })

  test("a missing manifest aborts the scan", async () => {
    await expect(
      service(manifests, new FakeLogs({})).scan("/up", "/nowhere"),
    ).rejects.toThrow(NotFoundError)
  })

  test("a missing manifest leaves the previous scan in place", async () => {
    commits.insertCommits([makeCommit(7, "core", "I7")])
    setMetadata(db, "last_scan", "2024-01-01T00:00:00.000Z")
    setMetadata(db, "last_classification", "{\"shared\":1}")

    await expect(
      service(manifests, new FakeLogs({})).scan("/up", "/nowhere"),
    ).rejects.toThrow(NotFoundError)

    expect(commits.getCommit(hashOf(7))?.project).toBe("core")
    expect(getMetadata(db, "last_scan")).toBe("2024-01-01T00:00:00.000Z")
    expect(getMetadata(db, "last_classification")).toBe("{\"shared\":1}")
  })

  test("replaces the stored classification summary", async () => {
    setMetadata(db, "last_classification", "{\"shared\":1}")

    const summary = await service(manifests, new FakeLogs({})).scan(
      "/up",
      "/ven",
    )

    expect(getMetadata(db, "last_classification")).toBe(
      JSON.stringify(summary.classification),
    )
  })
})
