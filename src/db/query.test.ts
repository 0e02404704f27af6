import type { Database } from "better-sqlite3"
import { beforeEach, describe, expect, test } from "vitest"

import { DEFAULTS } from "@/config"
import { LimitExceededError, ValidationError } from "@/errors"
import { CommitRepository } from "@db/commits"
import { createDatabase } from "@db/database"
import { LabelRepository } from "@db/labels"
import { ProjectRepository } from "@db/projects"
import { CommitQueryService, deriveUrl } from "@db/query"
import { hashOf, makeCommit } from "@/test-helpers"

describe("deriveUrl", () => {
  test("prefers the review URL", () => {
    expect(deriveUrl("https://review.example.com/c/1", "https://git.example.com", "p", "h")).toBe(
      "https://review.example.com/c/1",
    )
  })

  test("builds a commit URL from the remote", () => {
    expect(deriveUrl(null, "https://git.example.com", "platform/art", "abc")).toBe(
      "https://git.example.com/platform/art/commit/abc",
    )
  })

  test("is null without either", () => {
    expect(deriveUrl(null, null, "p", "h")).toBeNull()
  })
})

describe("CommitQueryService", () => {
  let db: Database
  let commits: CommitRepository
  let service: CommitQueryService

  beforeEach(() => {
    db = createDatabase(":memory:")
    commits = new CommitRepository(db)
    service = new CommitQueryService(db, {
      defaultPageSize: 2,
      maxPageSize: 3,
      maxUnboundedRows: 4,
    })
  })

  test("returns shared rows with their counterparts", () => {
    new ProjectRepository(db).upsertProjects([
      { projectName: "core", filesystemPath: "/t/core", remoteUrl: "https://git.example.com" },
    ])
    commits.insertCommits([
      makeCommit(3, "core", "I9", { timestamp: "2024-03-01 00:00:00 +0000" }),
      makeCommit(1, "core", "I9", {
        timestamp: "2024-01-01 00:00:00 +0000",
        reviewUrl: "https://review.example.com/c/1",
      }),
      makeCommit(2, "core", "I9", { timestamp: "2024-02-01 00:00:00 +0000" }),
    ])
    commits.setClassificationByChangeIds(["I9"], "shared")

    const page = service.query({ classification: "shared" }, { limit: 1 })

    expect(page.total).toBe(3)
    expect(page.rows).toHaveLength(1)
    const row = page.rows[0]
    expect(row.hash).toBe(hashOf(3))
    expect(row.url).toBe(`https://git.example.com/core/commit/${hashOf(3)}`)
    expect(row.relatedCommits).toEqual([
      {
        hash: hashOf(1),
        project: "core",
        subject: "commit 1",
        classification: "shared",
        url: "https://review.example.com/c/1",
      },
      {
        hash: hashOf(2),
        project: "core",
        subject: "commit 2",
        classification: "shared",
        url: `https://git.example.com/core/commit/${hashOf(2)}`,
      },
    ])
  })

  test("caps counterparts at five, lowest hashes first", () => {
    commits.insertCommits(
      [1, 2, 3, 4, 5, 6, 7].map((n) => makeCommit(n, `p${n}`, "I7")),
    )
    commits.setClassificationByChangeIds(["I7"], "shared")

    const page = service.query({ hashPrefix: hashOf(4) })
    expect(page.rows[0].relatedCommits?.map((r) => r.hash)).toEqual(
      [1, 2, 3, 5, 6].map(hashOf),
    )
  })

  test("non-shared rows carry no counterparts", () => {
    commits.insertCommits([makeCommit(1, "a", "I1"), makeCommit(2, "b", "I1")])
    commits.setClassificationByChangeIds(["I1"], "upstream_only")
    const page = service.query({})
    expect(page.rows[0].relatedCommits).toBeUndefined()
    expect(page.rows[0].url).toBeNull()
  })

  test("orders newest first and keeps insertion order on ties", () => {
    commits.insertCommits([
      makeCommit(1, "p", null, { timestamp: "2024-01-01" }),
      makeCommit(2, "p", null, { timestamp: "2024-05-01" }),
      makeCommit(3, "p", null, { timestamp: "2024-01-01" }),
    ])
    const page = service.query({}, { limit: 3 })
    expect(page.rows.map((r) => r.hash)).toEqual([hashOf(2), hashOf(1), hashOf(3)])
  })

  test("filters are conjunctive", () => {
    commits.insertCommits([
      makeCommit(1, "p", null, { author: "Alice Smith", subject: "Fix NULL deref" }),
      makeCommit(2, "p", null, { author: "alice jones", subject: "Add feature" }),
      makeCommit(3, "q", null, { author: "Alice Smith", subject: "fix null check" }),
    ])
    const page = service.query({ project: "p", author: "ALICE", search: "null" })
    expect(page.total).toBe(1)
    expect(page.rows.map((r) => r.hash)).toEqual([hashOf(1)])
  })

  test("text filters ignore case beyond ASCII", () => {
    commits.insertCommits([
      makeCommit(1, "p", null, { author: "Ödön Émile", subject: "Ändere Größe" }),
      makeCommit(2, "p", null, { author: "Odon Emile", subject: "Andere Grosse" }),
    ])

    expect(service.query({ author: "ödön émile" }).rows.map((r) => r.hash)).toEqual([
      hashOf(1),
    ])
    expect(service.query({ search: "ÄNDERE" }).total).toBe(1)
    expect(service.query({ search: "ändere größe" }).rows.map((r) => r.hash)).toEqual([
      hashOf(1),
    ])
  })

  test("search matches the body", () => {
    commits.insertCommits([
      makeCommit(1, "p", null, { body: "Bug: 1234" }),
      makeCommit(2, "p", null),
    ])
    expect(service.query({ search: "bug:" }).rows.map((r) => r.hash)).toEqual([hashOf(1)])
  })

  test("LIKE wildcards in filters match literally", () => {
    commits.insertCommits([
      makeCommit(1, "p", null, { subject: "raise limit to 100%" }),
      makeCommit(2, "p", null, { subject: "raise limit to 1000" }),
    ])
    expect(service.query({ search: "100%" }).rows.map((r) => r.hash)).toEqual([hashOf(1)])
  })

  test("date range is inclusive and until covers the whole day", () => {
    commits.insertCommits([
      makeCommit(1, "p", null, { timestamp: "2024-01-31 23:59:59 +0000" }),
      makeCommit(2, "p", null, { timestamp: "2024-02-01 00:00:00 +0000" }),
      makeCommit(3, "p", null, { timestamp: "2024-01-01 00:00:00 +0000" }),
      makeCommit(4, "p", null, { timestamp: "2023-12-31 12:00:00 +0000" }),
    ])
    const page = service.query(
      { since: "2024-01-01", until: "2024-01-31" },
      { limit: 3 },
    )
    expect(page.rows.map((r) => r.hash)).toEqual([hashOf(1), hashOf(3)])
  })

  test("filters by label and attaches labels", () => {
    commits.insertCommits([makeCommit(1, "p", null), makeCommit(2, "p", null)])
    const labels = new LabelRepository(db)
    labels.setCommitLabels(hashOf(1), [2, 1])

    const page = service.query({ labelId: 2 })
    expect(page.total).toBe(1)
    expect(page.rows[0].labels).toEqual([
      { id: 1, name: "security_fix" },
      { id: 2, name: "security_risk" },
    ])
  })

  test("applies the default page size and reports the full total", () => {
    commits.insertCommits([1, 2, 3].map((n) => makeCommit(n, "p", null)))
    const page = service.query()
    expect(page.total).toBe(3)
    expect(page.rows).toHaveLength(2)
  })

  test("offset pages through results", () => {
    commits.insertCommits([1, 2, 3].map((n) => makeCommit(n, "p", null)))
    const page = service.query({}, { offset: 2 })
    expect(page.rows.map((r) => r.hash)).toEqual([hashOf(3)])
  })

  test("rejects pages above the maximum", () => {
    expect(() => service.query({}, { limit: 4 })).toThrow(LimitExceededError)
  })

  test("rejects invalid paging values", () => {
    expect(() => service.query({}, { limit: 0 })).toThrow(ValidationError)
    expect(() => service.query({}, { offset: -1 })).toThrow(ValidationError)
    expect(() => service.query({}, { all: true, limit: 2 })).toThrow(
      "--all and --limit cannot be combined",
    )
  })

  test("an unbounded read returns every row under the ceiling", () => {
    commits.insertCommits([1, 2, 3, 4].map((n) => makeCommit(n, "p", null)))
    expect(service.query({}, { all: true }).rows).toHaveLength(4)
  })

  test("an unbounded read above the ceiling is rejected", () => {
    commits.insertCommits([1, 2, 3, 4, 5].map((n) => makeCommit(n, "p", null)))
    expect(() => service.query({}, { all: true })).toThrow(LimitExceededError)
  })

  test("accepts the config as its paging policy", () => {
    const fromConfig = new CommitQueryService(db, DEFAULTS)
    commits.insertCommits([makeCommit(1, "p", null)])
    expect(fromConfig.query().total).toBe(1)
  })
})
