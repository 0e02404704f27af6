import type { Database } from "better-sqlite3"

import { wrapStorage } from "@/errors"
import type { ManifestProject } from "@/types"

/** Repository for manifest project records. */
export class ProjectRepository {
  private db: Database

  constructor(db: Database) {
    this.db = db
  }

  /**
   * Inserts or replaces project records in one transaction.
   * An empty remote URL is stored as null.
   */
  upsertProjects(projects: readonly ManifestProject[]): void {
    const stmt = this.db.prepare<[string, string | null, string]>(
      `INSERT OR REPLACE INTO projects (project, remote_url, path)
       VALUES (?, ?, ?)`,
    )
    wrapStorage("upsert projects", () =>
      this.db.transaction((rows: readonly ManifestProject[]) => {
        for (const p of rows) {
          stmt.run(
            p.projectName,
            p.remoteUrl === "" ? null : p.remoteUrl,
            p.filesystemPath,
          )
        }
      })(projects),
    )
  }

  getProjectCount(): number {
    return wrapStorage(
      "count projects",
      () =>
        this.db
          .prepare<[], { count: number }>(
            "SELECT COUNT(*) AS count FROM projects",
          )
          .get()?.count ?? 0,
    )
  }
}
