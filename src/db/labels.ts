import type { Database } from "better-sqlite3"

import { NotFoundError, ValidationError, wrapStorage } from "@/errors"
import type { LabelRow } from "@db/types"

/** Many-to-many labels attached to commits. */
export class LabelRepository {
  private db: Database

  constructor(db: Database) {
    this.db = db
  }

  /** All labels, default labels first, then by name. */
  listLabels(): LabelRow[] {
    return wrapStorage("list labels", () =>
      this.db
        .prepare<[], LabelRow>(
          "SELECT id, name, is_default FROM labels ORDER BY is_default DESC, name",
        )
        .all(),
    )
  }

  /** Adds a custom label and returns its id. */
  addLabel(name: string): number {
    const trimmed = name.trim()
    if (trimmed === "") {
      throw new ValidationError("label name must not be empty")
    }
    const existing = this.db
      .prepare<[string], { id: number }>("SELECT id FROM labels WHERE name = ?")
      .get(trimmed)
    if (existing) {
      throw new ValidationError(`label "${trimmed}" already exists`)
    }
    const result = wrapStorage("add label", () =>
      this.db
        .prepare<[string]>(
          "INSERT INTO labels (name, is_default) VALUES (?, 0)",
        )
        .run(trimmed),
    )
    return Number(result.lastInsertRowid)
  }

  /** Deletes a label; its commit links go with it. */
  removeLabel(id: number): void {
    const changes = wrapStorage(
      "remove label",
      () =>
        this.db.prepare<[number]>("DELETE FROM labels WHERE id = ?").run(id)
          .changes,
    )
    if (changes === 0) throw new NotFoundError(`label ${id} not found`)
  }

  /** Replaces the label set of a commit. */
  setCommitLabels(hash: string, labelIds: readonly number[]): void {
    const commit = this.db
      .prepare<[string], { hash: string }>(
        "SELECT hash FROM commits WHERE hash = ?",
      )
      .get(hash)
    if (!commit) throw new NotFoundError(`commit ${hash} not found`)

    const known = new Set(this.listLabels().map((l) => l.id))
    const unknown = labelIds.filter((id) => !known.has(id))
    if (unknown.length > 0) {
      throw new NotFoundError(`label ${unknown.join(", ")} not found`)
    }

    const remove = this.db.prepare<[string]>(
      "DELETE FROM commit_labels WHERE commit_hash = ?",
    )
    const insert = this.db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO commit_labels (commit_hash, label_id) VALUES (?, ?)",
    )
    wrapStorage("set commit labels", () =>
      this.db.transaction(() => {
        remove.run(hash)
        for (const id of labelIds) insert.run(hash, id)
      })(),
    )
  }
}
