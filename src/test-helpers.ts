import type { CommitInput } from "@/types"

/** Deterministic 40-hex content hash for test record `n`. */
export function hashOf(n: number): string {
  return n.toString(16).padStart(40, "0")
}

/** A valid commit record with overridable fields. */
export function makeCommit(
  n: number,
  project: string,
  changeIdentifier: string | null,
  extra?: Partial<CommitInput>,
): CommitInput {
  return {
    project,
    contentHash: hashOf(n),
    changeIdentifier,
    author: "Test User",
    timestamp: "2024-01-15 10:00:00 +0000",
    subject: `commit ${n}`,
    body: "",
    reviewUrl: null,
    ...extra,
  }
}
