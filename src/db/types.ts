import type { Classification } from "@/types"

/** Database row representation of a commit record. */
export interface CommitRow {
  /** Full commit object id (primary key). */
  hash: string
  /** Project the commit was read from. */
  project: string
  /** Change-Id trailer value, or null. */
  change_id: string | null
  author: string
  /** Author date, sortable as text. */
  committed_at: string
  subject: string
  body: string
  /** Provenance label, or null until classification runs. */
  classification: Classification | null
  /** Reviewed-on trailer value, or null. */
  review_url: string | null
}

/** Database row representation of a manifest project. */
export interface ProjectRow {
  project: string
  remote_url: string | null
  path: string
}

/** A user-assignable category. */
export interface LabelRow {
  id: number
  name: string
  /** 1 for labels seeded on database creation. */
  is_default: number
}

/** A label as attached to a query result. */
export interface LabelRef {
  id: number
  name: string
}

/** Another commit carrying the same change identifier. */
export interface RelatedCommit {
  hash: string
  project: string
  subject: string
  classification: Classification | null
  url: string | null
}

/** A commit as returned by the query layer, with derived fields attached. */
export interface CommitView {
  hash: string
  project: string
  changeId: string | null
  author: string
  committedAt: string
  subject: string
  body: string
  classification: Classification | null
  reviewUrl: string | null
  remoteUrl: string | null
  /** Review URL, or a link derived from the project's remote, or null. */
  url: string | null
  labels: LabelRef[]
  /** Only present on shared commits that have a change identifier. */
  relatedCommits?: RelatedCommit[]
}

/** A page of query results. */
export interface QueryPage {
  /** Rows matching the filters, ignoring limit and offset. */
  total: number
  rows: CommitView[]
}

/** Commit counts per classification. */
export interface ClassificationCounts {
  total: number
  shared: number
  upstream_only: number
  vendor_only: number
  unclassified: number
}
