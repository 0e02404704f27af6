import type { BasediffConfig } from "@/config"

/** Output format for CLI commands. */
export type OutputFormat = "text" | "json"

/** All provenance labels the classifier assigns. */
export const CLASSIFICATIONS = [
  "shared",
  "upstream_only",
  "vendor_only",
] as const

/** Provenance of a commit relative to the upstream and vendor trees. */
export type Classification = (typeof CLASSIFICATIONS)[number]

/** Colors associated with each classification in text output. */
export const CLASSIFICATION_COLORS: { [key in Classification]: string } = {
  shared: "green",
  upstream_only: "blue",
  vendor_only: "magenta",
}

/** Narrows an arbitrary string to a known classification. */
export function isClassification(value: string): value is Classification {
  return CLASSIFICATIONS.some((c) => c === value)
}

/** Which of the two compared trees a project list came from. */
export type TreeSide = "upstream" | "vendor"

/** A project entry read from a repo-manifest. */
export interface ManifestProject {
  /** Project name, unique within one manifest. */
  projectName: string
  /** Absolute filesystem path of the project checkout. */
  filesystemPath: string
  /**
   * Fetch base URL of the project's remote; empty when the manifest names
   * none.
   */
  remoteUrl: string
}

/** A commit as produced by the log reader, before it is tied to a project. */
export interface LogEntry {
  /**
   * Full commit object id (40 hex characters, or 64 for SHA-256
   * repositories).
   */
  contentHash: string
  /** Value of the first `Change-Id:` trailer, or null. */
  changeIdentifier: string | null
  /** Author display name. */
  author: string
  /** Author date as printed by `git log --date=iso`. */
  timestamp: string
  /** First line of the commit message. */
  subject: string
  /** Remainder of the commit message after the subject line. */
  body: string
  /** Value of the first `Reviewed-on:` trailer, or null. */
  reviewUrl: string | null
}

/** A commit record ready for bulk ingestion. */
export interface CommitInput extends LogEntry {
  /** Name of the project the commit was read from. */
  project: string
}

/** Summary counts returned by a classification pass. */
export interface ClassifySummary {
  /** Distinct change identifiers seen in upstream projects. */
  totalA: number
  /** Distinct change identifiers seen in vendor projects. */
  totalB: number
  /** Identifiers present in both trees. */
  shared: number
  /** Identifiers present only upstream. */
  aOnly: number
  /** Identifiers present only in the vendor tree. */
  bOnly: number
}

/** Per-project outcome of reading a log during a scan. */
export interface ProjectScanResult {
  project: string
  tree: TreeSide
  /** Commits read from the log. */
  read: number
  /** Commits that were new to the store. */
  inserted: number
  /** Reason the project produced no commits, if it failed. */
  error?: string
}

/** Summary of a full scan cycle. */
export interface ScanSummary {
  upstreamProjects: number
  vendorProjects: number
  totalCommits: number
  skippedRecords: number
  failedProjects: ProjectScanResult[]
  classification: ClassifySummary
}

/** Index health information displayed by the status command. */
export interface StatusInfo {
  totalCommits: number
  classifiedCommits: number
  projectCount: number
  lastScan: string | null
  lastClassification: ClassifySummary | null
  dbPath: string
  dbSize: number
  config?: BasediffConfig
}
