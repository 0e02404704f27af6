import type { Classification } from "@/types"

/**
 * One filter on the commit listing. Each kind compiles to one SQL condition.
 */
export type Predicate =
  | { kind: "classification"; value: Classification }
  | { kind: "project"; value: string }
  | { kind: "author"; value: string }
  | { kind: "search"; value: string }
  | { kind: "since"; value: string }
  | { kind: "until"; value: string }
  | { kind: "label"; value: number }
  | { kind: "hashPrefix"; value: string }

/** Caller-facing filter set. Absent fields impose no constraint. */
export interface CommitFilters {
  classification?: Classification
  project?: string
  /** Case-insensitive (full Unicode) substring of the author name. */
  author?: string
  /** Case-insensitive substring of subject or body. */
  search?: string
  /** Inclusive lower bound, compared against the stored timestamp text. */
  since?: string
  /** Inclusive upper bound; a date matches the whole day. */
  until?: string
  labelId?: number
  hashPrefix?: string
}

/** SQL WHERE fragments and their positional parameters. */
export interface CompiledPredicates {
  conditions: string[]
  params: (string | number)[]
}

/**
 * Escapes `\`, `%` and `_` for a LIKE pattern.
 * Clauses using the result must specify `ESCAPE '\'`.
 */
export function escapeLike(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/%/g, "\\%")
    .replace(/_/g, "\\_")
}

/** Converts a filter object to predicates, in a fixed order. */
export function toPredicates(filters: CommitFilters): Predicate[] {
  const predicates: Predicate[] = []
  if (filters.classification !== undefined)
    predicates.push({ kind: "classification", value: filters.classification })
  if (filters.project)
    predicates.push({ kind: "project", value: filters.project })
  if (filters.author) predicates.push({ kind: "author", value: filters.author })
  if (filters.search) predicates.push({ kind: "search", value: filters.search })
  if (filters.since) predicates.push({ kind: "since", value: filters.since })
  if (filters.until) predicates.push({ kind: "until", value: filters.until })
  if (filters.labelId !== undefined)
    predicates.push({ kind: "label", value: filters.labelId })
  if (filters.hashPrefix)
    predicates.push({ kind: "hashPrefix", value: filters.hashPrefix })
  return predicates
}

/**
 * Compiles one predicate against the commits alias `c`.
 * Values never reach the SQL text; every value is a bound parameter.
 * Text filters need the `casefold` function registered by `createDatabase`.
 */
function compileOne(predicate: Predicate): CompiledPredicates {
  switch (predicate.kind) {
    case "classification":
      return { conditions: ["c.classification = ?"], params: [predicate.value] }
    case "project":
      return { conditions: ["c.project = ?"], params: [predicate.value] }
    case "author":
      return {
        conditions: ["instr(casefold(c.author), ?) > 0"],
        params: [predicate.value.toLowerCase()],
      }
    case "search": {
      const needle = predicate.value.toLowerCase()
      return {
        conditions: [
          "(instr(casefold(c.subject), ?) > 0 OR instr(casefold(c.body), ?) > 0)",
        ],
        params: [needle, needle],
      }
    }
    case "since":
      return { conditions: ["c.committed_at >= ?"], params: [predicate.value] }
    case "until":
      return {
        conditions: ["substr(c.committed_at, 1, ?) <= ?"],
        params: [predicate.value.length, predicate.value],
      }
    case "label":
      return {
        conditions: [
          "EXISTS (SELECT 1 FROM commit_labels cl WHERE cl.commit_hash = c.hash AND cl.label_id = ?)",
        ],
        params: [predicate.value],
      }
    case "hashPrefix":
      return {
        conditions: ["c.hash LIKE ? ESCAPE '\\'"],
        params: [`${escapeLike(predicate.value.toLowerCase())}%`],
      }
  }
}

/** Compiles predicates into AND-ed conditions. */
export function compilePredicates(
  predicates: readonly Predicate[],
): CompiledPredicates {
  const conditions: string[] = []
  const params: (string | number)[] = []
  for (const predicate of predicates) {
    const compiled = compileOne(predicate)
    conditions.push(...compiled.conditions)
    params.push(...compiled.params)
  }
  return { conditions, params }
}

/** `WHERE a AND b ...`, or an empty string when there are no conditions. */
export function whereClause(compiled: CompiledPredicates): string {
  return compiled.conditions.length > 0
    ? `WHERE ${compiled.conditions.join(" AND ")}`
    : ""
}
