import { Box, Text } from "ink"
import React from "react"

import { CLASSIFICATIONS, CLASSIFICATION_COLORS } from "@/types"
import type { ClassificationCounts } from "@db/types"

/** Props for the StatsCommand component. */
interface StatsCommandProps {
  counts: ClassificationCounts
  projects: string[]
  authors: string[]
  /** Maximum number of projects and authors listed. */
  limit: number
}

function pct(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 100) : 0
}

/** Ink component that shows commit counts per classification. */
export function StatsCommand({
  counts,
  projects,
  authors,
  limit,
}: StatsCommandProps) {
  return (
    <Box flexDirection="column">
      <Text bold>Commits: {counts.total.toLocaleString()}</Text>
      {CLASSIFICATIONS.map((c) => (
        <Text key={c} color={CLASSIFICATION_COLORS[c]}>
          {"  "}
          {c}: {counts[c].toLocaleString()} ({pct(counts[c], counts.total)}%)
        </Text>
      ))}
      {counts.unclassified > 0 && (
        <Text color="gray">
          {"  "}unclassified: {counts.unclassified.toLocaleString()}
        </Text>
      )}
      <Text> </Text>
      <Text bold>Projects ({projects.length}):</Text>
      {projects.slice(0, limit).map((p) => (
        <Text key={p}>
          {"  "}
          {p}
        </Text>
      ))}
      {projects.length > limit && (
        <Text color="gray">
          {"  "}... {projects.length - limit} more
        </Text>
      )}
      <Text> </Text>
      <Text bold>Authors ({authors.length}):</Text>
      {authors.slice(0, limit).map((a) => (
        <Text key={a}>
          {"  "}
          {a}
        </Text>
      ))}
      {authors.length > limit && (
        <Text color="gray">
          {"  "}... {authors.length - limit} more
        </Text>
      )}
    </Box>
  )
}
