import { Box, Text } from "ink"
import React from "react"

import { CLASSIFICATION_COLORS } from "@/types"
import type { CommitView } from "@db/types"

/** Props for the CommitsCommand component. */
interface CommitsCommandProps {
  rows: CommitView[]
  /** Matching commits before paging. */
  total: number
  offset: number
}

/** Ink component that lists one page of commits with their provenance. */
export function CommitsCommand({ rows, total, offset }: CommitsCommandProps) {
  if (rows.length === 0) {
    return <Text color="gray">No matching commits found.</Text>
  }

  const first = offset + 1
  const last = offset + rows.length

  return (
    <Box flexDirection="column">
      <Text bold>
        Commits {first}-{last} of {total.toLocaleString()}
      </Text>
      <Text> </Text>
      {rows.map((c) => (
        <Box key={c.hash} flexDirection="column" marginBottom={1}>
          <Text>
            <Text color="cyan">{c.hash.slice(0, 12)}</Text>{" "}
            <Text
              color={
                c.classification
                  ? CLASSIFICATION_COLORS[c.classification]
                  : "gray"
              }
            >
              [{c.classification ?? "unclassified"}]
            </Text>{" "}
            {c.subject}
          </Text>
          <Text color="gray">
            {"  "}
            {c.project} | {c.author} | {c.committedAt}
          </Text>
          {c.url && (
            <Text color="gray">
              {"  "}
              {c.url}
            </Text>
          )}
          {c.labels.length > 0 && (
            <Text>
              {"  "}labels: {c.labels.map((l) => l.name).join(", ")}
            </Text>
          )}
          {c.relatedCommits && c.relatedCommits.length > 0 && (
            <Text>
              {"  "}also in:{" "}
              {c.relatedCommits
                .map((r) => `${r.project}@${r.hash.slice(0, 12)}`)
                .join(", ")}
            </Text>
          )}
        </Box>
      ))}
    </Box>
  )
}
