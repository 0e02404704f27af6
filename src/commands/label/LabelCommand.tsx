import { Box, Text } from "ink"
import React from "react"

import type { LabelRow } from "@db/types"

interface LabelListProps {
  labels: LabelRow[]
}

export function LabelList({ labels }: LabelListProps) {
  if (labels.length === 0) {
    return <Text color="gray">No labels defined.</Text>
  }
  return (
    <Box flexDirection="column">
      <Text bold>Labels ({labels.length}):</Text>
      {labels.map((l) => (
        <Text key={l.id}>
          {"  "}
          <Text color="cyan">{String(l.id).padStart(3)}</Text> {l.name}
          {l.is_default ? <Text color="gray"> (default)</Text> : null}
        </Text>
      ))}
    </Box>
  )
}
