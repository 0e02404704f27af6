import React from "react"
import { Box, Text } from "ink"

import { CLASSIFICATION_COLORS, type ClassifySummary } from "@/types"

interface ClassifySummaryViewProps {
  summary: ClassifySummary
}

/** Identifier counts per partition. */
export function ClassifySummaryView({ summary }: ClassifySummaryViewProps) {
  return (
    <Box flexDirection="column">
      <Text bold>Change-Ids</Text>
      <Text>
        {"  "}upstream: {summary.totalA.toLocaleString()} vendor:{" "}
        {summary.totalB.toLocaleString()}
      </Text>
      <Text color={CLASSIFICATION_COLORS.shared}>
        {"  "}shared: {summary.shared.toLocaleString()}
      </Text>
      <Text color={CLASSIFICATION_COLORS.upstream_only}>
        {"  "}upstream_only: {summary.aOnly.toLocaleString()}
      </Text>
      <Text color={CLASSIFICATION_COLORS.vendor_only}>
        {"  "}vendor_only: {summary.bOnly.toLocaleString()}
      </Text>
    </Box>
  )
}

interface ClassifyCommandProps {
  summary: ClassifySummary
}

export function ClassifyCommand({ summary }: ClassifyCommandProps) {
  return (
    <Box flexDirection="column">
      <Text color="green">Classification complete!</Text>
      <Text> </Text>
      <ClassifySummaryView summary={summary} />
    </Box>
  )
}
