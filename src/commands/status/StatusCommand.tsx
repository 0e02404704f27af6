import React from "react"
import { Box, Text } from "ink"
import type { StatusInfo } from "@/types"

/** Props for the StatusCommand component. */
interface StatusCommandProps {
  status: StatusInfo
}

export function formatBytes(size: number): string {
  if (size < 1024) return `${size} B`
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`
  return `${(size / (1024 * 1024)).toFixed(1)} MB`
}

/** Ink component that displays store health and the last classification. */
export function StatusCommand({ status }: StatusCommandProps) {
  const classifiedPct =
    status.totalCommits > 0
      ? Math.round((status.classifiedCommits / status.totalCommits) * 100)
      : 0
  const last = status.lastClassification
  const config = status.config

  return (
    <Box flexDirection="column">
      <Text bold>basediff status</Text>
      <Text> </Text>
      <Text>Commits: {status.totalCommits.toLocaleString()}</Text>
      <Text>
        Classified: {status.classifiedCommits.toLocaleString()} /{" "}
        {status.totalCommits.toLocaleString()} ({classifiedPct}%)
      </Text>
      <Text>Projects: {status.projectCount.toLocaleString()}</Text>
      <Text>Last scan: {status.lastScan ?? "never"}</Text>
      {last && (
        <Text>
          Last classification: {last.shared} shared,{" "}
          {last.aOnly} upstream_only, {last.bOnly} vendor_only
        </Text>
      )}
      <Text>DB: {status.dbPath}</Text>
      <Text>DB size: {formatBytes(status.dbSize)}</Text>

      {config && (
        <>
          <Text> </Text>
          <Text bold>Config:</Text>
          <Text> Upstream tree: {config.upstreamPath ?? "not set"}</Text>
          <Text> Vendor tree: {config.vendorPath ?? "not set"}</Text>
          <Text> Batch size: {config.batchSize}</Text>
          <Text> Scan concurrency: {config.scanConcurrency}</Text>
        </>
      )}
    </Box>
  )
}
