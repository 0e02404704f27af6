import { Box, Text, useApp } from "ink"
import Spinner from "ink-spinner"
import React, { useEffect, useState } from "react"

import { type ProgressEvent, ProgressChannel } from "@/progress"
import type { ScanSummary } from "@/types"
import { ClassifySummaryView } from "@commands/classify/ClassifyCommand"

/** Props for the ScanCommand component. */
interface ScanCommandProps {
  /** Starts the scan, reporting through the given channel. */
  run: (progress: ProgressChannel) => Promise<ScanSummary>
}

/**
 * Ink component that runs a scan cycle and shows live progress, then the
 * classification summary and any projects whose log could not be read.
 */
export function ScanCommand({ run }: ScanCommandProps) {
  const { exit } = useApp()
  const [progress, setProgress] = useState<ProgressEvent>({
    phase: "idle",
    current: 0,
    total: 0,
  })
  const [result, setResult] = useState<ScanSummary | null>(null)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    const channel = new ProgressChannel()
    const unsubscribe = channel.subscribe(setProgress)

    run(channel)
      .then(setResult)
      .catch((err: unknown) =>
        setError(err instanceof Error ? err.message : String(err)),
      )

    return unsubscribe
  }, [run])

  useEffect(() => {
    if (result || error) exit()
  }, [result, error, exit])

  if (error) {
    return (
      <Box flexDirection="column">
        <Text color="red">Error: {error}</Text>
      </Box>
    )
  }

  if (result) {
    return (
      <Box flexDirection="column">
        <Text color="green">Scan complete!</Text>
        <Text>
          Projects: {result.upstreamProjects.toLocaleString()} upstream,{" "}
          {result.vendorProjects.toLocaleString()} vendor
        </Text>
        <Text>Commits stored: {result.totalCommits.toLocaleString()}</Text>
        {result.skippedRecords > 0 && (
          <Text color="yellow">
            Skipped malformed records: {result.skippedRecords}
          </Text>
        )}
        <Text> </Text>
        <ClassifySummaryView summary={result.classification} />
        {result.failedProjects.length > 0 && (
          <>
            <Text> </Text>
            <Text color="yellow">
              {result.failedProjects.length} project(s) yielded no commits:
            </Text>
            {result.failedProjects.map((p) => (
              <Text key={`${p.tree}:${p.project}`} color="gray">
                {"  "}
                [{p.tree}] {p.project}: {p.error}
              </Text>
            ))}
          </>
        )}
      </Box>
    )
  }

  return (
    <Box flexDirection="column">
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text> {phaseLabel(progress)}</Text>
      </Box>
      {progress.phase === "scanning" && progress.total > 0 && (
        <Text>
          Reading project {progress.current.toLocaleString()} /{" "}
          {progress.total.toLocaleString()}
          {progress.item ? ` [${progress.item}]` : ""}
        </Text>
      )}
    </Box>
  )
}

/** Maps a progress phase to a human-readable status label. */
export function phaseLabel(progress: ProgressEvent): string {
  switch (progress.phase) {
    case "idle":
      return "Starting..."
    case "resetting":
      return "Clearing previous results..."
    case "manifests":
      return "Reading manifests..."
    case "scanning":
      return "Reading commit logs..."
    case "loading":
      return "Loading change identifiers..."
    case "partitioning":
      return "Comparing trees..."
    case "writing":
      return progress.item
        ? `Writing classifications (${progress.item})...`
        : "Writing classifications..."
    case "done":
      return "Done"
    case "error":
      return "Failed"
  }
}
