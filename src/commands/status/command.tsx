import { Command } from "@commander-js/extra-typings"
import { statSync } from "fs"
import { render } from "ink"
import React from "react"
import { z } from "zod"

import { formatOutput } from "@/output"
import type { ClassifySummary, StatusInfo } from "@/types"
import { StatusCommand } from "@commands/status/StatusCommand"
import { runCommand } from "@commands/utils/command-context"
import { CommitRepository } from "@db/commits"
import { getMetadata } from "@db/database"
import { ProjectRepository } from "@db/projects"

const summarySchema = z.object({
  totalA: z.number(),
  totalB: z.number(),
  shared: z.number(),
  aOnly: z.number(),
  bOnly: z.number(),
})

/**
 * Parses the stored classification summary; anything unreadable counts as
 * absent.
 */
export function parseStoredSummary(
  value: string | null,
): ClassifySummary | null {
  if (value === null) return null
  let raw: unknown
  try {
    raw = JSON.parse(value)
  } catch {
    return null
  }
  const parsed = summarySchema.safeParse(raw)
  return parsed.success ? parsed.data : null
}

const HELP_TEXT = `
Displays commit and project counts, the last scan time, the last
classification summary, database path and size, and configured trees.`

export const statusCommand = new Command("status")
  .alias("s")
  .description("Show store health and the last classification")
  .addHelpText("after", HELP_TEXT)
  .action(async (_opts, cmd) => {
    await runCommand(
      cmd.parent?.opts() ?? {},
      {},
      ({ format, db, dbPath, config }) => {
        const commits = new CommitRepository(db)

        const status: StatusInfo = {
          totalCommits: commits.getTotalCommitCount(),
          classifiedCommits: commits.getClassifiedCommitCount(),
          projectCount: new ProjectRepository(db).getProjectCount(),
          lastScan: getMetadata(db, "last_scan"),
          lastClassification: parseStoredSummary(
            getMetadata(db, "last_classification"),
          ),
          dbPath,
          dbSize: statSync(dbPath).size,
          config,
        }

        if (formatOutput(format, status)) return

        render(<StatusCommand status={status} />).unmount()
      },
    )
  })
