import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import { resolve } from "path"
import React from "react"

import { resolveTreePaths } from "@/config"
import { formatOutput } from "@/output"
import { ClassifyCommand } from "@commands/classify/ClassifyCommand"
import { runCommand } from "@commands/utils/command-context"
import { BatchPlanner } from "@db/batch"
import { CommitRepository } from "@db/commits"
import { DiffClassifier } from "@services/classifier"
import { ManifestReader } from "@services/manifest"

const HELP_TEXT = `
Re-reads both manifests for their project lists and reclassifies the
commits already stored. No git logs are read.

Examples:
  basediff classify
  basediff classify --upstream ../aosp --vendor ../vendor`

export const classifyCommand = new Command("classify")
  .description("Reclassify stored commits against both trees")
  .addHelpText("after", HELP_TEXT)
  .option("--upstream <path>", "Root of the upstream (A) tree")
  .option("--vendor <path>", "Root of the vendor (B) tree")
  .action(async (opts, cmd) => {
    await runCommand(
      cmd.parent?.opts() ?? {},
      { needsLock: true },
      ({ format, cwd, db, config }) => {
        const paths = resolveTreePaths(config, opts)
        const manifests = new ManifestReader()
        const upstream = manifests.read(resolve(cwd, paths.upstream))
        const vendor = manifests.read(resolve(cwd, paths.vendor))

        const planner = new BatchPlanner(config.batchSize)
        const commits = new CommitRepository(db, planner)
        const summary = new DiffClassifier(db, commits).classify(
          upstream.map((p) => p.projectName),
          vendor.map((p) => p.projectName),
        )

        if (formatOutput(format, { success: true, ...summary })) return

        render(<ClassifyCommand summary={summary} />).unmount()
      },
    )
  })
