import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import { resolve } from "path"
import React from "react"

import { resolveTreePaths } from "@/config"
import { formatOutput } from "@/output"
import { ScanCommand } from "@commands/scan/ScanCommand"
import { runCommand } from "@commands/utils/command-context"
import { parsePositiveInt } from "@commands/utils/parse-int"
import { BatchPlanner } from "@db/batch"
import { CommitRepository } from "@db/commits"
import { ProjectRepository } from "@db/projects"
import { DiffClassifier } from "@services/classifier"
import { GitLogService } from "@services/git"
import { ManifestReader } from "@services/manifest"
import { ScanService } from "@services/scanner"

const HELP_TEXT = `
Clears every stored commit and project, reads .repo/manifest.xml in both
trees, reads the git log of every project, stores the commits, then
classifies them. Labels attached to commits are cleared with them.

A project whose checkout is missing or whose log cannot be read is
reported and skipped; the rest of the scan continues.

Examples:
  basediff scan
  basediff scan --upstream ../aosp --vendor ../vendor
  basediff scan --max-count 1000`

export const scanCommand = new Command("scan")
  .description("Read both trees, store their commits and classify them")
  .addHelpText("after", HELP_TEXT)
  .option("--upstream <path>", "Root of the upstream (A) tree")
  .option("--vendor <path>", "Root of the vendor (B) tree")
  .option(
    "-n, --max-count <number>",
    "Commits read per project",
    parsePositiveInt,
  )
  .action(async (opts, cmd) => {
    await runCommand(
      cmd.parent?.opts() ?? {},
      { needsLock: true },
      async ({ format, cwd, db, config }) => {
        const paths = resolveTreePaths(config, opts)
        const planner = new BatchPlanner(config.batchSize)
        const commits = new CommitRepository(db, planner)
        const scanner = new ScanService(
          db,
          new ManifestReader(),
          new GitLogService(
            undefined,
            opts.maxCount ?? config.maxCommitsPerProject,
          ),
          commits,
          new ProjectRepository(db),
          new DiffClassifier(db, commits),
          config.scanConcurrency,
        )
        const upstream = resolve(cwd, paths.upstream)
        const vendor = resolve(cwd, paths.vendor)

        if (format === "json") {
          const summary = await scanner.scan(upstream, vendor)
          formatOutput("json", { success: true, ...summary })
          return
        }

        const instance = render(
          <ScanCommand
            run={(progress) => scanner.scan(upstream, vendor, progress)}
          />,
        )
        await instance.waitUntilExit()
        instance.unmount()
      },
    )
  })
