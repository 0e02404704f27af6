import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import { resolve } from "path"
import React from "react"

import { type BasediffConfig, createConfig } from "@/config"
import { formatOutput } from "@/output"
import { InitCommand } from "@commands/init/InitCommand"
import { runCommand } from "@commands/utils/command-context"
import { parsePositiveInt } from "@commands/utils/parse-int"

const HELP_TEXT = `
Creates .basediff/config.json and an empty .basediff/index.db database.
Must be run before any other basediff command.

Tree paths are stored as absolute paths. They can be overridden per run
with --upstream and --vendor on scan and classify.

Examples:
  basediff init
  basediff init --upstream ../aosp --vendor ../vendor
  basediff init --batch-size 200`

export const initCommand = new Command("init")
  .description("Initialize basediff in the current directory")
  .addHelpText("after", HELP_TEXT)
  .option("--upstream <path>", "Root of the upstream (A) tree")
  .option("--vendor <path>", "Root of the vendor (B) tree")
  .option(
    "--batch-size <number>",
    "Bound parameters per chunked statement (1-999)",
    parsePositiveInt,
  )
  .action(async (opts, cmd) => {
    await runCommand(
      cmd.parent?.opts() ?? {},
      { needsConfig: false, dbMustExist: false },
      ({ format, cwd, basediffDir }) => {
        const overrides: Partial<BasediffConfig> = {}
        if (opts.upstream !== undefined)
          overrides.upstreamPath = resolve(cwd, opts.upstream)
        if (opts.vendor !== undefined)
          overrides.vendorPath = resolve(cwd, opts.vendor)
        if (opts.batchSize !== undefined) overrides.batchSize = opts.batchSize

        const config = createConfig(
          basediffDir,
          Object.keys(overrides).length > 0 ? overrides : undefined,
        )

        if (formatOutput(format, { success: true, config })) return

        render(<InitCommand config={config} />).unmount()
      },
    )
  })
