import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { formatOutput } from "@/output"
import { CommitsCommand } from "@commands/commits/CommitsCommand"
import { runCommand } from "@commands/utils/command-context"
import {
  parseClassification,
  parseDate,
  parseNonNegativeInt,
  parsePositiveInt,
} from "@commands/utils/parse-int"
import { BatchPlanner } from "@db/batch"
import { CommitQueryService } from "@db/query"

const HELP_TEXT = `
Lists stored commits, newest first. Every filter narrows the result.
Without --limit a page of "defaultPageSize" commits is returned; --all
returns every match up to "maxUnboundedRows".

Shared commits list up to five counterparts carrying the same Change-Id.

Examples:
  basediff commits --classification vendor_only
  basediff commits --project platform/frameworks/base --since 2024-01-01
  basediff commits --author alice --search "null check" --limit 20
  basediff q --label 3 --all --json`

export const commitsCommand = new Command("commits")
  .alias("q")
  .description("List commits with their classification")
  .addHelpText("after", HELP_TEXT)
  .option(
    "-c, --classification <type>",
    "shared, upstream_only or vendor_only",
    parseClassification,
  )
  .option("-p, --project <name>", "Exact project name")
  .option("-a, --author <text>", "Author name contains (case-insensitive)")
  .option("-s, --search <text>", "Subject or body contains (case-insensitive)")
  .option("--since <date>", "Committed on or after (YYYY-MM-DD)", parseDate)
  .option("--until <date>", "Committed on or before (YYYY-MM-DD)", parseDate)
  .option("--label <id>", "Carries the label with this id", parsePositiveInt)
  .option("--hash <prefix>", "Commit hash starts with")
  .option("-l, --limit <number>", "Page size", parsePositiveInt)
  .option("-o, --offset <number>", "Rows to skip", parseNonNegativeInt)
  .option("--all", "Return every match")
  .action(async (opts, cmd) => {
    await runCommand(cmd.parent?.opts() ?? {}, {}, ({ format, db, config }) => {
      const service = new CommitQueryService(
        db,
        config,
        new BatchPlanner(config.batchSize),
      )
      const offset = opts.offset ?? 0
      const page = service.query(
        {
          classification: opts.classification,
          project: opts.project,
          author: opts.author,
          search: opts.search,
          since: opts.since,
          until: opts.until,
          labelId: opts.label,
          hashPrefix: opts.hash,
        },
        { limit: opts.limit, offset, all: opts.all },
      )

      if (formatOutput(format, { total: page.total, offset, rows: page.rows }))
        return

      render(
        <CommitsCommand rows={page.rows} total={page.total} offset={offset} />,
      ).unmount()
    })
  })
