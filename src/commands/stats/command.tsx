import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { formatOutput } from "@/output"
import { StatsCommand } from "@commands/stats/StatsCommand"
import { runCommand } from "@commands/utils/command-context"
import { parsePositiveInt } from "@commands/utils/parse-int"
import { CommitRepository } from "@db/commits"

const HELP_TEXT = `
Counts stored commits per classification and lists the distinct projects
and authors. JSON output always carries the full lists.

--limit controls how many projects and authors are printed. Default: 10.

Examples:
  basediff stats
  basediff stats --limit 50
  basediff stats --json`

export const statsCommand = new Command("stats")
  .option("-l, --limit <number>", "Limit printed lists", parsePositiveInt, 10)
  .description("Show commit counts per classification")
  .addHelpText("after", HELP_TEXT)
  .action(async (opts, cmd) => {
    await runCommand(cmd.parent?.opts() ?? {}, {}, ({ format, db }) => {
      const commits = new CommitRepository(db)
      const counts = commits.countByClassification()
      const projects = commits.getDistinctProjects()
      const authors = commits.getDistinctAuthors()

      if (formatOutput(format, { counts, projects, authors })) return

      render(
        <StatsCommand
          counts={counts}
          projects={projects}
          authors={authors}
          limit={opts.limit}
        />,
      ).unmount()
    })
  })
