import { Command } from "@commander-js/extra-typings"

import { ValidationError, wrapStorage } from "@/errors"
import { formatOutput } from "@/output"
import { runCommand } from "@commands/utils/command-context"
import { CommitRepository } from "@db/commits"
import { deleteMetadata } from "@db/database"

const HELP_TEXT = `
Deletes every stored commit, project and commit-label link. Labels
themselves and the configuration are kept. There is no undo.

Examples:
  basediff reset --yes`

export const resetCommand = new Command("reset")
  .description("Delete all stored commits and projects")
  .addHelpText("after", HELP_TEXT)
  .option("-y, --yes", "Confirm the deletion")
  .action(async (opts, cmd) => {
    await runCommand(
      cmd.parent?.opts() ?? {},
      { needsLock: true },
      ({ format, db }) => {
        if (!opts.yes) {
          throw new ValidationError(
            "reset deletes every stored commit",
            "rerun with --yes to confirm",
          )
        }
        const commits = new CommitRepository(db)
        const removed = commits.getTotalCommitCount()
        commits.clearAll()
        wrapStorage("clear scan metadata", () =>
          deleteMetadata(db, ["last_scan", "last_classification"]),
        )

        if (formatOutput(format, { success: true, removed })) return

        console.log(`Removed ${removed.toLocaleString()} commits.`)
      },
    )
  })
