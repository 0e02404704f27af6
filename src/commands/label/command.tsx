import { Command } from "@commander-js/extra-typings"
import { InvalidArgumentError } from "commander"
import { render } from "ink"
import React from "react"

import { formatOutput } from "@/output"
import { LabelList } from "@commands/label/LabelCommand"
import { runCommand } from "@commands/utils/command-context"
import { parsePositiveInt } from "@commands/utils/parse-int"
import { LabelRepository } from "@db/labels"

function collectIds(value: string, previous: number[]): number[] {
  const id = parseInt(value, 10)
  if (isNaN(id) || id < 1) {
    throw new InvalidArgumentError("label ids must be positive integers")
  }
  return [...previous, id]
}

const listCommand = new Command("list")
  .description("List all labels")
  .action(async (_opts, cmd) => {
    const globals = cmd.parent?.parent?.opts() ?? {}
    await runCommand(globals, {}, ({ format, db }) => {
      const labels = new LabelRepository(db).listLabels()
      if (formatOutput(format, { labels })) return
      render(<LabelList labels={labels} />).unmount()
    })
  })

const addCommand = new Command("add")
  .description("Create a custom label")
  .argument("<name>", "Label name")
  .action(async (name, _opts, cmd) => {
    const globals = cmd.parent?.parent?.opts() ?? {}
    await runCommand(globals, { needsLock: true }, ({ format, db }) => {
      const id = new LabelRepository(db).addLabel(name)
      if (formatOutput(format, { success: true, id, name: name.trim() })) return
      console.log(`Added label ${id}: ${name.trim()}`)
    })
  })

const removeCommand = new Command("remove")
  .description("Delete a label and detach it from every commit")
  .argument("<id>", "Label id", parsePositiveInt)
  .action(async (id, _opts, cmd) => {
    const globals = cmd.parent?.parent?.opts() ?? {}
    await runCommand(globals, { needsLock: true }, ({ format, db }) => {
      new LabelRepository(db).removeLabel(id)
      if (formatOutput(format, { success: true, id })) return
      console.log(`Removed label ${id}`)
    })
  })

const setCommand = new Command("set")
  .description("Replace the labels of a commit (no ids clears them)")
  .argument("<hash>", "Full commit hash")
  .option("-i, --id <id>", "Label id, repeatable", collectIds, [])
  .action(async (hash, opts, cmd) => {
    const globals = cmd.parent?.parent?.opts() ?? {}
    await runCommand(globals, { needsLock: true }, ({ format, db }) => {
      const ids = [...new Set(opts.id)]
      new LabelRepository(db).setCommitLabels(hash, ids)
      if (formatOutput(format, { success: true, hash, labelIds: ids })) return
      console.log(
        ids.length > 0
          ? `Labels of ${hash.slice(0, 12)}: ${ids.join(", ")}`
          : `Cleared labels of ${hash.slice(0, 12)}`,
      )
    })
  })

export const labelCommand = new Command("label")
  .description("Manage commit labels")
  .addHelpText(
    "after",
    `
Examples:
  basediff label list
  basediff label add needs_review
  basediff label set <hash> --id 3 --id 7
  basediff label remove 10`,
  )
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(removeCommand)
  .addCommand(setCommand)
