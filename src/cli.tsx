#!/usr/bin/env tsx
import { handleError } from "@/errors"
import { resolveFormat } from "@/output"
import { basediffCommand } from "@commands/basediff"
import { classifyCommand } from "@commands/classify/command"
import { commitsCommand } from "@commands/commits/command"
import { initCommand } from "@commands/init/command"
import { labelCommand } from "@commands/label/command"
import { resetCommand } from "@commands/reset/command"
import { scanCommand } from "@commands/scan/command"
import { statsCommand } from "@commands/stats/command"
import { statusCommand } from "@commands/status/command"

const program = basediffCommand
  .addCommand(initCommand)
  .addCommand(scanCommand)
  .addCommand(classifyCommand)
  .addCommand(commitsCommand)
  .addCommand(statsCommand)
  .addCommand(statusCommand)
  .addCommand(labelCommand)
  .addCommand(resetCommand)

program.parseAsync().catch((err: unknown) => {
  handleError(err, resolveFormat(program.opts()))
})
