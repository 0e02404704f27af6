import { Command } from "@commander-js/extra-typings"

const HELP_TEXT = `
Getting started:
  1. Initialize basediff:       basediff init --upstream ../aosp --vendor ../vendor
  2. Scan and classify:         basediff scan
  3. List vendor-only commits:  basediff commits --classification vendor_only

Both trees are repo-manifest checkouts (a directory holding .repo/manifest.xml).
Global options --format json and --json work with every command.`

const basediffCommand = new Command()
  .name("basediff")
  .description("Classify commits shared between an upstream and a vendor tree")
  .version("0.1.0")
  .option("--format <format>", "Output format (text or json)", "text")
  .option("--json", "Shorthand for --format json")
  .addHelpText("after", HELP_TEXT)

type BasediffCommandOpts = ReturnType<(typeof basediffCommand)["opts"]>

export { basediffCommand, type BasediffCommandOpts }
