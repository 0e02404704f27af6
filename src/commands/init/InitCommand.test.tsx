import { render } from "ink-testing-library"
import React from "react"
import { describe, expect, test } from "vitest"

import { type BasediffConfig, DEFAULTS } from "@/config"
import { InitCommand } from "@commands/init/InitCommand"

describe("InitCommand", () => {
  test("displays initialized header", () => {
    const { lastFrame } = render(<InitCommand config={{ ...DEFAULTS }} />)
    expect(lastFrame()).toContain("Initialized basediff")
  })

  test("shows unset tree paths", () => {
    const { lastFrame } = render(<InitCommand config={{ ...DEFAULTS }} />)
    const output = lastFrame()

    expect(output).toContain("Upstream tree: not set")
    expect(output).toContain("Vendor tree: not set")
    expect(output).toContain("Batch size: 500")
  })

  test("shows configured tree paths", () => {
    const config: BasediffConfig = {
      ...DEFAULTS,
      upstreamPath: "/src/aosp",
      vendorPath: "/src/vendor",
    }
    const { lastFrame } = render(<InitCommand config={config} />)
    const output = lastFrame()

    expect(output).toContain("Upstream tree: /src/aosp")
    expect(output).toContain("Vendor tree: /src/vendor")
  })

  test("displays next-step guidance", () => {
    const { lastFrame } = render(<InitCommand config={{ ...DEFAULTS }} />)
    expect(lastFrame()).toContain(
      "Run `basediff scan` to read both trees and classify their commits.",
    )
  })
})
