import { mkdirSync, writeFileSync } from "fs"
import { mkdtemp, realpath, rm } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import { afterEach, beforeEach, describe, expect, test } from "vitest"

import { NotFoundError, ValidationError } from "@/errors"
import { ManifestReader, parseManifest } from "@services/manifest"

const SAMPLE = `<?xml version="1.0" encoding="UTF-8"?>
<manifest>
  <!-- remotes -->
  <remote name="origin" fetch="https://git.example.com/" />
  <remote name="partner" fetch="https://partner.example.com//" />
  <default remote="origin" revision="main" />

  <project name="platform/build" path="build/make" />
  <project name="platform/art" />
  <project name="vendor/hal" path="vendor/hal" remote="partner" />
  <project name="platform/art" path="ignored" />
  <project path="no/name" />
  <project name="orphan" remote="missing" />
</manifest>
`

describe("parseManifest", () => {
  test("resolves paths and remotes for each project", () => {
    expect(parseManifest(SAMPLE, "/trees/aosp")).toEqual([
      {
        projectName: "platform/build",
        filesystemPath: "/trees/aosp/build/make",
        remoteUrl: "https://git.example.com",
      },
      {
        projectName: "platform/art",
        filesystemPath: "/trees/aosp/platform/art",
        remoteUrl: "https://git.example.com",
      },
      {
        projectName: "vendor/hal",
        filesystemPath: "/trees/aosp/vendor/hal",
        remoteUrl: "https://partner.example.com",
      },
      {
        projectName: "orphan",
        filesystemPath: "/trees/aosp/orphan",
        remoteUrl: "",
      },
    ])
  })

  test("without a default remote, projects have no remote URL", () => {
    const xml = `<manifest><project name="a" /></manifest>`
    expect(parseManifest(xml, "/r")).toEqual([
      { projectName: "a", filesystemPath: "/r/a", remoteUrl: "" },
    ])
  })

  test("a single project parses as a list", () => {
    const xml = `<manifest><remote name="o" fetch="https://h"/><default remote="o"/><project name="solo"/></manifest>`
    expect(parseManifest(xml, "/r").map((p) => p.remoteUrl)).toEqual(["https://h"])
  })

  test("an empty manifest has no projects", () => {
    expect(parseManifest("<manifest/>", "/r")).toEqual([])
    expect(parseManifest("<manifest></manifest>", "/r")).toEqual([])
  })

  test("rejects malformed XML", () => {
    expect(() => parseManifest("<manifest><project name='a'>", "/r")).toThrow(
      ValidationError,
    )
  })

  test("rejects a document without a manifest root", () => {
    expect(() => parseManifest("<other/>", "/r")).toThrow(
      "invalid manifest: missing <manifest> root element",
    )
  })
})

describe("ManifestReader", () => {
  let root: string

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "basediff-manifest-test-")))
  })

  afterEach(async () => {
    await rm(root, { recursive: true })
  })

  test("reads .repo/manifest.xml under the root", () => {
    mkdirSync(join(root, ".repo"))
    writeFileSync(
      join(root, ".repo", "manifest.xml"),
      `<manifest><project name="device/common" /></manifest>`,
    )

    expect(new ManifestReader().read(root)).toEqual([
      {
        projectName: "device/common",
        filesystemPath: join(root, "device/common"),
        remoteUrl: "",
      },
    ])
  })

  test("throws NotFoundError when the manifest is missing", () => {
    expect(() => new ManifestReader().read(root)).toThrow(NotFoundError)
    expect(() => new ManifestReader().read(root)).toThrow(
      `manifest not found: ${join(root, ".repo", "manifest.xml")}`,
    )
  })
})
