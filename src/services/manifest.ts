import debug from "debug"
import { XMLParser } from "fast-xml-parser"
import { existsSync, readFileSync } from "fs"
import { join } from "path"
import { z } from "zod"

import { NotFoundError, ValidationError } from "@/errors"
import type { ManifestProject } from "@/types"

const log = debug("basediff:manifest")

/** Location of the manifest inside a tree root. */
export const MANIFEST_RELATIVE_PATH = join(".repo", "manifest.xml")

const attrs = z.record(z.string(), z.unknown())

const manifestBody = z.object({
  remote: z.array(attrs).optional(),
  default: z.array(attrs).optional(),
  project: z.array(attrs).optional(),
})

// An empty <manifest/> parses to ""
const manifestSchema = z.object({
  manifest: z
    .union([manifestBody, z.literal("")])
    .transform((m): z.infer<typeof manifestBody> => (m === "" ? {} : m)),
})

function attr(
  element: Record<string, unknown>,
  name: string,
): string | undefined {
  const value = element[name]
  return typeof value === "string" && value !== "" ? value : undefined
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  // called for attributes too; `remote` is also a project attribute
  isArray: (name, _jpath, _isLeafNode, isAttribute) =>
    !isAttribute &&
    (name === "remote" || name === "default" || name === "project"),
})

/**
 * Parses manifest XML into its project list, in document order.
 *
 * Remote fetch URLs lose any trailing `/`. A project without `remote` uses
 * the `<default>` remote; one without `path` lives at its name. Projects
 * without a name are skipped, and a repeated name keeps its first entry.
 */
export function parseManifest(xml: string, root: string): ManifestProject[] {
  let doc: unknown
  try {
    doc = parser.parse(xml, true)
  } catch (err) {
    throw new ValidationError(
      `invalid manifest XML: ${err instanceof Error ? err.message : String(err)}`,
    )
  }

  const parsed = manifestSchema.safeParse(doc)
  if (!parsed.success) {
    throw new ValidationError(
      "invalid manifest: missing <manifest> root element",
    )
  }
  const manifest = parsed.data.manifest

  const remotes = new Map<string, string>()
  for (const remote of manifest.remote ?? []) {
    const name = attr(remote, "name")
    const fetch = attr(remote, "fetch")
    if (name && fetch) remotes.set(name, fetch.replace(/\/+$/, ""))
  }

  const defaultElement = manifest.default?.[0]
  const defaultRemote = defaultElement
    ? attr(defaultElement, "remote")
    : undefined

  const seen = new Set<string>()
  const projects: ManifestProject[] = []
  for (const project of manifest.project ?? []) {
    const name = attr(project, "name")
    if (!name || seen.has(name)) continue
    seen.add(name)
    const remote = attr(project, "remote") ?? defaultRemote
    projects.push({
      projectName: name,
      filesystemPath: join(root, attr(project, "path") ?? name),
      remoteUrl: (remote && remotes.get(remote)) ?? "",
    })
  }
  return projects
}

/** Reads the project list of a repo-manifest checkout. */
export class ManifestReader {
  /**
   * Reads `<root>/.repo/manifest.xml`.
   * @throws NotFoundError when the manifest does not exist.
   */
  read(root: string): ManifestProject[] {
    const path = join(root, MANIFEST_RELATIVE_PATH)
    if (!existsSync(path)) {
      throw new NotFoundError(`manifest not found: ${path}`)
    }
    const projects = parseManifest(readFileSync(path, "utf-8"), root)
    log("%s: %d projects", path, projects.length)
    return projects
  }
}
