import { promises as fs } from "fs"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

import {
  buildMarkdownTree,
  comparePaths,
  findMarkdownFiles,
  treeFromPaths,
  type FinderOptions,
} from "@/src/finder/finder"

// Keep the developer's own ignore files out of the results.
const ISOLATED: FinderOptions = { noGlobalIgnoreFile: true, noIgnoreParent: true }

let tmp: string
let root: string

async function write(relative: string, content = ""): Promise<void> {
  const file = path.join(root, relative)
  await fs.mkdir(path.dirname(file), { recursive: true })
  await fs.writeFile(file, content)
}

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "mp-finder-"))
  root = path.join(tmp, "project")
  await write("README.md", "# Readme")
  await write("test.md", "# Test")
  await write("test.txt", "not markdown")
  await write(".hidden.md", "# Hidden")
  await write("subdir/sub.md", "# Sub")
})

afterEach(async () => {
  vi.unstubAllEnvs()
  await fs.rm(tmp, { recursive: true, force: true })
})

describe("findMarkdownFiles", () => {
  it("finds visible markdown files in sorted order", async () => {
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md", "subdir/sub.md", "test.md"])
  })

  it("includes hidden files on request", async () => {
    expect(await findMarkdownFiles(root, { ...ISOLATED, hidden: true })).toEqual([
      ".hidden.md",
      "README.md",
      "subdir/sub.md",
      "test.md",
    ])
  })

  it("never descends into .git", async () => {
    await write(".git/notes.md")
    expect(await findMarkdownFiles(root, { ...ISOLATED, hidden: true })).not.toContain(".git/notes.md")
  })

  it("respects .gitignore, .ignore and .mpignore", async () => {
    await write(".gitignore", "subdir/\n")
    await write(".mpignore", "test.md\n")
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md"])
  })

  it("applies nested ignore files relative to their directory", async () => {
    await write("subdir/.ignore", "sub.md\n")
    await write("subdir/keep.md")
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md", "subdir/keep.md", "test.md"])
  })

  it("honours negated patterns", async () => {
    await write(".gitignore", "*.md\n!README.md\n")
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md"])
  })

  it("reads .git/info/exclude", async () => {
    await write(".git/info/exclude", "test.md\n")
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md", "subdir/sub.md"])
  })

  it("skips every ignore file with noIgnore", async () => {
    await write(".gitignore", "*.md\n")
    expect(await findMarkdownFiles(root, { ...ISOLATED, noIgnore: true })).toEqual([
      "README.md",
      "subdir/sub.md",
      "test.md",
    ])
  })

  it("reads ignore files above the root unless told not to", async () => {
    await fs.writeFile(path.join(tmp, ".gitignore"), "sub.md\n")
    expect(await findMarkdownFiles(root, { noGlobalIgnoreFile: true })).toEqual(["README.md", "test.md"])
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md", "subdir/sub.md", "test.md"])
  })

  it("reads the global git ignore file", async () => {
    const config = path.join(tmp, "config")
    await fs.mkdir(path.join(config, "git"), { recursive: true })
    await fs.writeFile(path.join(config, "git", "ignore"), "README.md\n")
    vi.stubEnv("XDG_CONFIG_HOME", config)

    expect(await findMarkdownFiles(root, { noIgnoreParent: true })).toEqual(["subdir/sub.md", "test.md"])
    expect(await findMarkdownFiles(root, ISOLATED)).toEqual(["README.md", "subdir/sub.md", "test.md"])
  })
})

describe("buildMarkdownTree", () => {
  it("groups files under their directories", async () => {
    const tree = await buildMarkdownTree(root, ISOLATED)
    expect(tree.name).toBe("Current Directory")
    expect(tree.children.map((child) => child.path)).toEqual(["subdir", "README.md", "test.md"])
    expect(tree.children[0].children.map((child) => child.name)).toEqual(["sub.md"])
  })
})

describe("treeFromPaths", () => {
  it("puts directories before files at every level", () => {
    const tree = treeFromPaths(["a.md", "b/c.md", "b/a/d.md"])
    expect(tree.children.map((child) => child.name)).toEqual(["b", "a.md"])
    expect(tree.children[0].children.map((child) => child.name)).toEqual(["a", "c.md"])
  })
})

describe("comparePaths", () => {
  it("orders by path component", () => {
    expect(["a-b.md", "a/b.md"].sort(comparePaths)).toEqual(["a/b.md", "a-b.md"])
    expect(comparePaths("a.md", "a.md")).toBe(0)
  })
})
