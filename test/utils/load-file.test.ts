import { promises as fs } from "fs"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { FileLoadError } from "@/src/utils/errors"
import { loadMarkdownFile } from "@/src/utils/load-file"

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "mp-load-"))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe("loadMarkdownFile", () => {
  it("reads the file with normalised line endings", async () => {
    const file = path.join(dir, "doc.md")
    await fs.writeFile(file, "# Title\r\n\r\nBody\r\n")
    expect(await loadMarkdownFile(file)).toBe("# Title\n\nBody\n")
  })

  it("rejects a missing file", async () => {
    const file = path.join(dir, "missing.md")
    await expect(loadMarkdownFile(file)).rejects.toThrow(`File not found: '${file}'`)
  })

  it("rejects a directory", async () => {
    const error = await loadMarkdownFile(dir).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(FileLoadError)
    expect(error instanceof FileLoadError && error.reason).toBe("not-a-file")
  })
})
