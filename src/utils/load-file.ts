import { promises as fs } from "fs"

import { normalizeLineEndings } from "@/src/renderer/parser"
import { FileLoadError } from "@/src/utils/errors"

/** Reads a markdown file as UTF-8 with normalised line endings. */
export async function loadMarkdownFile(filePath: string): Promise<string> {
  const stats = await fs.stat(filePath).catch((error: unknown) => {
    throw new FileLoadError(filePath, isMissing(error) ? "not-found" : "unreadable", { cause: error })
  })

  if (!stats.isFile()) {
    throw new FileLoadError(filePath, "not-a-file")
  }

  try {
    return normalizeLineEndings(await fs.readFile(filePath, "utf8"))
  } catch (error) {
    throw new FileLoadError(filePath, "unreadable", { cause: error })
  }
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  )
}
