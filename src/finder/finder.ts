import { promises as fs } from "fs"
import os from "os"
import path from "path"
import fg from "fast-glob"
import ignore, { type Ignore } from "ignore"
import { z } from "zod"

import { debug } from "@/src/observability/debug"

// --- Markdown file discovery ---

export const finderOptionsSchema = z.object({
  /** Include dot-files and dot-directories. */
  hidden: z.boolean().default(false),
  /** Skip every ignore file. */
  noIgnore: z.boolean().default(false),
  /** Skip ignore files in the directories above the root. */
  noIgnoreParent: z.boolean().default(false),
  /** Skip the user's global git excludes file. */
  noGlobalIgnoreFile: z.boolean().default(false),
})

export type FinderOptions = z.input<typeof finderOptionsSchema>

export const IGNORE_FILE_NAMES = [".gitignore", ".ignore", ".mpignore"]

export interface FileTreeNode {
  /** Path relative to the search root, `/`-separated; "." for the root. */
  path: string
  name: string
  isDir: boolean
  children: FileTreeNode[]
}

interface IgnoreScope {
  /** Absolute directory the patterns are relative to. */
  dir: string
  matcher: Ignore
}

/** Markdown files under `root`, as sorted `/`-separated relative paths. */
export async function findMarkdownFiles(root = ".", options: FinderOptions = {}): Promise<string[]> {
  const opts = finderOptionsSchema.parse(options)
  const base = path.resolve(root)

  const entries = await fg("**/*.md", {
    cwd: base,
    dot: opts.hidden,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ["**/.git/**"],
  })

  const scopes = opts.noIgnore ? [] : await loadIgnoreScopes(base, opts)
  const files = entries.filter((entry) => !isIgnored(path.join(base, entry), scopes))
  debug.context("finder", `${files.length} of ${entries.length} markdown files kept`)

  return files.sort(comparePaths)
}

/** Groups the markdown files into a directory tree rooted at "Current Directory". */
export async function buildMarkdownTree(root = ".", options: FinderOptions = {}): Promise<FileTreeNode> {
  return treeFromPaths(await findMarkdownFiles(root, options))
}

export function treeFromPaths(files: string[]): FileTreeNode {
  const rootNode: FileTreeNode = { path: ".", name: "Current Directory", isDir: true, children: [] }
  const dirs = new Map<string, FileTreeNode>([[".", rootNode]])

  const dirNode = (dirPath: string): FileTreeNode => {
    const existing = dirs.get(dirPath)
    if (existing) return existing
    const parentPath = path.posix.dirname(dirPath)
    const node: FileTreeNode = {
      path: dirPath,
      name: path.posix.basename(dirPath),
      isDir: true,
      children: [],
    }
    dirNode(parentPath).children.push(node)
    dirs.set(dirPath, node)
    return node
  }

  for (const file of files) {
    dirNode(path.posix.dirname(file)).children.push({
      path: file,
      name: path.posix.basename(file),
      isDir: false,
      children: [],
    })
  }

  sortTree(rootNode)
  return rootNode
}

function sortTree(node: FileTreeNode): void {
  node.children.sort((a, b) => {
    if (a.isDir !== b.isDir) return a.isDir ? -1 : 1
    return compareNames(a.name, b.name)
  })
  node.children.forEach(sortTree)
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/** Orders by path component, so `a/b.md` sorts before `a-b.md`. */
export function comparePaths(a: string, b: string): number {
  const left = a.split("/")
  const right = b.split("/")
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const order = compareNames(left[i], right[i])
    if (order !== 0) return order
  }
  return left.length - right.length
}

// --- Ignore rules ---

async function loadIgnoreScopes(
  base: string,
  opts: z.infer<typeof finderOptionsSchema>
): Promise<IgnoreScope[]> {
  const scopes: IgnoreScope[] = []
  const push = (scope: IgnoreScope | undefined) => {
    if (scope) scopes.push(scope)
  }

  if (!opts.noGlobalIgnoreFile) {
    push(await loadScope(base, [globalIgnoreFile()]))
  }
  push(await loadScope(base, [path.join(base, ".git", "info", "exclude")]))

  if (!opts.noIgnoreParent) {
    for (const dir of parentDirectories(base)) {
      push(await loadScope(dir, IGNORE_FILE_NAMES.map((name) => path.join(dir, name))))
    }
  }

  const nested = await fg(`**/{${IGNORE_FILE_NAMES.join(",")}}`, {
    cwd: base,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ["**/.git/**"],
  })
  const nestedDirs = [...new Set(nested.map((file) => path.posix.dirname(file)))].sort(
    (a, b) => depth(a) - depth(b) || comparePaths(a, b)
  )
  for (const dir of nestedDirs) {
    const absolute = path.join(base, dir)
    push(await loadScope(absolute, IGNORE_FILE_NAMES.map((name) => path.join(absolute, name))))
  }

  return scopes
}

async function loadScope(dir: string, files: string[]): Promise<IgnoreScope | undefined> {
  const matcher = ignore()
  let loaded = false
  for (const file of files) {
    const content = await readIgnoreFile(file)
    if (content === undefined) continue
    matcher.add(content)
    loaded = true
  }
  return loaded ? { dir, matcher } : undefined
}

async function readIgnoreFile(file: string): Promise<string | undefined> {
  try {
    return await fs.readFile(file, "utf8")
  } catch (error) {
    if (!isMissing(error)) {
      debug.log(`Skipping unreadable ignore file ${file}`, error)
    }
    return undefined
  }
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false
  return error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "EISDIR"
}

/** Later (deeper) scopes override earlier ones; an ignored directory hides everything in it. */
function isIgnored(file: string, scopes: IgnoreScope[]): boolean {
  let ignored = false
  for (const scope of scopes) {
    const relative = path.relative(scope.dir, file)
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) continue
    const result = scope.matcher.test(relative.split(path.sep).join("/"))
    if (result.ignored) ignored = true
    else if (result.unignored) ignored = false
  }
  return ignored
}

/** Ancestors of `dir`, outermost first. */
function parentDirectories(dir: string): string[] {
  const dirs: string[] = []
  let child = dir
  let parent = path.dirname(dir)
  while (parent !== child) {
    dirs.unshift(parent)
    child = parent
    parent = path.dirname(parent)
  }
  return dirs
}

function globalIgnoreFile(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config")
  return path.join(configHome, "git", "ignore")
}

function depth(dir: string): number {
  return dir === "." ? 0 : dir.split("/").length
}
