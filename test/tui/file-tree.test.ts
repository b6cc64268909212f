import { describe, expect, it } from "vitest"

import { treeFromPaths } from "@/src/finder/finder"
import { createChalk, Styler } from "@/src/renderer/styling"
import { defaultTheme } from "@/src/renderer/theme"
import { FileTree, iconFor } from "@/src/tui/file-tree"
import { ScreenBuffer } from "@/src/tui/screen"

function sampleTree(): FileTree {
  return new FileTree(treeFromPaths(["README.md", "docs/api/ref.md", "docs/guide.md", "zeta.md"]))
}

function paths(tree: FileTree): string[] {
  return tree.visibleNodes().map((node) => node.path)
}

describe("FileTree", () => {
  it("lists directories first with everything expanded", () => {
    const tree = sampleTree()
    expect(paths(tree)).toEqual([
      ".",
      "docs",
      "docs/api",
      "docs/api/ref.md",
      "docs/guide.md",
      "README.md",
      "zeta.md",
    ])
    expect(tree.visibleNodes().map((node) => node.depth)).toEqual([0, 1, 2, 3, 2, 1, 1])
  })

  it("selects the first file", () => {
    const tree = sampleTree()
    expect(tree.selectedFile()).toBeUndefined()
    tree.selectFirstFile()
    expect(tree.selectedFile()).toBe("docs/api/ref.md")
  })

  it("wraps selection at both ends", () => {
    const tree = sampleTree()
    tree.moveUp()
    expect(tree.selectedFile()).toBe("zeta.md")
    tree.moveDown()
    expect(tree.selectedIndex).toBe(0)
  })

  it("collapses and expands directories", () => {
    const tree = sampleTree()
    tree.selectPath("docs")
    expect(tree.toggleSelected()).toBe(true)
    expect(paths(tree)).toEqual([".", "docs", "README.md", "zeta.md"])
    expect(tree.selectedNode()?.path).toBe("docs")
    const docs = tree.selectedNode()
    expect(docs && iconFor(docs)).toBe("▶ ")

    tree.toggleSelected()
    expect(paths(tree)).toHaveLength(7)
  })

  it("does not toggle files", () => {
    const tree = sampleTree()
    tree.selectPath("zeta.md")
    expect(tree.toggleSelected()).toBe(false)
  })

  it("keeps expanded state across rescans", () => {
    const tree = sampleTree()
    tree.selectPath("docs")
    tree.toggleSelected()
    tree.setTree(treeFromPaths(["README.md", "docs/guide.md", "new/file.md"]))
    expect(paths(tree)).toEqual([".", "docs", "new", "new/file.md", "README.md"])
    expect(tree.selectedNode()?.path).toBe("docs")
  })

  it("filters by name or path, ignoring case", () => {
    const tree = sampleTree()
    tree.startSearch()
    for (const char of "ZET") tree.addSearchChar(char)
    expect(paths(tree)).toEqual(["zeta.md"])
    expect(tree.title()).toBe("Files [Search: ZET]")
    expect(tree.selectedFile()).toBe("zeta.md")

    tree.removeSearchChar()
    tree.removeSearchChar()
    tree.removeSearchChar()
    for (const char of "api/") tree.addSearchChar(char)
    expect(paths(tree)).toEqual(["docs/api/ref.md"])
  })

  it("restores the full list on cancel and keeps the selection", () => {
    const tree = sampleTree()
    tree.startSearch()
    tree.addSearchChar("z")
    tree.cancelSearch()
    expect(tree.isSearching).toBe(false)
    expect(tree.title()).toBe("Files")
    expect(tree.selectedFile()).toBe("zeta.md")
    expect(tree.selectedIndex).toBe(6)
  })

  it("keeps a confirmed filter", () => {
    const tree = sampleTree()
    tree.startSearch()
    tree.addSearchChar("readme")
    tree.confirmSearch()
    expect(tree.isSearching).toBe(false)
    expect(paths(tree)).toEqual(["README.md"])
  })

  it("draws icons and indentation inside a box", () => {
    const tree = sampleTree()
    const buffer = new ScreenBuffer(20, 5)
    tree.render(buffer, { x: 0, y: 0, width: 20, height: 5 }, true, new Styler(defaultTheme, createChalk(0)))
    expect(buffer.lines()).toEqual([
      "┌Files─────────────┐",
      "│▼ Current Director│",
      "│  ▼ docs          │",
      "│    ▼ api         │",
      "└──────────────────┘",
    ])
  })

  it("scrolls to keep the selection visible", () => {
    const tree = sampleTree()
    tree.selectPath("zeta.md")
    const buffer = new ScreenBuffer(20, 4)
    tree.render(buffer, { x: 0, y: 0, width: 20, height: 4 }, false, new Styler(defaultTheme, createChalk(0)))
    expect(buffer.line(1)).toBe("│  • README.md     │")
    expect(buffer.line(2)).toBe("│  • zeta.md       │")
  })
})
