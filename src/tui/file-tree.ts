import type { FileTreeNode } from "@/src/finder/finder"
import type { Styler } from "@/src/renderer/styling"
import { SOLARIZED } from "@/src/renderer/theme"
import type { Rect, ScreenBuffer } from "@/src/tui/screen"

export interface DisplayNode {
  path: string
  name: string
  isDir: boolean
  isExpanded: boolean
  depth: number
  hasChildren: boolean
}

const ICONS = {
  expanded: "▼ ",
  collapsed: "▶ ",
  emptyDir: "○ ",
  file: "• ",
}

/** The left-hand pane: markdown files grouped by directory, with search. */
export class FileTree {
  private root: FileTreeNode
  private nodes: DisplayNode[] = []
  private expanded = new Set<string>()
  private seen = new Set<string>()
  private selected = 0
  private scroll = 0
  private query = ""
  private searching = false

  constructor(root: FileTreeNode) {
    this.root = root
    this.setTree(root)
  }

  /** Swaps in a freshly scanned tree. Directories keep their expanded state; new ones open. */
  setTree(root: FileTreeNode): void {
    const selectedPath = this.selectedNode()?.path
    this.root = root
    forEachDir(root, (dir) => {
      if (!this.seen.has(dir.path)) {
        this.seen.add(dir.path)
        this.expanded.add(dir.path)
      }
    })
    this.rebuild()
    if (selectedPath !== undefined) this.selectPath(selectedPath)
  }

  get searchQuery(): string {
    return this.query
  }

  get isSearching(): boolean {
    return this.searching
  }

  get selectedIndex(): number {
    return this.selected
  }

  /** The nodes currently listed, after the search filter. */
  visibleNodes(): DisplayNode[] {
    if (!this.query) return this.nodes
    const needle = this.query.toLowerCase()
    return this.nodes.filter(
      (node) => node.name.toLowerCase().includes(needle) || node.path.toLowerCase().includes(needle)
    )
  }

  selectedNode(): DisplayNode | undefined {
    return this.visibleNodes()[this.selected]
  }

  /** Relative path of the selected file, if a file is selected. */
  selectedFile(): string | undefined {
    const node = this.selectedNode()
    return node && !node.isDir ? node.path : undefined
  }

  selectPath(target: string): boolean {
    const index = this.visibleNodes().findIndex((node) => node.path === target)
    if (index < 0) return false
    this.selected = index
    return true
  }

  /** Selects the first file in the list, if any. */
  selectFirstFile(): boolean {
    const index = this.visibleNodes().findIndex((node) => !node.isDir)
    if (index < 0) return false
    this.selected = index
    return true
  }

  moveDown(): void {
    const count = this.visibleNodes().length
    if (count === 0) return
    this.selected = (this.selected + 1) % count
  }

  moveUp(): void {
    const count = this.visibleNodes().length
    if (count === 0) return
    this.selected = (this.selected - 1 + count) % count
  }

  /** Expands or collapses the selected directory; false when a file is selected. */
  toggleSelected(): boolean {
    const node = this.selectedNode()
    if (!node || !node.isDir) return false
    if (this.expanded.has(node.path)) this.expanded.delete(node.path)
    else this.expanded.add(node.path)
    this.rebuild()
    this.selectPath(node.path)
    return true
  }

  // --- Search ---

  startSearch(): void {
    this.searching = true
    this.query = ""
    this.selected = 0
  }

  /** Leaves search mode and keeps the current filter. */
  confirmSearch(): void {
    this.searching = false
  }

  cancelSearch(): void {
    const selectedPath = this.selectedNode()?.path
    this.searching = false
    this.query = ""
    this.selected = 0
    if (selectedPath !== undefined) this.selectPath(selectedPath)
  }

  addSearchChar(char: string): void {
    this.query += char
    this.selected = 0
  }

  removeSearchChar(): void {
    this.query = [...this.query].slice(0, -1).join("")
    this.selected = 0
  }

  // --- Drawing ---

  title(): string {
    return this.query || this.searching ? `Files [Search: ${this.query}]` : "Files"
  }

  render(buffer: ScreenBuffer, rect: Rect, focused: boolean, styler: Styler): void {
    const theme = styler.theme
    const border = focused ? theme.focusBorderStyle() : theme.inactiveBorderStyle()
    const inner = buffer.box(rect, {
      title: this.title(),
      paint: (text) => styler.paint(text, border),
    })

    const nodes = this.visibleNodes()
    this.keepSelectionVisible(inner.height)
    const needle = this.query.toLowerCase()

    nodes.slice(this.scroll, this.scroll + inner.height).forEach((node, index) => {
      const label = "  ".repeat(node.depth) + iconFor(node) + node.name
      let line: string
      if (this.scroll + index === this.selected) {
        line = styler.background(label, { r: 0, g: 0, b: 0 }, SOLARIZED.blue, true)
      } else if (needle && node.name.toLowerCase().includes(needle)) {
        line = styler.paint(label, { color: SOLARIZED.yellow, bold: true })
      } else {
        line = styler.paint(label, theme.textStyle())
      }
      buffer.put(inner.x, inner.y + index, line, inner.width)
    })
  }

  private keepSelectionVisible(height: number): void {
    if (height <= 0) return
    if (this.selected < this.scroll) this.scroll = this.selected
    if (this.selected >= this.scroll + height) this.scroll = this.selected - height + 1
    this.scroll = Math.max(0, Math.min(this.scroll, Math.max(0, this.visibleNodes().length - height)))
  }

  private rebuild(): void {
    const nodes: DisplayNode[] = []
    const visit = (node: FileTreeNode, depth: number) => {
      const isExpanded = node.isDir && this.expanded.has(node.path)
      nodes.push({
        path: node.path,
        name: node.name,
        isDir: node.isDir,
        isExpanded,
        depth,
        hasChildren: node.children.length > 0,
      })
      if (isExpanded) node.children.forEach((child) => visit(child, depth + 1))
    }
    visit(this.root, 0)
    this.nodes = nodes
    this.selected = Math.min(this.selected, Math.max(0, this.visibleNodes().length - 1))
  }
}

export function iconFor(node: DisplayNode): string {
  if (!node.isDir) return ICONS.file
  if (!node.hasChildren) return ICONS.emptyDir
  return node.isExpanded ? ICONS.expanded : ICONS.collapsed
}

function forEachDir(node: FileTreeNode, visit: (dir: FileTreeNode) => void): void {
  if (!node.isDir) return
  visit(node)
  node.children.forEach((child) => forEachDir(child, visit))
}
