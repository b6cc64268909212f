import path from "path"
import type { ChalkInstance } from "chalk"

import { buildMarkdownTree, type FileTreeNode, type FinderOptions } from "@/src/finder/finder"
import { debug, holdDebugOutput, releaseDebugOutput } from "@/src/observability/debug"
import { Styler, createChalk } from "@/src/renderer/styling"
import { defaultTheme, type MarkdownTheme } from "@/src/renderer/theme"
import { FileTree } from "@/src/tui/file-tree"
import { isPrintable, type Key } from "@/src/tui/keys"
import { PreviewPane } from "@/src/tui/preview"
import { Screen, ScreenBuffer, type Rect } from "@/src/tui/screen"
import { StatusBar } from "@/src/tui/status-bar"
import type { TerminalSession } from "@/src/tui/terminal"
import { loadMarkdownFile } from "@/src/utils/load-file"

export type Focus = "fileTree" | "preview"

export interface AppOptions {
  /** Directory to scan; defaults to the working directory. */
  root?: string
  finder?: FinderOptions
  theme?: MarkdownTheme
  chalk?: ChalkInstance
  columns?: number
  rows?: number
  loadFile?: (filePath: string) => Promise<string>
  scan?: (root: string, options: FinderOptions) => Promise<FileTreeNode>
}

export interface Layout {
  tree: Rect
  preview: Rect
  statusY: number
}

export const HELP_LINES = [
  "File tree",
  "  j / Down        Next file",
  "  k / Up          Previous file",
  "  Enter / Space   Open directory or focus preview",
  "  r               Rescan files",
  "",
  "Preview",
  "  j / Down        Scroll down",
  "  k / Up          Scroll up",
  "  PageDown        Scroll down 10 lines",
  "  PageUp          Scroll up 10 lines",
  "  g / Home        Top",
  "  G / End         Bottom",
  "",
  "Anywhere",
  "  Tab             Switch pane",
  "  /               Search files",
  "  ?               This help",
  "  q / Esc         Quit",
]

/** Two-pane previewer: file tree on the left, rendered markdown on the right. */
export class App {
  focus: Focus = "fileTree"
  shouldQuit = false
  readonly tree: FileTree
  readonly preview: PreviewPane
  readonly status = new StatusBar()

  private root: string
  private finder: FinderOptions
  private styler: Styler
  private loadFile: (filePath: string) => Promise<string>
  private scan: (root: string, options: FinderOptions) => Promise<FileTreeNode>
  private columns: number
  private rows: number
  private loadedPath: string | undefined

  constructor(tree: FileTreeNode, options: AppOptions = {}) {
    this.root = path.resolve(options.root ?? ".")
    this.finder = options.finder ?? {}
    this.tree = new FileTree(tree)
    this.styler = new Styler(options.theme ?? defaultTheme, options.chalk ?? createChalk())
    this.preview = new PreviewPane({ theme: options.theme, chalk: options.chalk })
    this.loadFile = options.loadFile ?? loadMarkdownFile
    this.scan = options.scan ?? buildMarkdownTree
    this.columns = options.columns ?? 80
    this.rows = options.rows ?? 24
  }

  /** Scans the root and opens the first markdown file. */
  static async create(options: AppOptions = {}): Promise<App> {
    const scan = options.scan ?? buildMarkdownTree
    const tree = await scan(path.resolve(options.root ?? "."), options.finder ?? {})
    const app = new App(tree, options)
    await app.openFirstFile()
    return app
  }

  get loadedFile(): string | undefined {
    return this.loadedPath
  }

  async openFirstFile(): Promise<void> {
    if (this.tree.selectFirstFile()) {
      await this.loadSelected()
    } else {
      this.status.setMessage("No markdown files found")
    }
  }

  // --- Input ---

  async handleKey(key: Key): Promise<void> {
    if (key.ctrl && key.name === "c") {
      this.shouldQuit = true
      return
    }

    if (this.status.mode === "help") {
      this.status.setMode("normal")
      return
    }

    if (this.tree.isSearching) {
      await this.handleSearchKey(key)
      return
    }

    switch (key.name) {
      case "q":
        this.shouldQuit = true
        return
      case "escape":
        // A confirmed filter is cleared before Esc quits.
        if (this.tree.searchQuery) {
          this.tree.cancelSearch()
          this.status.setSearchQuery("")
        } else {
          this.shouldQuit = true
        }
        return
      case "tab":
        this.focus = this.focus === "fileTree" ? "preview" : "fileTree"
        return
      case "?":
        this.status.setMode("help")
        return
      case "/":
        this.focus = "fileTree"
        this.tree.startSearch()
        this.status.setMode("search")
        this.status.setSearchQuery("")
        return
    }

    if (this.focus === "fileTree") {
      await this.handleTreeKey(key)
    } else {
      this.handlePreviewKey(key)
    }
  }

  private async handleSearchKey(key: Key): Promise<void> {
    switch (key.name) {
      case "escape":
        this.tree.cancelSearch()
        this.status.setMode("normal")
        break
      case "return":
        this.tree.confirmSearch()
        this.status.setMode("normal")
        await this.loadSelected()
        break
      case "backspace":
        this.tree.removeSearchChar()
        break
      case "down":
        this.tree.moveDown()
        break
      case "up":
        this.tree.moveUp()
        break
      default:
        if (isPrintable(key)) this.tree.addSearchChar(key.name)
    }
    this.status.setSearchQuery(this.tree.searchQuery)
  }

  private async handleTreeKey(key: Key): Promise<void> {
    switch (key.name) {
      case "j":
      case "down":
        this.tree.moveDown()
        await this.loadSelected()
        break
      case "k":
      case "up":
        this.tree.moveUp()
        await this.loadSelected()
        break
      case "return":
      case " ":
        if (!this.tree.toggleSelected() && this.tree.selectedFile()) {
          await this.loadSelected()
          this.focus = "preview"
        }
        break
      case "r":
        await this.reload()
        break
    }
  }

  private handlePreviewKey(key: Key): void {
    const viewport = this.preview.viewport
    switch (key.name) {
      case "j":
      case "down":
        viewport.scrollDown()
        break
      case "k":
      case "up":
        viewport.scrollUp()
        break
      case "pagedown":
        viewport.pageDown()
        break
      case "pageup":
        viewport.pageUp()
        break
      case "g":
      case "home":
        viewport.scrollToTop()
        break
      case "G":
      case "end":
        viewport.scrollToBottom()
        break
    }
  }

  // --- Files ---

  async reload(): Promise<void> {
    try {
      this.tree.setTree(await this.scan(this.root, this.finder))
    } catch (error) {
      this.status.setError(errorMessage(error))
      return
    }
    this.loadedPath = undefined
    if (this.tree.selectedFile() === undefined) this.tree.selectFirstFile()
    await this.loadSelected()
    if (!this.status.hasError) this.status.setMessage("Files reloaded")
  }

  private async loadSelected(): Promise<void> {
    const file = this.tree.selectedFile()
    if (file === undefined || file === this.loadedPath) return
    try {
      const content = await this.loadFile(path.join(this.root, file))
      this.preview.setContent(content, this.previewWidth())
      this.loadedPath = file
      this.status.setFile(file)
      debug.context("tui", `loaded ${file}`)
    } catch (error) {
      this.status.setError(errorMessage(error))
    }
  }

  // --- Drawing ---

  layout(columns = this.columns, rows = this.rows): Layout {
    const mainHeight = Math.max(0, rows - 1)
    const treeWidth = Math.floor(columns * 0.3)
    return {
      tree: { x: 0, y: 0, width: treeWidth, height: mainHeight },
      preview: { x: treeWidth, y: 0, width: columns - treeWidth, height: mainHeight },
      statusY: rows - 1,
    }
  }

  draw(columns = this.columns, rows = this.rows): ScreenBuffer {
    this.columns = columns
    this.rows = rows
    const buffer = new ScreenBuffer(columns, rows)
    const layout = this.layout()

    this.tree.render(buffer, layout.tree, this.focus === "fileTree", this.styler)
    if (this.status.mode === "help") {
      this.renderHelp(buffer, layout.preview)
    } else {
      this.preview.render(buffer, layout.preview, this.focus === "preview", this.styler)
    }
    this.status.render(buffer, layout.statusY, columns, this.styler)
    return buffer
  }

  private renderHelp(buffer: ScreenBuffer, rect: Rect): void {
    const theme = this.styler.theme
    const inner = buffer.box(rect, {
      title: "Help",
      paint: (text) => this.styler.paint(text, theme.focusBorderStyle()),
    })
    HELP_LINES.slice(0, inner.height).forEach((line, index) => {
      const style = line.startsWith(" ") ? theme.textStyle() : theme.headingStyle(2)
      buffer.put(inner.x, inner.y + index, this.styler.paint(line, style), inner.width)
    })
  }

  private previewWidth(): number {
    return Math.max(1, this.layout().preview.width - 2)
  }

  // --- Event loop ---

  /** Owns the terminal until the user quits. */
  async run(session: TerminalSession): Promise<void> {
    const screen = new Screen(session)
    holdDebugOutput()
    session.start()
    try {
      screen.draw(this.draw(session.columns, session.rows))
      for await (const event of session.events) {
        if (event.type === "resize") {
          screen.invalidate()
        } else {
          await this.handleKey(event.key)
        }
        if (this.shouldQuit) break
        screen.draw(this.draw(session.columns, session.rows))
      }
    } finally {
      session.stop()
      releaseDebugOutput()
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
