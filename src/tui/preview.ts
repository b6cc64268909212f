import type { ChalkInstance } from "chalk"

import type { RenderConfigInput } from "@/src/renderer/config"
import { LineBuffer } from "@/src/renderer/output"
import { MarkdownRenderer } from "@/src/renderer/renderer"
import type { Styler } from "@/src/renderer/styling"
import type { MarkdownTheme } from "@/src/renderer/theme"
import type { Rect, ScreenBuffer } from "@/src/tui/screen"
import { Viewport } from "@/src/tui/viewport"

export interface PreviewOptions {
  theme?: MarkdownTheme
  chalk?: ChalkInstance
  config?: RenderConfigInput
}

/** The right-hand pane: the selected file rendered into scrollable lines. */
export class PreviewPane {
  readonly viewport = new Viewport()
  private content = ""
  private width = 0

  constructor(private options: PreviewOptions = {}) {}

  get hasContent(): boolean {
    return this.content.length > 0
  }

  setContent(content: string, width: number): void {
    this.content = content
    this.width = width
    this.viewport.setLines(this.renderLines())
  }

  /** Re-renders at a new width, keeping the scroll position. */
  resize(width: number): void {
    if (width === this.width) return
    this.width = width
    if (this.hasContent) this.viewport.replaceLines(this.renderLines())
  }

  clear(): void {
    this.content = ""
    this.viewport.setLines([])
  }

  statusInfo(): string {
    if (!this.hasContent) return "No content"
    return `Lines: ${countLines(this.content)} | Chars: ${[...this.content].length} | Scroll: ${this.viewport.scrollOffset}`
  }

  render(buffer: ScreenBuffer, rect: Rect, focused: boolean, styler: Styler): void {
    const border = focused ? styler.theme.focusBorderStyle() : styler.theme.inactiveBorderStyle()
    const inner = buffer.box(rect, {
      title: "Preview",
      footer: this.statusInfo(),
      paint: (text) => styler.paint(text, border),
    })
    this.resize(inner.width)
    this.viewport.renderInto(buffer, inner)
  }

  private renderLines(): string[] {
    const lines = new LineBuffer()
    const renderer = new MarkdownRenderer({
      output: lines,
      theme: this.options.theme,
      chalk: this.options.chalk,
      config: {
        ...this.options.config,
        bulletMarker: "• ",
        hyperlinks: false,
        terminalWidth: Math.max(1, this.width),
      },
    })
    renderer.renderContent(this.content)
    return lines.lines()
  }
}

/** Line count as an editor shows it: a trailing newline does not start a new line. */
export function countLines(content: string): number {
  if (!content) return 0
  const lines = content.split("\n")
  return lines[lines.length - 1] === "" ? lines.length - 1 : lines.length
}
