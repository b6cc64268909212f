import type { Styler } from "@/src/renderer/styling"
import { SOLARIZED, type Rgb } from "@/src/renderer/theme"
import type { ScreenBuffer } from "@/src/tui/screen"
import { displayWidth, truncateToWidth } from "@/src/utils/display-width"

export type StatusMode = "normal" | "search" | "help"

const HINTS: Record<StatusMode, string> = {
  normal: "Tab: Switch | q: Quit | /: Search | ?: Help",
  search: "Enter: Confirm | Esc: Cancel | Type to search",
  help: "Press any key to exit help",
}

const BLACK: Rgb = { r: 0, g: 0, b: 0 }

/** Bottom line: mode badge, the current file or a message, and key hints. */
export class StatusBar {
  mode: StatusMode = "normal"
  private file: string | undefined
  private message: string | undefined
  private error: string | undefined
  private query = ""

  get currentFile(): string | undefined {
    return this.file
  }

  get hasError(): boolean {
    return this.error !== undefined
  }

  setMode(mode: StatusMode): void {
    this.mode = mode
  }

  setFile(file: string | undefined): void {
    this.file = file
    this.clearMessage()
  }

  setMessage(message: string): void {
    this.message = message
    this.error = undefined
  }

  setError(error: string): void {
    this.error = error
    this.message = undefined
  }

  clearMessage(): void {
    this.message = undefined
    this.error = undefined
  }

  setSearchQuery(query: string): void {
    this.query = query
  }

  badge(): string {
    return ` ${this.mode.toUpperCase()} `
  }

  hint(): string {
    return HINTS[this.mode]
  }

  /** The text after the badge, without styling. */
  text(): string {
    if (this.error) return `Error: ${this.error}`
    if (this.message) return this.message
    if (this.mode === "search") return `Search: ${this.query}`
    return this.file ?? "No file selected"
  }

  render(buffer: ScreenBuffer, y: number, width: number, styler: Styler): void {
    const colors = styler.theme.statusColors()
    const badgeColor =
      this.mode === "search" ? colors.search : this.mode === "help" ? colors.help : colors.normal
    const badge = this.badge()
    const hint = this.hint()

    let textStyle = styler.theme.textStyle()
    if (this.error) textStyle = { color: colors.error, bold: true }
    else if (this.message) textStyle = { color: colors.message, italic: true }
    else if (this.mode === "search") textStyle = { color: colors.search, bold: true }

    const used = displayWidth(badge) + 1
    const hintWidth = displayWidth(hint)
    const room = width - used - hintWidth - 1
    // Hints give way when the text would not fit beside them.
    const showHint = room >= displayWidth(this.text())
    const text = truncateToWidth(this.text(), showHint ? room : width - used).text

    buffer.put(0, y, styler.background(badge, BLACK, badgeColor, true), displayWidth(badge))
    buffer.put(used, y, styler.paint(text, textStyle), displayWidth(text))
    if (showHint) {
      buffer.put(width - hintWidth, y, styler.paint(hint, { color: SOLARIZED.base01 }), hintWidth)
    }
  }
}
