import type { Rect, ScreenBuffer } from "@/src/tui/screen"
import { truncateToWidth } from "@/src/utils/display-width"

export const PAGE_SIZE = 10

/** Scrollable window over pre-rendered lines. */
export class Viewport {
  private lines: string[] = []
  private offset = 0

  get lineCount(): number {
    return this.lines.length
  }

  get scrollOffset(): number {
    return this.offset
  }

  /** Replaces the content and scrolls back to the top. */
  setLines(lines: string[]): void {
    this.lines = lines
    this.offset = 0
  }

  /** Replaces the content, keeping the scroll position where it still fits. */
  replaceLines(lines: string[]): void {
    this.lines = lines
    this.scrollTo(this.offset)
  }

  scrollTo(offset: number): void {
    const last = Math.max(0, this.lines.length - 1)
    this.offset = Math.min(Math.max(0, offset), last)
  }

  scrollDown(amount = 1): void {
    this.scrollTo(this.offset + amount)
  }

  scrollUp(amount = 1): void {
    this.scrollTo(this.offset - amount)
  }

  pageDown(): void {
    this.scrollDown(PAGE_SIZE)
  }

  pageUp(): void {
    this.scrollUp(PAGE_SIZE)
  }

  scrollToTop(): void {
    this.offset = 0
  }

  scrollToBottom(): void {
    this.scrollTo(this.lines.length - 1)
  }

  visibleLines(height: number, width: number): string[] {
    if (height <= 0) return []
    return this.lines
      .slice(this.offset, this.offset + height)
      .map((line) => truncateToWidth(line, width).text)
  }

  renderInto(buffer: ScreenBuffer, area: Rect): void {
    this.visibleLines(area.height, area.width).forEach((line, index) => {
      buffer.put(area.x, area.y + index, line, area.width)
    })
  }
}
