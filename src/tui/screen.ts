import { fitToWidth, truncateToWidth } from "@/src/utils/display-width"

// --- Screen buffer ---

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

interface Segment {
  x: number
  width: number
  text: string
}

/**
 * One frame of the terminal, kept as positioned runs of styled text per row.
 * Every run is cut or padded to its declared width when it is placed.
 */
export class ScreenBuffer {
  private rows: Segment[][]

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.rows = Array.from({ length: Math.max(0, height) }, () => [])
  }

  put(x: number, y: number, text: string, width: number = this.width - x): void {
    if (y < 0 || y >= this.height || x < 0 || x >= this.width) return
    const w = Math.min(width, this.width - x)
    if (w <= 0) return
    this.rows[y].push({ x, width: w, text: fitToWidth(text, w) })
  }

  /** Draws a bordered block and returns the rectangle inside the border. */
  box(
    rect: Rect,
    options: { title?: string; footer?: string; paint?: (text: string) => string } = {}
  ): Rect {
    const paint = options.paint ?? ((text: string) => text)
    const { x, y, width, height } = rect
    if (width < 2 || height < 2) return { x, y, width: 0, height: 0 }

    const edge = (left: string, label: string | undefined, right: string): string => {
      const inner = truncateToWidth(label ?? "", width - 2)
      const fill = "─".repeat(Math.max(0, width - 2 - inner.width))
      return paint(left) + paint(inner.text) + paint(fill + right)
    }

    this.put(x, y, edge("┌", options.title, "┐"), width)
    for (let row = y + 1; row < y + height - 1; row++) {
      this.put(x, row, paint("│"), 1)
      this.put(x + width - 1, row, paint("│"), 1)
    }
    this.put(x, y + height - 1, edge("└", options.footer, "┘"), width)

    return { x: x + 1, y: y + 1, width: width - 2, height: height - 2 }
  }

  line(y: number): string {
    const segments = [...(this.rows[y] ?? [])].sort((a, b) => a.x - b.x)
    let out = ""
    let column = 0
    for (const segment of segments) {
      // Overlapping runs: the one further left wins.
      if (segment.x < column) continue
      out += " ".repeat(segment.x - column) + segment.text
      column = segment.x + segment.width
    }
    return out + " ".repeat(Math.max(0, this.width - column))
  }

  lines(): string[] {
    return Array.from({ length: this.height }, (_, y) => this.line(y))
  }
}

// --- Frame writer ---

export interface TerminalOutput {
  readonly columns: number
  readonly rows: number
  write(data: string): void
}

/** Writes frames to the terminal, rewriting only the rows that changed. */
export class Screen {
  private previous: string[] = []
  private clearPending = true

  constructor(private out: TerminalOutput) {}

  /** Forget the last frame; the next draw repaints everything. */
  invalidate(): void {
    this.previous = []
    this.clearPending = true
  }

  draw(buffer: ScreenBuffer): number {
    const lines = buffer.lines()
    let output = ""
    if (this.clearPending) {
      output += "\x1b[H\x1b[2J"
      this.clearPending = false
    }

    let changed = 0
    lines.forEach((line, y) => {
      if (this.previous[y] === line) return
      output += `\x1b[${y + 1};1H${line}\x1b[0m`
      changed++
    })

    if (output) this.out.write(output)
    this.previous = lines
    return changed
  }
}
