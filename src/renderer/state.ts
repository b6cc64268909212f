import { debug } from "@/src/observability/debug"
import type { Alignment } from "@/src/renderer/events"
import type { RunStyle } from "@/src/renderer/styling"

// --- Render state machine ---

export interface LinkState {
  kind: "link"
  text: string
  url: string
}

export interface ImageState {
  kind: "image"
  altText: string
  url: string
}

export interface CodeBlockState {
  kind: "codeBlock"
  language: string | null
  content: string
}

export interface TableState {
  kind: "table"
  alignments: Alignment[]
  headers: string[]
  rows: string[][]
  currentRow: string[]
  isHeader: boolean
}

/** The one complex element under construction, if any. */
export type ActiveElement = LinkState | ImageState | CodeBlockState | TableState

export type ListType = { kind: "unordered" } | { kind: "ordered"; current: number }

export interface EmphasisState {
  strong: boolean
  italic: boolean
}

export class RenderState {
  emphasis: EmphasisState = { strong: false, italic: false }
  activeElement: ActiveElement | null = null
  listStack: ListType[] = []
  headingLevel: number | null = null

  reset(): void {
    this.emphasis = { strong: false, italic: false }
    this.activeElement = null
    this.listStack = []
    this.headingLevel = null
  }

  // Starting a complex element replaces whatever was active.
  private activate(element: ActiveElement): void {
    if (this.activeElement) {
      debug.context(
        "render",
        `${element.kind} started while ${this.activeElement.kind} was active; discarding ${this.activeElement.kind}`
      )
    }
    this.activeElement = element
  }

  setLink(url: string): void {
    this.activate({ kind: "link", text: "", url })
  }

  setImage(url: string): void {
    this.activate({ kind: "image", altText: "", url })
  }

  setCodeBlock(language: string | null): void {
    this.activate({ kind: "codeBlock", language: language || null, content: "" })
  }

  setTable(alignments: Alignment[]): void {
    this.activate({
      kind: "table",
      alignments: [...alignments],
      headers: [],
      rows: [],
      currentRow: [],
      isHeader: true,
    })
  }

  clearActiveElement(): void {
    this.activeElement = null
  }

  get link(): LinkState | undefined {
    return this.activeElement?.kind === "link" ? this.activeElement : undefined
  }

  get image(): ImageState | undefined {
    return this.activeElement?.kind === "image" ? this.activeElement : undefined
  }

  get codeBlock(): CodeBlockState | undefined {
    return this.activeElement?.kind === "codeBlock" ? this.activeElement : undefined
  }

  get table(): TableState | undefined {
    return this.activeElement?.kind === "table" ? this.activeElement : undefined
  }

  /**
   * Routes content into the active element. Returns false when nothing is
   * accumulating and the caller should write the text itself.
   */
  appendText(text: string): boolean {
    const element = this.activeElement
    if (!element) return false

    switch (element.kind) {
      case "link":
        element.text += text
        return true
      case "image":
        element.altText += text
        return true
      case "codeBlock":
        element.content += text
        return true
      case "table": {
        const last = element.currentRow.length - 1
        if (last >= 0) {
          element.currentRow[last] += text
        } else {
          element.currentRow.push(text)
        }
        return true
      }
    }
  }

  // --- Tables ---

  startRow(): void {
    const table = this.table
    if (table) table.currentRow = []
  }

  startCell(): void {
    this.table?.currentRow.push("")
  }

  finishHeader(): void {
    const table = this.table
    if (!table) return
    table.headers = table.currentRow
    table.currentRow = []
    table.isHeader = false
  }

  finishRow(): void {
    const table = this.table
    if (!table || table.currentRow.length === 0) return
    table.rows.push(table.currentRow)
    table.currentRow = []
  }

  // --- Lists ---

  pushList(start: number | null): void {
    this.listStack.push(start === null ? { kind: "unordered" } : { kind: "ordered", current: start })
  }

  popList(): void {
    this.listStack.pop()
  }

  get listDepth(): number {
    return this.listStack.length
  }

  /** Marker for the next item of the innermost list; advances ordered counters. */
  nextListMarker(bullet: string): string {
    const top = this.listStack[this.listStack.length - 1]
    if (!top) return ""
    if (top.kind === "unordered") return bullet
    const marker = `${top.current}. `
    top.current++
    return marker
  }

  runStyle(): RunStyle {
    const { strong, italic } = this.emphasis
    if (strong && italic) return "strongEmphasis"
    if (strong) return "strong"
    if (italic) return "emphasis"
    if (this.link) return "link"
    if (this.headingLevel !== null) return "heading"
    return "normal"
  }
}
