import type { Alignment } from "@/src/renderer/events"
import type { AlignmentMarkers } from "@/src/renderer/config"
import { displayWidth, padToWidth, type Justify } from "@/src/utils/display-width"
import { TableValidationError } from "@/src/utils/errors"

// --- Table layout ---

export const MIN_COLUMN_WIDTH = 3

export const DEFAULT_ALIGNMENT_MARKERS: AlignmentMarkers = {
  left: ":---",
  center: ":---:",
  right: "---:",
  none: "---",
}

export interface TableLayoutOptions {
  separator?: string
  markers?: AlignmentMarkers
}

function columnCountOf(headers: string[], rows: string[][], alignments: Alignment[]): number {
  if (alignments.length > 0) return alignments.length
  if (headers.length > 0) return headers.length
  return rows[0]?.length ?? 0
}

export function columnWidths(headers: string[], rows: string[][], columns: number): number[] {
  const widths = new Array<number>(columns).fill(MIN_COLUMN_WIDTH)
  for (const row of [headers, ...rows]) {
    row.slice(0, columns).forEach((cell, i) => {
      widths[i] = Math.max(widths[i], displayWidth(cell))
    })
  }
  return widths
}

/** Stretches a configured marker such as `:---:` to `width` dashes, keeping its colons. */
export function alignmentMarker(marker: string, width: number): string {
  const leading = marker.startsWith(":")
  const trailing = marker.length > 1 && marker.endsWith(":")
  const colons = Number(leading) + Number(trailing)
  const dashes = "-".repeat(Math.max(1, width - colons))
  return (leading ? ":" : "") + dashes + (trailing ? ":" : "")
}

function justifyFor(alignment: Alignment): Justify {
  switch (alignment) {
    case "center":
      return "center"
    case "right":
      return "right"
    default:
      return "left"
  }
}

function formatRow(cells: string[], separator: string): string {
  return separator + cells.map((cell) => ` ${cell} ${separator}`).join("")
}

/**
 * Lays out a table as terminal lines. Widths come from the whole table, so
 * every row lines up under the header.
 */
export function layoutTable(
  headers: string[],
  rows: string[][],
  alignments: Alignment[],
  options: TableLayoutOptions = {}
): string[] {
  const separator = options.separator ?? "|"
  const markers = options.markers ?? DEFAULT_ALIGNMENT_MARKERS
  const columns = columnCountOf(headers, rows, alignments)
  if (columns === 0) return []

  const widths = columnWidths(headers, rows, columns)
  const alignmentAt = (i: number): Alignment => alignments[i] ?? "none"
  const cellAt = (row: string[], i: number): string => row[i] ?? ""
  const lines: string[] = []

  if (headers.length > 0) {
    lines.push(
      formatRow(
        widths.map((width, i) => padToWidth(cellAt(headers, i), width)),
        separator
      )
    )
    lines.push(
      formatRow(
        widths.map((width, i) => alignmentMarker(markers[alignmentAt(i)], width)),
        separator
      )
    )
  }

  for (const row of rows) {
    lines.push(
      formatRow(
        widths.map((width, i) => padToWidth(cellAt(row, i), width, justifyFor(alignmentAt(i)))),
        separator
      )
    )
  }

  return lines
}

// --- Fluent table builder ---

export class Table {
  constructor(
    readonly headers: string[] | null,
    readonly rows: string[][],
    readonly alignments: Alignment[],
    private options: Required<TableLayoutOptions>
  ) {}

  get columnCount(): number {
    if (this.headers) return this.headers.length
    return this.rows[0]?.length ?? 0
  }

  get rowCount(): number {
    return this.rows.length
  }

  render(): string[] {
    return layoutTable(this.headers ?? [], this.rows, this.alignments, this.options)
  }
}

export class TableBuilder {
  private headerCells: string[] | null = null
  private bodyRows: string[][] = []
  private columnAlignments: Alignment[] = []
  private separatorText = "|"
  private markers: AlignmentMarkers = DEFAULT_ALIGNMENT_MARKERS

  /** Sets the header row; alignments default to `none` when none were given. */
  header(cells: Iterable<string>): this {
    this.headerCells = [...cells]
    if (this.columnAlignments.length === 0) {
      this.columnAlignments = this.headerCells.map((): Alignment => "none")
    }
    return this
  }

  row(cells: Iterable<string>): this {
    this.bodyRows.push([...cells])
    return this
  }

  rows(rows: Iterable<Iterable<string>>): this {
    for (const row of rows) this.row(row)
    return this
  }

  alignments(alignments: Alignment[]): this {
    this.columnAlignments = [...alignments]
    return this
  }

  separator(separator: string): this {
    this.separatorText = separator
    return this
  }

  alignmentConfig(markers: AlignmentMarkers): this {
    this.markers = markers
    return this
  }

  private validate(): void {
    const columns = this.headerCells?.length ?? this.bodyRows[0]?.length
    if (columns === undefined) return

    this.bodyRows.forEach((row, i) => {
      if (row.length !== columns) {
        throw new TableValidationError(`Row ${i} has ${row.length} columns, expected ${columns}`)
      }
    })

    if (this.columnAlignments.length > 0 && this.columnAlignments.length !== columns) {
      throw new TableValidationError(
        `Alignment count (${this.columnAlignments.length}) doesn't match column count (${columns})`
      )
    }
  }

  build(): Table {
    this.validate()
    return new Table(this.headerCells, this.bodyRows, this.columnAlignments, {
      separator: this.separatorText,
      markers: this.markers,
    })
  }
}
