import stringWidth from "string-width"

// CSI (colours, cursor) and OSC (hyperlinks) escape sequences.
const ESCAPE_SEQUENCE = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" })

export function displayWidth(text: string): number {
  return stringWidth(text)
}

type Piece = { escape: true; text: string } | { escape: false; text: string }

function* pieces(text: string): Generator<Piece> {
  let last = 0
  for (const match of text.matchAll(ESCAPE_SEQUENCE)) {
    const index = match.index ?? 0
    if (index > last) {
      for (const { segment } of segmenter.segment(text.slice(last, index))) {
        yield { escape: false, text: segment }
      }
    }
    yield { escape: true, text: match[0] }
    last = index + match[0].length
  }
  for (const { segment } of segmenter.segment(text.slice(last))) {
    yield { escape: false, text: segment }
  }
}

/**
 * Cuts `text` to at most `maxWidth` terminal columns without splitting a
 * grapheme. Escape sequences after the cut are kept so styles still close.
 */
export function truncateToWidth(text: string, maxWidth: number): { text: string; width: number } {
  if (maxWidth <= 0 || !text) return { text: "", width: 0 }

  let result = ""
  let width = 0
  let full = false
  for (const piece of pieces(text)) {
    if (piece.escape) {
      result += piece.text
      continue
    }
    if (full) continue
    const w = stringWidth(piece.text)
    if (width + w > maxWidth) {
      full = true
      continue
    }
    result += piece.text
    width += w
  }
  return { text: result, width }
}

export type Justify = "left" | "center" | "right"

/** Pads to `width` columns. Centering puts the odd space on the right. */
export function padToWidth(text: string, width: number, justify: Justify = "left"): string {
  const gap = Math.max(0, width - displayWidth(text))
  switch (justify) {
    case "left":
      return text + " ".repeat(gap)
    case "right":
      return " ".repeat(gap) + text
    case "center": {
      const left = Math.floor(gap / 2)
      return " ".repeat(left) + text + " ".repeat(gap - left)
    }
  }
}

/** Truncates then pads, so the result is exactly `width` columns. */
export function fitToWidth(text: string, width: number): string {
  return padToWidth(truncateToWidth(text, width).text, width)
}
