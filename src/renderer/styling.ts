import { Chalk, type ChalkInstance, type ColorSupportLevel } from "chalk"

import type { ElementStyle, MarkdownTheme, Rgb } from "@/src/renderer/theme"

/** Style of a run of running text, derived from emphasis and link state. */
export type RunStyle = "strongEmphasis" | "strong" | "emphasis" | "link" | "heading" | "normal"

export function createChalk(level?: ColorSupportLevel): ChalkInstance {
  return level === undefined ? new Chalk() : new Chalk({ level })
}

export class Styler {
  constructor(
    readonly theme: MarkdownTheme,
    private chalk: ChalkInstance = createChalk()
  ) {}

  paint(text: string, style: ElementStyle, background?: Rgb): string {
    if (!text) return text
    const { r, g, b } = style.color
    let painter = this.chalk.rgb(r, g, b)
    if (background) painter = painter.bgRgb(background.r, background.g, background.b)
    if (style.bold) painter = painter.bold
    if (style.italic) painter = painter.italic
    if (style.underline) painter = painter.underline
    return painter(text)
  }

  run(style: RunStyle, text: string, headingLevel = 1): string {
    switch (style) {
      case "strongEmphasis":
        return this.paint(text, this.theme.strongEmphasisStyle())
      case "strong":
        return this.paint(text, this.theme.strongStyle())
      case "emphasis":
        return this.paint(text, this.theme.emphasisStyle())
      case "link":
        return this.paint(text, this.theme.linkStyle())
      case "heading":
        return this.paint(text, this.theme.headingStyle(headingLevel))
      case "normal":
        return this.paint(text, this.theme.textStyle())
    }
  }

  heading(level: number, text: string): string {
    return this.paint(text, this.theme.headingStyle(level))
  }

  link(text: string): string {
    return this.paint(text, this.theme.linkStyle())
  }

  code(text: string): string {
    return this.paint(text, this.theme.codeStyle())
  }

  /** Code on the code background, for inline spans and code block lines. */
  codeBlock(text: string): string {
    return this.paint(text, this.theme.codeStyle(), this.theme.codeBackground())
  }

  listMarker(text: string): string {
    return this.paint(text, this.theme.listMarkerStyle())
  }

  delimiter(text: string): string {
    return this.paint(text, this.theme.delimiterStyle())
  }

  emphasis(text: string): string {
    return this.paint(text, this.theme.emphasisStyle())
  }

  background(text: string, foreground: Rgb, background: Rgb, bold = false): string {
    return this.paint(text, { color: foreground, bold }, background)
  }
}

/** OSC 8 terminal hyperlink. */
export function hyperlink(url: string, label: string): string {
  return `\x1b]8;;${url}\x1b\\${label}\x1b]8;;\x1b\\`
}
