// --- Colour themes ---

export interface Rgb {
  r: number
  g: number
  b: number
}

export interface ElementStyle {
  color: Rgb
  bold?: boolean
  italic?: boolean
  underline?: boolean
}

export interface StatusColors {
  normal: Rgb
  search: Rgb
  help: Rgb
  error: Rgb
  message: Rgb
  background: Rgb
}

export interface MarkdownTheme {
  readonly name: string
  headingStyle(level: number): ElementStyle
  strongStyle(): ElementStyle
  emphasisStyle(): ElementStyle
  strongEmphasisStyle(): ElementStyle
  linkStyle(): ElementStyle
  codeStyle(): ElementStyle
  codeBackground(): Rgb
  listMarkerStyle(): ElementStyle
  delimiterStyle(): ElementStyle
  textStyle(): ElementStyle
  focusBorderStyle(): ElementStyle
  inactiveBorderStyle(): ElementStyle
  statusColors(): StatusColors
}

const rgb = (r: number, g: number, b: number): Rgb => ({ r, g, b })

export const SOLARIZED = {
  base02: rgb(7, 54, 66),
  base01: rgb(88, 110, 117),
  base00: rgb(101, 123, 131),
  base0: rgb(131, 148, 150),
  base1: rgb(147, 161, 161),
  yellow: rgb(181, 137, 0),
  orange: rgb(203, 75, 22),
  red: rgb(220, 50, 47),
  magenta: rgb(211, 54, 130),
  blue: rgb(38, 139, 210),
  cyan: rgb(42, 161, 152),
  green: rgb(133, 153, 0),
} as const

const HEADING_COLORS = [
  SOLARIZED.magenta,
  SOLARIZED.orange,
  SOLARIZED.yellow,
  SOLARIZED.green,
  SOLARIZED.cyan,
  SOLARIZED.blue,
]

export class SolarizedOsaka implements MarkdownTheme {
  readonly name = "solarized-osaka"

  headingStyle(level: number): ElementStyle {
    const index = Math.min(Math.max(level, 1), HEADING_COLORS.length) - 1
    return { color: HEADING_COLORS[index], bold: true }
  }

  strongStyle(): ElementStyle {
    return { color: SOLARIZED.orange, bold: true }
  }

  emphasisStyle(): ElementStyle {
    return { color: SOLARIZED.green, italic: true }
  }

  strongEmphasisStyle(): ElementStyle {
    return { color: SOLARIZED.yellow, bold: true, italic: true }
  }

  linkStyle(): ElementStyle {
    return { color: SOLARIZED.cyan, underline: true }
  }

  codeStyle(): ElementStyle {
    return { color: SOLARIZED.green }
  }

  codeBackground(): Rgb {
    return SOLARIZED.base02
  }

  listMarkerStyle(): ElementStyle {
    return { color: SOLARIZED.blue }
  }

  delimiterStyle(): ElementStyle {
    return { color: SOLARIZED.base01 }
  }

  textStyle(): ElementStyle {
    return { color: SOLARIZED.base0 }
  }

  focusBorderStyle(): ElementStyle {
    return { color: SOLARIZED.blue }
  }

  inactiveBorderStyle(): ElementStyle {
    return { color: SOLARIZED.base00 }
  }

  statusColors(): StatusColors {
    return {
      normal: SOLARIZED.green,
      search: SOLARIZED.yellow,
      help: SOLARIZED.blue,
      error: SOLARIZED.red,
      message: SOLARIZED.yellow,
      background: SOLARIZED.base02,
    }
  }
}

export const defaultTheme: MarkdownTheme = new SolarizedOsaka()
