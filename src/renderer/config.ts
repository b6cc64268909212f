import { z } from "zod"

// --- Render configuration ---

export const alignmentMarkersSchema = z.object({
  left: z.string().default(":---"),
  center: z.string().default(":---:"),
  right: z.string().default("---:"),
  none: z.string().default("---"),
})

export type AlignmentMarkers = z.infer<typeof alignmentMarkersSchema>

export const renderConfigSchema = z.object({
  indentWidth: z.number().int().min(0).default(2),
  tableSeparator: z.string().min(1).default("|"),
  tableAlignment: alignmentMarkersSchema.default({}),
  bulletMarker: z.string().default("- "),
  // OSC 8 clickable links instead of printing the URL.
  hyperlinks: z.boolean().default(false),
  terminalWidth: z.number().int().positive().optional(),
  bufferCapacity: z.number().int().positive().default(8192),
})

export type RenderConfig = z.infer<typeof renderConfigSchema>
export type RenderConfigInput = z.input<typeof renderConfigSchema>

export const DEFAULT_TERMINAL_WIDTH = 80
const MAX_RULE_WIDTH = 100

export function resolveRenderConfig(input: RenderConfigInput = {}): RenderConfig {
  return renderConfigSchema.parse(input)
}

export function getTerminalWidth(config: Pick<RenderConfig, "terminalWidth">): number {
  return config.terminalWidth ?? (process.stdout.columns || DEFAULT_TERMINAL_WIDTH)
}

export function createIndent(config: Pick<RenderConfig, "indentWidth">, depth: number): string {
  return depth <= 0 ? "" : " ".repeat(config.indentWidth * depth)
}

export function createHorizontalRule(config: Pick<RenderConfig, "terminalWidth">): string {
  const width = getTerminalWidth(config)
  return "─".repeat(Math.min(Math.floor(width * 0.8), MAX_RULE_WIDTH))
}
