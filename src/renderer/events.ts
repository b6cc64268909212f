// --- Markdown event stream ---

export type Alignment = "left" | "center" | "right" | "none"

export type Tag =
  | { kind: "heading"; level: number }
  | { kind: "paragraph" }
  | { kind: "blockquote" }
  | { kind: "codeBlock"; language: string | null }
  | { kind: "list"; start: number | null }
  | { kind: "item" }
  | { kind: "footnoteDefinition"; label: string }
  | { kind: "table"; alignments: Alignment[] }
  | { kind: "tableHead" }
  | { kind: "tableRow" }
  | { kind: "tableCell" }
  | { kind: "emphasis" }
  | { kind: "strong" }
  | { kind: "strikethrough" }
  | { kind: "link"; url: string; title: string }
  | { kind: "image"; url: string; title: string }

export type TagKind = Tag["kind"]

export type MarkdownEvent =
  | { type: "start"; tag: Tag }
  | { type: "end"; tag: TagKind }
  | { type: "text"; text: string }
  | { type: "code"; code: string }
  | { type: "html"; html: string }
  | { type: "softBreak" }
  | { type: "hardBreak" }
  | { type: "rule" }
  | { type: "taskListMarker"; checked: boolean }
  | { type: "footnoteReference"; label: string }

export const start = (tag: Tag): MarkdownEvent => ({ type: "start", tag })
export const end = (tag: TagKind): MarkdownEvent => ({ type: "end", tag })
export const text = (value: string): MarkdownEvent => ({ type: "text", text: value })
export const code = (value: string): MarkdownEvent => ({ type: "code", code: value })
export const html = (value: string): MarkdownEvent => ({ type: "html", html: value })
export const softBreak: MarkdownEvent = { type: "softBreak" }
export const hardBreak: MarkdownEvent = { type: "hardBreak" }
export const rule: MarkdownEvent = { type: "rule" }
export const taskListMarker = (checked: boolean): MarkdownEvent => ({
  type: "taskListMarker",
  checked,
})
export const footnoteReference = (label: string): MarkdownEvent => ({
  type: "footnoteReference",
  label,
})

/** Wraps `inner` between a start and end event for `tag`. */
export function wrap(tag: Tag, ...inner: MarkdownEvent[]): MarkdownEvent[] {
  return [start(tag), ...inner, end(tag.kind)]
}
