import {
  Marked,
  type MarkedToken,
  type Token,
  type Tokens,
  type TokenizerExtension,
} from "marked"

import {
  code,
  end,
  footnoteReference,
  hardBreak,
  html,
  rule,
  softBreak,
  start,
  taskListMarker,
  text,
  type Alignment,
  type MarkdownEvent,
  type Tag,
} from "@/src/renderer/events"

// --- Footnote tokenizer extensions ---

interface FootnoteReferenceToken extends Tokens.Generic {
  type: "footnoteReference"
  label: string
}

interface FootnoteDefinitionToken extends Tokens.Generic {
  type: "footnoteDefinition"
  label: string
}

const footnoteReferenceExtension: TokenizerExtension = {
  name: "footnoteReference",
  level: "inline",
  start(src) {
    return src.match(/\[\^/)?.index
  },
  tokenizer(src) {
    const match = /^\[\^([^\]\s]+)\]/.exec(src)
    if (!match) return undefined
    return { type: "footnoteReference", raw: match[0], label: match[1] }
  },
}

const footnoteDefinitionExtension: TokenizerExtension = {
  name: "footnoteDefinition",
  level: "block",
  start(src) {
    return src.match(/^\[\^[^\]\s]+\]:/m)?.index
  },
  tokenizer(src) {
    // First line plus any continuation lines indented by a tab or four spaces.
    const match = /^\[\^([^\]\s]+)\]:[ \t]*([^\n]*(?:\n(?: {4}|\t)[^\n]*)*)(?:\n|$)/.exec(src)
    if (!match) return undefined
    const body = match[2].replace(/^(?: {4}|\t)/gm, "")
    return {
      type: "footnoteDefinition",
      raw: match[0],
      label: match[1],
      tokens: this.lexer.blockTokens(body, []),
    }
  },
}

function isFootnoteReference(token: Token): token is FootnoteReferenceToken {
  return token.type === "footnoteReference" && "label" in token && typeof token.label === "string"
}

function isFootnoteDefinition(token: Token): token is FootnoteDefinitionToken {
  return token.type === "footnoteDefinition" && "label" in token && typeof token.label === "string"
}

const MARKED_TOKEN_TYPES: ReadonlySet<string> = new Set([
  "blockquote",
  "br",
  "code",
  "codespan",
  "def",
  "del",
  "em",
  "escape",
  "heading",
  "hr",
  "html",
  "image",
  "link",
  "list",
  "list_item",
  "paragraph",
  "space",
  "strong",
  "table",
  "text",
])

function isMarkedToken(token: Token): token is MarkedToken {
  return MARKED_TOKEN_TYPES.has(token.type)
}

// --- Token tree to event stream ---

export interface ParseOptions {
  /** GitHub flavoured extensions: tables, strikethrough, task lists. */
  gfm?: boolean
  footnotes?: boolean
}

export function normalizeLineEndings(content: string): string {
  return content.includes("\r") ? content.replace(/\r\n?/g, "\n") : content
}

function toAlignment(align: "left" | "center" | "right" | null): Alignment {
  return align ?? "none"
}

function* wrapped(tag: Tag, inner: Iterable<MarkdownEvent>): Generator<MarkdownEvent> {
  yield start(tag)
  yield* inner
  yield end(tag.kind)
}

function* inlineText(value: string): Generator<MarkdownEvent> {
  const lines = value.split("\n")
  for (let i = 0; i < lines.length; i++) {
    if (i > 0) yield softBreak
    if (lines[i]) yield text(lines[i])
  }
}

function* walk(tokens: Token[]): Generator<MarkdownEvent> {
  for (const token of tokens) {
    yield* walkToken(token)
  }
}

function* walkTableCells(cells: Tokens.TableCell[]): Generator<MarkdownEvent> {
  for (const cell of cells) {
    yield* wrapped({ kind: "tableCell" }, walk(cell.tokens))
  }
}

function* walkListItem(item: Tokens.ListItem): Generator<MarkdownEvent> {
  yield start({ kind: "item" })
  if (item.task) yield taskListMarker(item.checked ?? false)
  yield* walk(item.tokens)
  yield end("item")
}

function* walkToken(token: Token): Generator<MarkdownEvent> {
  if (isFootnoteReference(token)) {
    yield footnoteReference(token.label)
    return
  }
  if (isFootnoteDefinition(token)) {
    yield* wrapped({ kind: "footnoteDefinition", label: token.label }, walk(token.tokens ?? []))
    return
  }
  if (!isMarkedToken(token)) return

  switch (token.type) {
    case "heading":
      yield* wrapped({ kind: "heading", level: token.depth }, walk(token.tokens))
      return
    case "paragraph":
      yield* wrapped({ kind: "paragraph" }, walk(token.tokens))
      return
    case "blockquote":
      yield* wrapped({ kind: "blockquote" }, walk(token.tokens))
      return
    case "code": {
      const language = token.codeBlockStyle === "indented" ? null : token.lang?.trim() || null
      const body = token.text ? [text(token.text + "\n")] : []
      yield* wrapped({ kind: "codeBlock", language }, body)
      return
    }
    case "list": {
      const startNumber = token.ordered ? (token.start === "" ? 1 : token.start) : null
      yield start({ kind: "list", start: startNumber })
      for (const item of token.items) yield* walkListItem(item)
      yield end("list")
      return
    }
    case "list_item":
      yield* walkListItem(token)
      return
    case "table":
      yield start({ kind: "table", alignments: token.align.map(toAlignment) })
      yield* wrapped({ kind: "tableHead" }, walkTableCells(token.header))
      for (const row of token.rows) {
        yield* wrapped({ kind: "tableRow" }, walkTableCells(row))
      }
      yield end("table")
      return
    case "hr":
      yield rule
      return
    case "html":
      yield html(token.text)
      return
    case "text":
      if (token.tokens) {
        yield* walk(token.tokens)
      } else {
        yield* inlineText(token.text)
      }
      return
    case "escape":
      yield text(token.text)
      return
    case "strong":
      yield* wrapped({ kind: "strong" }, walk(token.tokens))
      return
    case "em":
      yield* wrapped({ kind: "emphasis" }, walk(token.tokens))
      return
    case "del":
      yield* wrapped({ kind: "strikethrough" }, walk(token.tokens))
      return
    case "codespan":
      yield code(token.text)
      return
    case "br":
      yield hardBreak
      return
    case "link":
      yield* wrapped({ kind: "link", url: token.href, title: token.title ?? "" }, walk(token.tokens))
      return
    case "image":
      yield* wrapped(
        { kind: "image", url: token.href, title: token.title ?? "" },
        token.text ? [text(token.text)] : []
      )
      return
    default:
      // def, space
      return
  }
}

/**
 * Tokenizes markdown with marked and flattens the token tree into a
 * start/end event stream.
 */
export class MarkdownParser {
  private marked: Marked

  constructor(options: ParseOptions = {}) {
    const { gfm = true, footnotes = true } = options
    this.marked = new Marked({
      gfm,
      extensions: footnotes ? [footnoteDefinitionExtension, footnoteReferenceExtension] : [],
    })
  }

  *events(content: string): Generator<MarkdownEvent> {
    yield* walk(this.marked.lexer(normalizeLineEndings(content)))
  }

  parse(content: string): MarkdownEvent[] {
    return [...this.events(content)]
  }
}

export const defaultParser = new MarkdownParser()

export function parseMarkdown(content: string): MarkdownEvent[] {
  return defaultParser.parse(content)
}
