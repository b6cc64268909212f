import type { ChalkInstance } from "chalk"

import { decodeHtmlEntities } from "@/src/core/entities"
import { debug } from "@/src/observability/debug"
import {
  createHorizontalRule,
  createIndent,
  resolveRenderConfig,
  type RenderConfig,
  type RenderConfigInput,
} from "@/src/renderer/config"
import type { MarkdownEvent, Tag, TagKind } from "@/src/renderer/events"
import type { OutputSink } from "@/src/renderer/output"
import { defaultParser, type MarkdownParser } from "@/src/renderer/parser"
import { RenderState, type CodeBlockState } from "@/src/renderer/state"
import { Styler, createChalk, hyperlink } from "@/src/renderer/styling"
import { layoutTable } from "@/src/renderer/table"
import { defaultTheme, type MarkdownTheme } from "@/src/renderer/theme"

export interface MarkdownRendererOptions {
  output: OutputSink
  theme?: MarkdownTheme
  config?: RenderConfigInput
  chalk?: ChalkInstance
  parser?: MarkdownParser
}

/**
 * Turns the markdown event stream into styled terminal text. One instance
 * owns one RenderState; `render` resets it before each pass.
 */
export class MarkdownRenderer {
  readonly state = new RenderState()
  readonly config: RenderConfig
  private output: OutputSink
  private styler: Styler
  private parser: MarkdownParser
  private atLineStart = true

  constructor(options: MarkdownRendererOptions) {
    this.output = options.output
    this.config = resolveRenderConfig(options.config)
    this.styler = new Styler(options.theme ?? defaultTheme, options.chalk ?? createChalk())
    this.parser = options.parser ?? defaultParser
  }

  renderContent(markdown: string): void {
    this.render(this.parser.events(markdown))
  }

  render(events: Iterable<MarkdownEvent>): void {
    this.state.reset()
    this.atLineStart = true
    let count = 0
    for (const event of events) {
      this.processEvent(event)
      count++
    }
    this.finish()
    this.output.flush()
    debug.context("render", `${count} events`)
  }

  /** Renders whatever is still accumulating at the end of the stream. */
  finish(): void {
    const codeBlock = this.state.codeBlock
    if (codeBlock) {
      this.state.clearActiveElement()
      this.renderCodeBlock(codeBlock)
    }
  }

  processEvent(event: MarkdownEvent): void {
    switch (event.type) {
      case "start":
        this.startTag(event.tag)
        break
      case "end":
        this.endTag(event.tag)
        break
      case "text":
        this.handleText(event.text)
        break
      case "code":
        this.handleCode(event.code)
        break
      case "html":
        this.handleText(event.html)
        break
      case "softBreak":
        if (!this.state.appendText(" ")) this.write(" ")
        break
      case "hardBreak":
        this.handleHardBreak()
        break
      case "rule":
        this.renderRule()
        break
      case "taskListMarker":
        this.write(this.styler.listMarker(event.checked ? "[x] " : "[ ] "))
        break
      case "footnoteReference":
        this.handleText(`[^${event.label}]`)
        break
    }
  }

  // --- Tags ---

  private startTag(tag: Tag): void {
    switch (tag.kind) {
      case "heading":
        this.state.headingLevel = tag.level
        this.write(this.styler.heading(tag.level, "#".repeat(tag.level)))
        this.write(" ")
        break
      case "paragraph":
        break
      case "strong":
        this.state.emphasis.strong = true
        break
      case "emphasis":
        this.state.emphasis.italic = true
        break
      case "strikethrough":
        break
      case "link":
        this.state.setLink(tag.url)
        break
      case "image":
        this.state.setImage(tag.url)
        break
      case "list":
        if (this.state.listDepth > 0) this.newline()
        this.state.pushList(tag.start)
        break
      case "item":
        this.renderListItem()
        break
      case "codeBlock":
        this.state.setCodeBlock(tag.language)
        break
      case "table":
        this.state.setTable(tag.alignments)
        break
      case "tableHead":
        break
      case "tableRow":
        this.state.startRow()
        break
      case "tableCell":
        this.state.startCell()
        break
      case "blockquote":
        this.write(this.styler.delimiter("> "))
        break
      case "footnoteDefinition":
        this.newline()
        this.write(`[${tag.label}]: `)
        break
    }
  }

  private endTag(kind: TagKind): void {
    switch (kind) {
      case "heading":
        this.state.headingLevel = null
        this.newline()
        this.newline()
        break
      case "paragraph":
        if (!this.state.table) this.newline()
        break
      case "strong":
        this.state.emphasis.strong = false
        break
      case "emphasis":
        this.state.emphasis.italic = false
        break
      case "strikethrough":
        break
      case "link":
        this.renderLink()
        break
      case "image":
        this.renderImage()
        break
      case "list":
        this.state.popList()
        if (this.state.listDepth === 0) this.newline()
        break
      case "item":
        if (!this.atLineStart) this.newline()
        break
      case "codeBlock": {
        const codeBlock = this.state.codeBlock
        if (codeBlock) {
          this.state.clearActiveElement()
          this.renderCodeBlock(codeBlock)
        }
        break
      }
      case "table":
        this.renderTable()
        break
      case "tableHead":
        this.state.finishHeader()
        break
      case "tableRow":
        this.state.finishRow()
        break
      case "tableCell":
        break
      case "blockquote":
        this.newline()
        break
      case "footnoteDefinition":
        if (!this.atLineStart) this.newline()
        break
    }
  }

  // --- Content ---

  private handleText(raw: string): void {
    // Code block content stays verbatim.
    if (this.state.codeBlock) {
      this.state.appendText(raw)
      return
    }
    const decoded = decodeHtmlEntities(raw)
    if (!this.state.appendText(decoded)) this.writeRun(decoded)
  }

  private handleCode(code: string): void {
    if (this.state.codeBlock) {
      this.state.appendText(code)
      return
    }
    if (!this.state.appendText(`\`${code}\``)) {
      this.write(this.styler.codeBlock(code))
    }
  }

  private handleHardBreak(): void {
    const element = this.state.activeElement
    if (element?.kind === "table" || element?.kind === "codeBlock") return
    if (!this.state.appendText(" ")) this.newline()
  }

  private writeRun(text: string): void {
    this.write(this.styler.run(this.state.runStyle(), text, this.state.headingLevel ?? 1))
  }

  // --- Block output ---

  private renderListItem(): void {
    this.write(createIndent(this.config, this.state.listDepth - 1))
    const marker = this.state.nextListMarker(this.config.bulletMarker)
    if (marker) this.write(this.styler.listMarker(marker))
  }

  private renderLink(): void {
    const link = this.state.link
    if (!link) return
    this.state.clearActiveElement()

    if (!link.text || link.text === link.url) {
      this.write(this.styler.link(link.url))
    } else if (this.config.hyperlinks) {
      this.write(hyperlink(link.url, this.styler.link(link.text)))
    } else {
      this.write(this.styler.link(link.text) + this.styler.delimiter(` (${link.url})`))
    }
  }

  private renderImage(): void {
    const image = this.state.image
    if (!image) return
    this.state.clearActiveElement()

    const label = image.altText ? `[${image.altText}]` : "[Image]"
    this.write(this.styler.paint(label, { color: this.styler.theme.linkStyle().color }))
    this.write(this.styler.emphasis(` (${image.url})`))
  }

  private renderCodeBlock(codeBlock: CodeBlockState): void {
    const lines = codeBlock.content.split("\n")
    if (lines[lines.length - 1] === "") lines.pop()

    this.newline()
    this.writeln(this.styler.code("```" + (codeBlock.language ?? "")))
    for (const line of lines) this.writeln(this.styler.codeBlock(line))
    this.writeln(this.styler.code("```"))
    this.newline()
  }

  private renderTable(): void {
    const table = this.state.table
    if (!table) return
    const lines = layoutTable(table.headers, table.rows, table.alignments, {
      separator: this.config.tableSeparator,
      markers: this.config.tableAlignment,
    })
    for (const line of lines) this.writeln(line)
    this.state.clearActiveElement()
    this.newline()
  }

  private renderRule(): void {
    this.writeln("")
    this.writeln(this.styler.delimiter(createHorizontalRule(this.config)))
    this.writeln("")
  }

  // --- Sink ---

  private write(text: string): void {
    if (!text) return
    this.output.write(text)
    this.atLineStart = text.endsWith("\n")
  }

  private writeln(text: string): void {
    this.output.writeln(text)
    this.atLineStart = true
  }

  private newline(): void {
    this.output.newline()
    this.atLineStart = true
  }
}
