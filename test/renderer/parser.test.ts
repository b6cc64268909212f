import { describe, expect, it } from "vitest"

import {
  code,
  end,
  footnoteReference,
  softBreak,
  start,
  taskListMarker,
  text,
  wrap,
} from "@/src/renderer/events"
import { MarkdownParser, normalizeLineEndings, parseMarkdown } from "@/src/renderer/parser"

describe("parseMarkdown", () => {
  it("emits headings", () => {
    expect(parseMarkdown("# Title")).toEqual(wrap({ kind: "heading", level: 1 }, text("Title")))
  })

  it("emits inline emphasis inside a paragraph", () => {
    expect(parseMarkdown("Hello *world*")).toEqual(
      wrap({ kind: "paragraph" }, text("Hello "), ...wrap({ kind: "emphasis" }, text("world")))
    )
  })

  it("splits soft line breaks", () => {
    expect(parseMarkdown("line one\nline two")).toEqual(
      wrap({ kind: "paragraph" }, text("line one"), softBreak, text("line two"))
    )
  })

  it("emits fenced and indented code blocks", () => {
    expect(parseMarkdown("```js\nconst a = 1\n```")).toEqual(
      wrap({ kind: "codeBlock", language: "js" }, text("const a = 1\n"))
    )
    expect(parseMarkdown("    x")).toEqual(wrap({ kind: "codeBlock", language: null }, text("x\n")))
  })

  it("emits inline code", () => {
    expect(parseMarkdown("run `npm`")).toEqual(wrap({ kind: "paragraph" }, text("run "), code("npm")))
  })

  it("emits lists with their start number", () => {
    expect(parseMarkdown("- a\n- b")).toEqual(
      wrap(
        { kind: "list", start: null },
        ...wrap({ kind: "item" }, text("a")),
        ...wrap({ kind: "item" }, text("b"))
      )
    )
    const ordered = parseMarkdown("3. a\n4. b")
    expect(ordered[0]).toEqual(start({ kind: "list", start: 3 }))
  })

  it("emits task list markers", () => {
    expect(parseMarkdown("- [x] done\n- [ ] todo")).toEqual(
      wrap(
        { kind: "list", start: null },
        ...wrap({ kind: "item" }, taskListMarker(true), text("done")),
        ...wrap({ kind: "item" }, taskListMarker(false), text("todo"))
      )
    )
  })

  it("emits tables with column alignment", () => {
    const cell = (value: string) => wrap({ kind: "tableCell" }, text(value))
    expect(parseMarkdown("| A | B |\n| :-- | --: |\n| 1 | 2 |")).toEqual(
      wrap(
        { kind: "table", alignments: ["left", "right"] },
        ...wrap({ kind: "tableHead" }, ...cell("A"), ...cell("B")),
        ...wrap({ kind: "tableRow" }, ...cell("1"), ...cell("2"))
      )
    )
  })

  it("emits links with their target", () => {
    expect(parseMarkdown("[site](https://example.com)")).toEqual(
      wrap(
        { kind: "paragraph" },
        ...wrap({ kind: "link", url: "https://example.com", title: "" }, text("site"))
      )
    )
  })

  it("emits footnote references and definitions", () => {
    expect(parseMarkdown("Text[^1]\n\n[^1]: Note.")).toEqual([
      ...wrap({ kind: "paragraph" }, text("Text"), footnoteReference("1")),
      ...wrap({ kind: "footnoteDefinition", label: "1" }, ...wrap({ kind: "paragraph" }, text("Note."))),
    ])
  })

  it("treats footnote syntax as text when footnotes are off", () => {
    const events = new MarkdownParser({ footnotes: false }).parse("Text[^1]")
    expect(events).not.toContainEqual(footnoteReference("1"))
    expect(events[events.length - 1]).toEqual(end("paragraph"))
  })

  it("normalises CRLF input", () => {
    expect(normalizeLineEndings("a\r\nb\rc")).toBe("a\nb\nc")
    expect(parseMarkdown("# A\r\n\r\ntext")).toEqual(parseMarkdown("# A\n\ntext"))
  })
})
