import { describe, expect, it } from "vitest"

import type { RenderConfigInput } from "@/src/renderer/config"
import {
  code,
  footnoteReference,
  hardBreak,
  rule,
  start,
  taskListMarker,
  text,
  wrap,
  end,
  type MarkdownEvent,
} from "@/src/renderer/events"
import { BufferedOutput, StringTarget } from "@/src/renderer/output"
import { MarkdownRenderer } from "@/src/renderer/renderer"
import { createChalk, Styler } from "@/src/renderer/styling"
import { defaultTheme } from "@/src/renderer/theme"

function render(events: MarkdownEvent[], config: RenderConfigInput = {}): string {
  const target = new StringTarget()
  const renderer = new MarkdownRenderer({
    output: new BufferedOutput(target),
    chalk: createChalk(0),
    config: { terminalWidth: 80, ...config },
  })
  renderer.render(events)
  return target.toString()
}

function renderMarkdown(markdown: string, config: RenderConfigInput = {}): string {
  const target = new StringTarget()
  const renderer = new MarkdownRenderer({
    output: new BufferedOutput(target),
    chalk: createChalk(0),
    config: { terminalWidth: 80, ...config },
  })
  renderer.renderContent(markdown)
  return target.toString()
}

const paragraph = (...inner: MarkdownEvent[]) => wrap({ kind: "paragraph" }, ...inner)
const item = (...inner: MarkdownEvent[]) => wrap({ kind: "item" }, ...inner)

describe("MarkdownRenderer", () => {
  it("renders headings with their hashes", () => {
    expect(render(wrap({ kind: "heading", level: 2 }, text("Title")))).toBe("## Title\n\n")
  })

  it("renders emphasis inside paragraphs", () => {
    const events = paragraph(text("Hello "), ...wrap({ kind: "emphasis" }, text("world")))
    expect(render(events)).toBe("Hello world\n")
  })

  it("renders unordered lists with the configured bullet", () => {
    const events = wrap({ kind: "list", start: null }, ...item(text("a")), ...item(text("b")))
    expect(render(events)).toBe("- a\n- b\n\n")
    expect(render(events, { bulletMarker: "• " })).toBe("• a\n• b\n\n")
  })

  it("keeps a separate counter for a nested ordered list", () => {
    const events = wrap(
      { kind: "list", start: 1 },
      ...item(
        text("a"),
        ...wrap({ kind: "list", start: 5 }, ...item(text("x")), ...item(text("y")), ...item(text("z")))
      ),
      ...item(text("b"))
    )
    expect(render(events)).toBe("1. a\n  5. x\n  6. y\n  7. z\n2. b\n\n")
  })

  it("numbers ordered lists and indents nested ones", () => {
    const events = wrap(
      { kind: "list", start: 5 },
      ...item(text("one"), ...wrap({ kind: "list", start: null }, ...item(text("inner")))),
      ...item(text("two"))
    )
    expect(render(events)).toBe("5. one\n  - inner\n6. two\n\n")
  })

  it("renders task list markers", () => {
    const events = wrap({ kind: "list", start: null }, ...item(taskListMarker(true), text("done")))
    expect(render(events)).toBe("- [x] done\n\n")
  })

  it("prints the URL after link text", () => {
    const events = paragraph(...wrap({ kind: "link", url: "https://example.com", title: "" }, text("site")))
    expect(render(events)).toBe("site (https://example.com)\n")
  })

  it("prints the URL once when the text is the URL", () => {
    const url = "https://example.com"
    expect(render(wrap({ kind: "link", url, title: "" }, text(url)))).toBe(url)
    expect(render(wrap({ kind: "link", url, title: "" }))).toBe(url)
  })

  it("emits OSC 8 hyperlinks when enabled", () => {
    const events = wrap({ kind: "link", url: "https://example.com", title: "" }, text("site"))
    expect(render(events, { hyperlinks: true })).toBe(
      "\x1b]8;;https://example.com\x1b\\site\x1b]8;;\x1b\\"
    )
  })

  it("keeps inline code inside link text", () => {
    const events = wrap({ kind: "link", url: "https://example.com", title: "" }, text("run "), code("npm"))
    expect(render(events)).toBe("run `npm` (https://example.com)")
  })

  it("renders images as a labelled URL", () => {
    expect(render(wrap({ kind: "image", url: "logo.png", title: "" }, text("logo")))).toBe("[logo] (logo.png)")
    expect(render(wrap({ kind: "image", url: "logo.png", title: "" }))).toBe("[Image] (logo.png)")
  })

  it("fences code blocks", () => {
    const events = wrap({ kind: "codeBlock", language: "ts" }, text("let x = 1\n"))
    expect(render(events)).toBe("\n```ts\nlet x = 1\n```\n\n")
  })

  it("closes a fence with a bare marker after a language tag", () => {
    expect(renderMarkdown("```rust\nfn main() {}\n```\n")).toBe("\n```rust\nfn main() {}\n```\n\n")
  })

  it("flushes a code block left open at the end", () => {
    expect(render([start({ kind: "codeBlock", language: null }), text("x\n")])).toBe("\n```\nx\n```\n\n")
  })

  it("keeps entities verbatim inside code blocks and decodes them elsewhere", () => {
    expect(render(paragraph(text("a &amp; b &#169;")))).toBe("a & b ©\n")
    expect(render(wrap({ kind: "codeBlock", language: null }, text("&amp;\n")))).toBe("\n```\n&amp;\n```\n\n")
  })

  it("draws rules at 80% of the width", () => {
    expect(render([rule], { terminalWidth: 20 })).toBe("\n" + "─".repeat(16) + "\n\n")
    expect(render([rule], { terminalWidth: 300 })).toBe("\n" + "─".repeat(100) + "\n\n")
  })

  it("renders tables through the layout engine", () => {
    const cell = (value: string) => wrap({ kind: "tableCell" }, text(value))
    const events = wrap(
      { kind: "table", alignments: ["none", "center"] },
      ...wrap({ kind: "tableHead" }, ...cell("A"), ...cell("B")),
      ...wrap({ kind: "tableRow" }, ...cell("1"), ...cell("2"))
    )
    expect(render(events)).toBe("| A   | B   |\n| --- | :-: |\n| 1   |  2  |\n\n")
  })

  it("turns hard breaks into newlines", () => {
    expect(render(paragraph(text("a"), hardBreak, text("b")))).toBe("a\nb\n")
  })

  it("prefixes block quotes", () => {
    expect(render(wrap({ kind: "blockquote" }, ...paragraph(text("quote"))))).toBe("> quote\n\n")
  })

  it("paints the block quote marker with the delimiter style", () => {
    const chalk = createChalk(3)
    const target = new StringTarget()
    new MarkdownRenderer({ output: new BufferedOutput(target), chalk }).render(
      wrap({ kind: "blockquote" }, ...paragraph(text("q")))
    )
    const marker = new Styler(defaultTheme, chalk).delimiter("> ")
    expect(target.toString().startsWith(marker)).toBe(true)
  })

  it("ignores an end tag for a table that never started", () => {
    const events = [start({ kind: "link", url: "u", title: "" }), text("t"), end("table"), end("link")]
    expect(render(events)).toBe("t (u)")
  })

  it("ignores end tags for elements other than the active one", () => {
    const events = [start({ kind: "link", url: "u", title: "" }), text("t"), end("codeBlock"), end("image"), end("link")]
    expect(render(events)).toBe("t (u)")
  })

  it("renders footnotes", () => {
    expect(render(paragraph(text("See"), footnoteReference("1")))).toBe("See[^1]\n")
    const definition = wrap({ kind: "footnoteDefinition", label: "1" }, ...paragraph(text("Note.")))
    expect(render(definition)).toBe("\n[1]: Note.\n")
  })

  it("resets state between renders", () => {
    const target = new StringTarget()
    const renderer = new MarkdownRenderer({ output: new BufferedOutput(target), chalk: createChalk(0) })
    renderer.render([start({ kind: "list", start: 1 }), start({ kind: "strong" })])
    renderer.render([end("paragraph")])
    expect(renderer.state.listDepth).toBe(0)
    expect(renderer.state.emphasis.strong).toBe(false)
  })

  it("renders markdown source end to end", () => {
    expect(renderMarkdown("# Hi\n\nSome **bold** text.\n")).toBe("# Hi\n\nSome bold text.\n")
  })
})
