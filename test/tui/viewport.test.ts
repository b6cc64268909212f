import { describe, expect, it } from "vitest"

import { PAGE_SIZE, Viewport } from "@/src/tui/viewport"

function numbered(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `line ${i}`)
}

describe("Viewport", () => {
  it("pages by ten lines", () => {
    const viewport = new Viewport()
    viewport.setLines(numbered(30))
    viewport.pageDown()
    expect(viewport.scrollOffset).toBe(PAGE_SIZE)
    viewport.pageUp()
    expect(viewport.scrollOffset).toBe(0)
  })

  it("clamps to the last line", () => {
    const viewport = new Viewport()
    viewport.setLines(numbered(30))
    viewport.scrollToBottom()
    expect(viewport.scrollOffset).toBe(29)
    viewport.scrollDown()
    expect(viewport.scrollOffset).toBe(29)
    viewport.scrollUp(5)
    expect(viewport.scrollOffset).toBe(24)
    viewport.pageUp()
    viewport.pageUp()
    viewport.pageUp()
    expect(viewport.scrollOffset).toBe(0)
  })

  it("stays at zero without content", () => {
    const viewport = new Viewport()
    viewport.scrollToBottom()
    viewport.pageDown()
    expect(viewport.scrollOffset).toBe(0)
    expect(viewport.visibleLines(5, 10)).toEqual([])
  })

  it("resets the offset when content changes", () => {
    const viewport = new Viewport()
    viewport.setLines(numbered(30))
    viewport.scrollDown(3)
    viewport.setLines(numbered(5))
    expect(viewport.scrollOffset).toBe(0)
  })

  it("keeps the offset when content is re-rendered", () => {
    const viewport = new Viewport()
    viewport.setLines(numbered(30))
    viewport.scrollDown(12)
    viewport.replaceLines(numbered(30))
    expect(viewport.scrollOffset).toBe(12)
    viewport.replaceLines(numbered(5))
    expect(viewport.scrollOffset).toBe(4)
  })

  it("returns the visible window cut to width", () => {
    const viewport = new Viewport()
    viewport.setLines(numbered(30))
    viewport.scrollDown(28)
    expect(viewport.visibleLines(5, 80)).toEqual(["line 28", "line 29"])
    expect(viewport.visibleLines(1, 4)).toEqual(["line"])
  })
})
