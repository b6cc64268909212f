import namedEntities from "@/src/core/named-entities.json"

// --- HTML entity decoding ---

interface TrieNode {
  children: Map<string, TrieNode>
  // Registration index of the pattern ending here; lower wins.
  match?: { priority: number; replacement: string }
}

/**
 * Multi-pattern matcher over the named entity table. At a given position the
 * earliest-registered pattern that matches wins, regardless of length.
 */
export class EntityMatcher {
  private root: TrieNode = { children: new Map() }

  constructor(entries: ReadonlyArray<readonly [string, string]>) {
    entries.forEach(([pattern, replacement], priority) => {
      let node = this.root
      for (const ch of pattern) {
        let next = node.children.get(ch)
        if (!next) {
          next = { children: new Map() }
          node.children.set(ch, next)
        }
        node = next
      }
      node.match ??= { priority, replacement }
    })
  }

  /** Longest-walk match starting at `index`, resolved by registration order. */
  matchAt(text: string, index: number): { length: number; replacement: string } | undefined {
    let node: TrieNode | undefined = this.root
    let best: { length: number; replacement: string; priority: number } | undefined
    let i = index
    while (node && i < text.length) {
      node = node.children.get(text[i])
      i++
      if (node?.match && (!best || node.match.priority < best.priority)) {
        best = { length: i - index, ...node.match }
      }
    }
    return best && { length: best.length, replacement: best.replacement }
  }

  replaceAll(text: string): string {
    let result = ""
    let last = 0
    let pos = text.indexOf("&")
    while (pos !== -1) {
      const found = this.matchAt(text, pos)
      if (found) {
        result += text.slice(last, pos) + found.replacement
        last = pos + found.length
        pos = text.indexOf("&", last)
      } else {
        pos = text.indexOf("&", pos + 1)
      }
    }
    return last === 0 ? text : result + text.slice(last)
  }
}

function toEntries(value: unknown): Array<[string, string]> {
  if (!Array.isArray(value)) return []
  const entries: Array<[string, string]> = []
  for (const item of value) {
    if (Array.isArray(item) && typeof item[0] === "string" && typeof item[1] === "string") {
      entries.push([item[0], item[1]])
    }
  }
  return entries
}

const NAMED_ENTITIES = new EntityMatcher(toEntries(namedEntities))

const DECIMAL = /^[0-9]$/
const HEX = /^[0-9a-fA-F]$/

function isScalarValue(code: number): boolean {
  return code <= 0x10ffff && !(code >= 0xd800 && code <= 0xdfff)
}

/**
 * Decodes `&#NNN;` and `&#xHHH;` references. Anything malformed or outside
 * the Unicode scalar range is copied through as written.
 */
export function decodeNumericEntities(text: string): string {
  if (!text.includes("&#")) return text

  let result = ""
  let i = 0
  while (i < text.length) {
    if (!text.startsWith("&#", i)) {
      result += text[i]
      i++
      continue
    }

    let j = i + 2
    const marker = text[j] === "x" || text[j] === "X" ? text[j] : ""
    j += marker.length
    const digit = marker ? HEX : DECIMAL

    let digits = ""
    while (j < text.length && digit.test(text[j])) {
      digits += text[j]
      j++
    }

    const prefix = "&#" + marker + digits
    if (digits && text[j] === ";") {
      const code = Number.parseInt(digits, marker ? 16 : 10)
      result += isScalarValue(code) ? String.fromCodePoint(code) : prefix + ";"
      j++
    } else {
      // Leave whatever follows for the next iteration.
      result += prefix
    }
    i = j
  }

  return result
}

/** Decode named and numeric HTML entities. Returns the input itself when it has no `&`. */
export function decodeHtmlEntities(text: string): string {
  if (!text.includes("&")) return text
  return decodeNumericEntities(NAMED_ENTITIES.replaceAll(text))
}
