import type { Key as ReadlineKey } from "readline"

// --- Key events ---

export interface Key {
  /** Named key (`up`, `pagedown`, `return`, `escape`, ...) or the typed character. */
  name: string
  ctrl: boolean
  shift: boolean
  sequence: string
}

export function key(name: string, modifiers: Partial<Omit<Key, "name">> = {}): Key {
  return {
    name,
    ctrl: modifiers.ctrl ?? false,
    shift: modifiers.shift ?? false,
    sequence: modifiers.sequence ?? name,
  }
}

/** Normalises a readline `keypress` payload. */
export function fromKeypress(input: string | undefined, info: ReadlineKey | undefined): Key {
  const sequence = info?.sequence ?? input ?? ""
  // readline names letters in lower case and flags shift; printable
  // characters without a name come through as the raw input.
  let name = info?.name ?? input ?? ""
  if (input && isPrintableChar(input) && !info?.ctrl) {
    name = input
  }
  return {
    name,
    ctrl: info?.ctrl ?? false,
    shift: info?.shift ?? false,
    sequence,
  }
}

function isPrintableChar(value: string): boolean {
  return [...value].length === 1 && value >= " " && value !== "\x7f"
}

export function isPrintable(k: Key): boolean {
  return !k.ctrl && isPrintableChar(k.name)
}
