import type { Key } from "ink"

type KeyFlags = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "ctrl"
  | "shift"
  | "tab"
  | "backspace"
  | "delete"
  | "meta"
>

const NAMED_KEYS: ReadonlyArray<readonly [keyof KeyFlags, string]> = [
  ["return", "CR"],
  ["escape", "Esc"],
  ["leftArrow", "Left"],
  ["rightArrow", "Right"],
  ["upArrow", "Up"],
  ["downArrow", "Down"],
  // The terminal's Backspace byte (0x7f) arrives as `delete`; forward delete is indistinguishable from it.
  ["backspace", "BS"],
  ["delete", "BS"],
  ["tab", "Tab"],
  ["pageUp", "PageUp"],
  ["pageDown", "PageDown"],
]

/** Escapes literal text so `<` is not read as the start of a key name. */
export const escapeKeyText = (text: string): string => text.replace(/</g, "<LT>")

const withModifiers = (name: string, key: Partial<KeyFlags>): string => {
  const prefix = `${key.ctrl ? "C-" : ""}${key.meta ? "M-" : ""}${key.shift && name.length > 1 ? "S-" : ""}`
  return `<${prefix}${name}>`
}

/**
 * Translates one ink key event into editor key notation (`<CR>`, `<C-w>`,
 * `<M-x>`, plain text). Returns null when the event carries nothing to send.
 */
export const keyToInput = (input: string, key: Partial<KeyFlags>): string | null => {
  // ink reports a bare Esc with `meta` set.
  if (key.escape) return "<Esc>"
  for (const [flag, name] of NAMED_KEYS) {
    if (!key[flag]) continue
    if (flag === "tab" && key.shift) return "<S-Tab>"
    const hasModifier = key.ctrl === true || key.meta === true
    return hasModifier ? withModifiers(name, key) : `<${name}>`
  }
  if (input.length === 0) return null
  if (key.ctrl || key.meta) {
    const char = [...input][0]?.toLowerCase() ?? ""
    if (!char) return null
    return withModifiers(char === "<" ? "LT" : char, { ctrl: key.ctrl, meta: key.meta })
  }
  return escapeKeyText(input)
}
