export interface RgbColor {
  readonly r: number
  readonly g: number
  readonly b: number
}

export const STYLE_REVERSE = 1
export const STYLE_BOLD = 1 << 1
export const STYLE_UNDERLINE = 1 << 2
export const STYLE_ITALIC = 1 << 3
export const STYLE_STRIKETHROUGH = 1 << 4

export interface ResolvedAttr {
  readonly foreground: RgbColor
  readonly background: RgbColor
  /** Bitwise OR of the STYLE_* flags. */
  readonly style: number
}

/** Raw attribute dictionary as sent by `hl_attr_define` (rgb variant). */
export interface HighlightAttrDict {
  readonly foreground?: number
  readonly background?: number
  readonly special?: number
  readonly reverse?: boolean
  readonly bold?: boolean
  readonly underline?: boolean
  readonly italic?: boolean
  readonly strikethrough?: boolean
}

type MutableAttrDict = { -readonly [K in keyof HighlightAttrDict]: HighlightAttrDict[K] }

export const DEFAULT_FOREGROUND = 0xffffff
export const DEFAULT_BACKGROUND = 0x000000

export const rgbFromInt = (value: number): RgbColor => ({
  r: (value >> 16) & 0xff,
  g: (value >> 8) & 0xff,
  b: value & 0xff,
})

export const rgbToInt = (color: RgbColor): number => (color.r << 16) | (color.g << 8) | color.b

const STYLE_FIELDS: ReadonlyArray<readonly [keyof HighlightAttrDict, number]> = [
  ["reverse", STYLE_REVERSE],
  ["bold", STYLE_BOLD],
  ["underline", STYLE_UNDERLINE],
  ["italic", STYLE_ITALIC],
  ["strikethrough", STYLE_STRIKETHROUGH],
]

export const hasStyle = (attr: ResolvedAttr, flag: number): boolean => (attr.style & flag) !== 0

export const attrDictToResolved = (dict: HighlightAttrDict): ResolvedAttr => {
  let style = 0
  for (const [field, flag] of STYLE_FIELDS) {
    if (dict[field] === true) style |= flag
  }
  return {
    foreground: rgbFromInt(dict.foreground ?? DEFAULT_FOREGROUND),
    background: rgbFromInt(dict.background ?? DEFAULT_BACKGROUND),
    style,
  }
}

const ATTR_KEYS: ReadonlyArray<keyof HighlightAttrDict> = [
  "foreground",
  "background",
  "special",
  "reverse",
  "bold",
  "underline",
  "italic",
  "strikethrough",
]

const mergeOverDefaults = (defaults: HighlightAttrDict, dict: HighlightAttrDict): HighlightAttrDict => {
  const merged: MutableAttrDict = { ...defaults }
  for (const key of ATTR_KEYS) {
    const value = dict[key]
    if (value === undefined) continue
    Object.assign(merged, { [key]: value })
  }
  return merged
}

/**
 * Highlight id to resolved attribute lookup.
 *
 * Definitions and default colours only mark the cache dirty; the whole cache,
 * defaults included, is rebuilt by the next `resolve`. Each definition is
 * merged field by field over the default colours, so a definition carrying
 * only `bold` still picks up the default foreground and background.
 */
export class HighlightAttrMap {
  private readonly defaultDict: MutableAttrDict = {}
  private readonly rawDefs = new Map<number, HighlightAttrDict>()
  private readonly resolvedCache = new Map<number, ResolvedAttr>()
  private defaultAttrs: ResolvedAttr = attrDictToResolved({})
  private dirty = false

  setDefaultColors(foreground: number | null, background: number | null, special: number | null): void {
    const assign = (key: "foreground" | "background" | "special", value: number | null) => {
      if (value == null || value < 0) {
        delete this.defaultDict[key]
      } else {
        this.defaultDict[key] = value
      }
    }
    assign("foreground", foreground)
    assign("background", background)
    assign("special", special)
    this.dirty = true
  }

  define(id: number, dict: HighlightAttrDict): void {
    if (!Number.isInteger(id) || id < 0) {
      throw new RangeError(`Highlight id must be a non-negative integer, received ${id}`)
    }
    this.rawDefs.set(id, { ...dict })
    this.dirty = true
  }

  resolve(id: number | null | undefined): ResolvedAttr {
    if (this.dirty) this.refresh()
    if (id == null) return this.defaultAttrs
    return this.resolvedCache.get(id) ?? this.defaultAttrs
  }

  get defaults(): ResolvedAttr {
    return this.resolve(null)
  }

  get isDirty(): boolean {
    return this.dirty
  }

  private refresh(): void {
    this.defaultAttrs = attrDictToResolved(this.defaultDict)
    this.resolvedCache.clear()
    for (const [id, dict] of this.rawDefs) {
      this.resolvedCache.set(id, attrDictToResolved(mergeOverDefaults(this.defaultDict, dict)))
    }
    this.dirty = false
  }
}
