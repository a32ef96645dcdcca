import type { GridLineRun, RedrawEvent, RedrawEventKind } from "../grid/events.js"
import type { HighlightAttrDict } from "../grid/highlightAttrMap.js"

export interface DecodeIssue {
  readonly kind: string
  readonly index: number
  readonly message: string
}

export interface DecodedBatch {
  readonly events: RedrawEvent[]
  readonly issues: DecodeIssue[]
  /** Event names present in the batch that the engine does not handle. */
  readonly ignored: string[]
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const isInteger = (value: unknown): value is number => typeof value === "number" && Number.isInteger(value)

const readInts = (values: ReadonlyArray<unknown>, count: number): number[] | null => {
  if (values.length < count) return null
  const ints: number[] = []
  for (const value of values.slice(0, count)) {
    if (!isInteger(value)) return null
    ints.push(value)
  }
  return ints
}

const optionalColor = (value: unknown): number | null => (isInteger(value) ? value : null)

const HL_COLOR_FIELDS = ["foreground", "background", "special"] as const
const HL_STYLE_FIELDS = ["reverse", "bold", "underline", "italic", "strikethrough"] as const

const readHighlightDict = (source: Record<string, unknown>): HighlightAttrDict => {
  const dict: { -readonly [K in keyof HighlightAttrDict]: HighlightAttrDict[K] } = {}
  for (const field of HL_COLOR_FIELDS) {
    const value = source[field]
    if (isInteger(value)) dict[field] = value
  }
  for (const field of HL_STYLE_FIELDS) {
    const value = source[field]
    if (typeof value === "boolean") dict[field] = value
  }
  return dict
}

const readRun = (value: unknown): GridLineRun | null => {
  if (!Array.isArray(value) || value.length === 0) return null
  const [text, highlightId, repeat]: unknown[] = value
  if (typeof text !== "string") return null
  const hl = highlightId == null ? null : isInteger(highlightId) ? highlightId : undefined
  const count = repeat == null ? null : isInteger(repeat) ? repeat : undefined
  if (hl === undefined || count === undefined) return null
  if (count != null) return [text, hl, count]
  if (hl != null) return [text, hl]
  return [text]
}

type TupleDecoder = (args: ReadonlyArray<unknown>) => RedrawEvent | string

const DECODERS: Record<RedrawEventKind, TupleDecoder> = {
  grid_resize: (args) => {
    const ints = readInts(args, 3)
    if (!ints) return "expected [grid, width, height]"
    const [handle, width, height] = ints
    return { kind: "grid_resize", handle, width, height }
  },
  grid_line: (args) => {
    const ints = readInts(args, 3)
    const cells = args[3]
    if (!ints || !Array.isArray(cells)) return "expected [grid, row, col_start, cells, wrap?]"
    const [handle, row, colStart] = ints
    const runs: GridLineRun[] = []
    for (const raw of cells) {
      const run = readRun(raw)
      if (!run) return `malformed cell run ${JSON.stringify(raw)}`
      runs.push(run)
    }
    return { kind: "grid_line", handle, row, colStart, runs, wrap: args[4] === true }
  },
  grid_clear: (args) => {
    const ints = readInts(args, 1)
    if (!ints) return "expected [grid]"
    return { kind: "grid_clear", handle: ints[0] }
  },
  grid_destroy: (args) => {
    const ints = readInts(args, 1)
    if (!ints) return "expected [grid]"
    return { kind: "grid_destroy", handle: ints[0] }
  },
  grid_scroll: (args) => {
    const ints = readInts(args, 7)
    if (!ints) return "expected [grid, top, bot, left, right, rows, cols]"
    const [handle, top, bottom, left, right, rows, cols] = ints
    return { kind: "grid_scroll", handle, top, bottom, left, right, rows, cols }
  },
  grid_cursor_goto: (args) => {
    const ints = readInts(args, 3)
    if (!ints) return "expected [grid, row, col]"
    const [handle, row, col] = ints
    return { kind: "grid_cursor_goto", handle, row, col }
  },
  default_colors_set: (args) => {
    if (args.length < 3) return "expected [rgb_fg, rgb_bg, rgb_sp, ...]"
    return {
      kind: "default_colors_set",
      foreground: optionalColor(args[0]),
      background: optionalColor(args[1]),
      special: optionalColor(args[2]),
    }
  },
  hl_attr_define: (args) => {
    const [id, rgbAttrs] = args
    if (!isInteger(id) || !isRecord(rgbAttrs)) return "expected [id, rgb_attr, ...]"
    return { kind: "hl_attr_define", id, attrs: readHighlightDict(rgbAttrs) }
  },
  flush: () => ({ kind: "flush" }),
}

const isHandledKind = (name: string): name is RedrawEventKind => Object.prototype.hasOwnProperty.call(DECODERS, name)

/**
 * Splits the arguments of one `redraw` notification into typed events.
 * A notification is a list of `[name, ...argTuples]` groups; each tuple
 * becomes one event and order is kept within and across groups.
 */
export const decodeRedrawBatch = (batch: unknown): DecodedBatch => {
  const events: RedrawEvent[] = []
  const issues: DecodeIssue[] = []
  const ignored: string[] = []
  if (!Array.isArray(batch)) {
    issues.push({ kind: "redraw", index: -1, message: "redraw payload is not an array" })
    return { events, issues, ignored }
  }
  batch.forEach((group: unknown, groupIndex) => {
    if (!Array.isArray(group) || typeof group[0] !== "string") {
      issues.push({ kind: "redraw", index: groupIndex, message: "malformed event group" })
      return
    }
    const name: string = group[0]
    const tuples: unknown[] = group.slice(1)
    if (!isHandledKind(name)) {
      if (!ignored.includes(name)) ignored.push(name)
      return
    }
    const decode = DECODERS[name]
    if (tuples.length === 0 && name === "flush") {
      events.push({ kind: "flush" })
      return
    }
    tuples.forEach((tuple, index) => {
      if (!Array.isArray(tuple)) {
        issues.push({ kind: name, index, message: "argument tuple is not an array" })
        return
      }
      const decoded = decode(tuple)
      if (typeof decoded === "string") {
        issues.push({ kind: name, index, message: decoded })
        return
      }
      events.push(decoded)
    })
  })
  return { events, issues, ignored }
}
