import type { ChalkInstance } from "chalk"
import type { Cell } from "../grid/cell.js"
import type { CursorPosition, GridFrame } from "../grid/grid.js"
import {
  STYLE_BOLD,
  STYLE_ITALIC,
  STYLE_REVERSE,
  STYLE_STRIKETHROUGH,
  STYLE_UNDERLINE,
  hasStyle,
  type ResolvedAttr,
} from "../grid/highlightAttrMap.js"

export interface AttrResolver {
  resolve(id: number | null | undefined): ResolvedAttr
}

export interface StyledSegment {
  readonly text: string
  readonly attr: ResolvedAttr
  readonly cursor: boolean
}

export interface FrameRenderOptions {
  readonly showCursor?: boolean
}

/** The cursor may sit outside the grid right after a resize; pull it back inside. */
export const clampCursor = (frame: Pick<GridFrame, "width" | "height" | "cursor">): CursorPosition | null => {
  if (frame.width <= 0 || frame.height <= 0) return null
  return {
    row: Math.min(Math.max(frame.cursor.row, 0), frame.height - 1),
    col: Math.min(Math.max(frame.cursor.col, 0), frame.width - 1),
  }
}

export const buildRowSegments = (
  row: ReadonlyArray<Cell>,
  highlights: AttrResolver,
  cursorCol: number | null,
): StyledSegment[] => {
  const segments: StyledSegment[] = []
  let text = ""
  let highlightId: number | null = null
  let started = false

  const close = () => {
    if (started && text.length > 0) {
      segments.push({ text, attr: highlights.resolve(highlightId), cursor: false })
    }
    text = ""
    started = false
  }

  row.forEach((cell, col) => {
    if (col === cursorCol) {
      close()
      segments.push({ text: cell.text === "" ? " " : cell.text, attr: highlights.resolve(cell.highlightId), cursor: true })
      return
    }
    // Empty text marks the right half of a double-width character.
    if (cell.text === "") return
    if (!started || cell.highlightId !== highlightId) {
      close()
      highlightId = cell.highlightId
      started = true
    }
    text += cell.text
  })
  close()
  return segments
}

export const paintSegment = (segment: StyledSegment, painter: ChalkInstance): string => {
  const { attr } = segment
  let style = painter
    .rgb(attr.foreground.r, attr.foreground.g, attr.foreground.b)
    .bgRgb(attr.background.r, attr.background.g, attr.background.b)
  if (hasStyle(attr, STYLE_REVERSE) !== segment.cursor) style = style.inverse
  if (hasStyle(attr, STYLE_BOLD)) style = style.bold
  if (hasStyle(attr, STYLE_UNDERLINE)) style = style.underline
  if (hasStyle(attr, STYLE_ITALIC)) style = style.italic
  if (hasStyle(attr, STYLE_STRIKETHROUGH)) style = style.strikethrough
  return style(segment.text)
}

export const renderFrameLines = (
  frame: GridFrame,
  highlights: AttrResolver,
  painter: ChalkInstance,
  options: FrameRenderOptions = {},
): string[] => {
  const cursor = options.showCursor === false ? null : clampCursor(frame)
  return frame.rows.map((row, index) => {
    const cursorCol = cursor && cursor.row === index ? cursor.col : null
    return buildRowSegments(row, highlights, cursorCol)
      .map((segment) => paintSegment(segment, painter))
      .join("")
  })
}

export const frameToText = (frame: GridFrame): string[] =>
  frame.rows.map((row) =>
    row
      .map((cell) => cell.text)
      .join("")
      .trimEnd(),
  )

export const formatFrameDump = (frames: ReadonlyArray<GridFrame>): string =>
  frames
    .map((frame) => {
      const header = `=== grid ${frame.handle} (${frame.width}x${frame.height}) cursor ${frame.cursor.row},${frame.cursor.col} ===`
      return [header, ...frameToText(frame)].join("\n")
    })
    .join("\n\n")
