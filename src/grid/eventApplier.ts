import { makeCell } from "./cell.js"
import { UnsupportedEventError } from "./errors.js"
import type { GridEvent, GridLineEvent, GridScrollEvent } from "./events.js"
import type { Grid } from "./grid.js"

export interface ApplyResult {
  /** Whether the grid's cells or cursor may have changed. */
  readonly changed: boolean
  /** Geometry problems found while applying; the event was clamped or dropped. */
  readonly issues: ReadonlyArray<string>
}

const APPLIED: ApplyResult = { changed: true, issues: [] }

const dropped = (issue: string): ApplyResult => ({ changed: false, issues: [issue] })

const normalizeRepeat = (value: number | undefined): number => {
  if (value === undefined) return 1
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0
}

export const applyGridLine = (grid: Grid, event: GridLineEvent): ApplyResult => {
  const { row, colStart, runs, wrap } = event
  if (row < 0 || row >= grid.height) {
    return dropped(`grid_line row ${row} outside height ${grid.height}`)
  }
  if (colStart < 0 || colStart >= grid.width) {
    return dropped(`grid_line col ${colStart} outside width ${grid.width}`)
  }

  let currentRow = row
  let col = colStart
  let highlightId: number | null = null
  let wrapped = false
  let written = 0
  let lost = 0

  for (const [text, runHighlight, repeat] of runs) {
    if (runHighlight != null) highlightId = runHighlight
    const count = normalizeRepeat(repeat)
    if (wrap && !wrapped && col === grid.width) {
      currentRow += 1
      col = 0
      wrapped = true
    }
    const landed = currentRow < grid.height ? grid.fill(currentRow, col, count, makeCell(text, highlightId)) : 0
    written += landed
    lost += count - landed
    col += count
  }

  const issues = lost > 0 ? [`grid_line dropped ${lost} cell(s) outside ${grid.width}x${grid.height} at row ${row}`] : []
  return { changed: written > 0, issues }
}

export const applyGridScroll = (grid: Grid, event: GridScrollEvent): ApplyResult => {
  if (event.cols !== 0) {
    throw new UnsupportedEventError("grid_scroll", `grid_scroll with cols=${event.cols} is not supported`)
  }
  const top = Math.max(event.top, 0)
  const bottom = Math.min(event.bottom, grid.height)
  const left = Math.max(event.left, 0)
  const right = Math.min(event.right, grid.width)
  if (top >= bottom || left >= right) {
    return dropped(
      `grid_scroll region [${event.top},${event.bottom})x[${event.left},${event.right}) outside ${grid.width}x${grid.height}`,
    )
  }
  const issues =
    top !== event.top || bottom !== event.bottom || left !== event.left || right !== event.right
      ? [`grid_scroll region clamped to [${top},${bottom})x[${left},${right})`]
      : []
  const delta = event.rows
  if (delta === 0) return { changed: false, issues }

  if (delta > 0) {
    for (let row = top; row < bottom - delta; row += 1) {
      grid.copyRowSegment(row + delta, row, left, right)
    }
  } else {
    for (let row = bottom - 1; row >= top - delta; row -= 1) {
      grid.copyRowSegment(row + delta, row, left, right)
    }
  }
  return { changed: true, issues }
}

/** Applies one grid event to `grid`. Throws `UnsupportedEventError` for parameters outside the supported subset. */
export const applyGridEvent = (grid: Grid, event: GridEvent): ApplyResult => {
  switch (event.kind) {
    case "grid_resize":
      grid.resize(event.width, event.height)
      return APPLIED
    case "grid_line":
      return applyGridLine(grid, event)
    case "grid_clear":
    case "grid_destroy":
      grid.clear()
      return APPLIED
    case "grid_scroll":
      return applyGridScroll(grid, event)
    case "grid_cursor_goto":
      grid.setCursor(event.row, event.col)
      return APPLIED
    default: {
      const unexpected: never = event
      return dropped(`unexpected grid event ${JSON.stringify(unexpected)}`)
    }
  }
}
