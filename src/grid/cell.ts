export interface Cell {
  readonly text: string
  readonly highlightId: number | null
}

export const BLANK_CELL: Cell = Object.freeze({ text: " ", highlightId: null })

export const makeCell = (text: string, highlightId: number | null): Cell => {
  if (text === " " && highlightId == null) return BLANK_CELL
  return Object.freeze({ text, highlightId })
}

export const blankRow = (width: number): Cell[] => Array.from({ length: width }, () => BLANK_CELL)
