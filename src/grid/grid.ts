import { BLANK_CELL, blankRow, type Cell } from "./cell.js"

export const DEFAULT_GRID_WIDTH = 80
export const DEFAULT_GRID_HEIGHT = 25

export interface CursorPosition {
  readonly row: number
  readonly col: number
}

/** Immutable copy of a grid taken at flush time. */
export interface GridFrame {
  readonly handle: number
  readonly width: number
  readonly height: number
  readonly cursor: CursorPosition
  readonly rows: ReadonlyArray<ReadonlyArray<Cell>>
}

export type GridListener = (grid: Grid) => void

const toDimension = (value: number): number => (Number.isFinite(value) && value > 0 ? Math.floor(value) : 0)

export class Grid {
  readonly handle: number
  private cells: Cell[][]
  private widthValue: number
  private heightValue: number
  private cursorValue: CursorPosition = { row: 0, col: 0 }
  private readonly listeners = new Set<GridListener>()
  private flushedFrame: GridFrame | null = null

  constructor(handle: number, width = DEFAULT_GRID_WIDTH, height = DEFAULT_GRID_HEIGHT) {
    this.handle = handle
    this.widthValue = toDimension(width)
    this.heightValue = toDimension(height)
    this.cells = Array.from({ length: this.heightValue }, () => blankRow(this.widthValue))
  }

  get width(): number {
    return this.widthValue
  }

  get height(): number {
    return this.heightValue
  }

  get cursor(): CursorPosition {
    return this.cursorValue
  }

  cellAt(row: number, col: number): Cell | undefined {
    return this.cells[row]?.[col]
  }

  rowAt(row: number): ReadonlyArray<Cell> | undefined {
    return this.cells[row]
  }

  rowText(row: number): string {
    return (this.cells[row] ?? []).map((cell) => cell.text).join("")
  }

  /** Swaps in a fresh blank matrix; previous content is not preserved. */
  resize(width: number, height: number): void {
    const nextWidth = toDimension(width)
    const nextHeight = toDimension(height)
    const next = Array.from({ length: nextHeight }, () => blankRow(nextWidth))
    this.cells = next
    this.widthValue = nextWidth
    this.heightValue = nextHeight
  }

  clear(): void {
    for (const row of this.cells) {
      row.fill(BLANK_CELL)
    }
  }

  setCursor(row: number, col: number): void {
    this.cursorValue = { row, col }
  }

  /** Writes `count` copies of `cell` starting at (row, col). Returns how many landed inside the grid. */
  fill(row: number, col: number, count: number, cell: Cell): number {
    const target = this.cells[row]
    if (!target || count <= 0) return 0
    const start = Math.max(col, 0)
    const end = Math.min(col + count, this.widthValue)
    if (end <= start) return 0
    target.fill(cell, start, end)
    return end - start
  }

  copyRowSegment(fromRow: number, toRow: number, left: number, right: number): void {
    const source = this.cells[fromRow]
    const target = this.cells[toRow]
    if (!source || !target) return
    const segment = source.slice(left, right)
    for (let offset = 0; offset < segment.length; offset += 1) {
      target[left + offset] = segment[offset]
    }
  }

  subscribe(listener: GridListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  get subscriberCount(): number {
    return this.listeners.size
  }

  /** Last frame published by `notify`; null until the first flush that touched this grid. */
  get lastFrame(): GridFrame | null {
    return this.flushedFrame
  }

  /** Publishes the current state as a frame and calls every subscriber once; returns the errors thrown by subscribers. */
  notify(): unknown[] {
    this.flushedFrame = this.snapshot()
    const failures: unknown[] = []
    for (const listener of [...this.listeners]) {
      try {
        listener(this)
      } catch (error) {
        failures.push(error)
      }
    }
    return failures
  }

  snapshot(): GridFrame {
    return {
      handle: this.handle,
      width: this.widthValue,
      height: this.heightValue,
      cursor: this.cursorValue,
      rows: this.cells.map((row) => row.slice()),
    }
  }
}
