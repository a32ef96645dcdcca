import { describe, expect, it } from "vitest"
import { Grid } from "../grid.js"
import { applyGridEvent, applyGridLine, applyGridScroll } from "../eventApplier.js"
import { UnsupportedEventError } from "../errors.js"
import type { GridLineEvent, GridScrollEvent } from "../events.js"
import { gridFromLines, gridLines } from "../../../tests/helpers/grids.js"

const line = (partial: Partial<GridLineEvent> & Pick<GridLineEvent, "runs">): GridLineEvent => ({
  kind: "grid_line",
  handle: 1,
  row: 0,
  colStart: 0,
  wrap: false,
  ...partial,
})

const scroll = (partial: Partial<GridScrollEvent>): GridScrollEvent => ({
  kind: "grid_scroll",
  handle: 1,
  top: 0,
  bottom: 3,
  left: 0,
  right: 5,
  rows: 1,
  cols: 0,
  ...partial,
})

describe("applyGridLine", () => {
  it("repeats runs and carries the highlight id forward", () => {
    const grid = new Grid(1, 10, 3)
    const result = applyGridLine(grid, line({ row: 0, colStart: 2, runs: [["X", 3, 2], ["Y"]] }))
    expect(result).toEqual({ changed: true, issues: [] })
    expect(grid.cellAt(0, 2)).toEqual({ text: "X", highlightId: 3 })
    expect(grid.cellAt(0, 3)).toEqual({ text: "X", highlightId: 3 })
    expect(grid.cellAt(0, 4)).toEqual({ text: "Y", highlightId: 3 })
    expect(grid.rowText(0)).toBe("  XXY     ")
  })

  it("treats an explicit null id like an omitted one", () => {
    const grid = new Grid(1, 4, 1)
    applyGridLine(grid, line({ runs: [["a", 9], ["b", null, 2]] }))
    expect(grid.cellAt(0, 2)).toEqual({ text: "b", highlightId: 9 })
  })

  it("starts every event with no carried highlight", () => {
    const grid = new Grid(1, 4, 1)
    applyGridLine(grid, line({ runs: [["a", 4]] }))
    applyGridLine(grid, line({ colStart: 1, runs: [["b"]] }))
    expect(grid.cellAt(0, 1)).toEqual({ text: "b", highlightId: null })
  })

  it("clips cells past the right edge and reports them", () => {
    const grid = new Grid(1, 4, 2)
    const result = applyGridLine(grid, line({ colStart: 2, runs: [["a"], ["b"], ["c"], ["d"]] }))
    expect(result).toEqual({ changed: true, issues: ["grid_line dropped 2 cell(s) outside 4x2 at row 0"] })
    expect(gridLines(grid)).toEqual(["  ab", "    "])
  })

  it("spills onto the next row once when wrap is set", () => {
    const grid = new Grid(1, 4, 2)
    const result = applyGridLine(grid, line({ colStart: 2, wrap: true, runs: [["a"], ["b"], ["c"], ["d"]] }))
    expect(result).toEqual({ changed: true, issues: [] })
    expect(gridLines(grid)).toEqual(["  ab", "cd  "])
  })

  it("drops an event whose start lies outside the grid", () => {
    const grid = new Grid(1, 4, 2)
    expect(applyGridLine(grid, line({ row: 5, runs: [["a"]] }))).toEqual({
      changed: false,
      issues: ["grid_line row 5 outside height 2"],
    })
    expect(applyGridLine(grid, line({ colStart: 4, runs: [["a"]] }))).toEqual({
      changed: false,
      issues: ["grid_line col 4 outside width 4"],
    })
    expect(gridLines(grid)).toEqual(["    ", "    "])
  })

  it("writes nothing for a zero repeat", () => {
    const grid = new Grid(1, 3, 1)
    expect(applyGridLine(grid, line({ runs: [["z", 1, 0]] }))).toEqual({ changed: false, issues: [] })
    expect(grid.rowText(0)).toBe("   ")
  })
})

describe("applyGridScroll", () => {
  it("moves content up for positive rows and leaves the vacated row as it was", () => {
    const grid = gridFromLines(["AAAAA", "BBBBB", "CCCCC"])
    applyGridScroll(grid, scroll({ rows: 1 }))
    expect(gridLines(grid)).toEqual(["BBBBB", "CCCCC", "CCCCC"])
  })

  it("moves content down for negative rows", () => {
    const grid = gridFromLines(["AAAAA", "BBBBB", "CCCCC"])
    applyGridScroll(grid, scroll({ rows: -1 }))
    expect(gridLines(grid)).toEqual(["AAAAA", "AAAAA", "BBBBB"])
  })

  it("only touches columns inside the region", () => {
    const grid = gridFromLines(["AAAAA", "BBBBB", "CCCCC"])
    applyGridScroll(grid, scroll({ left: 1, right: 3 }))
    expect(gridLines(grid)).toEqual(["ABBAA", "BCCBB", "CCCCC"])
  })

  it("clamps an oversized region", () => {
    const grid = gridFromLines(["AA", "BB"])
    const result = applyGridScroll(grid, scroll({ bottom: 9, right: 9 }))
    expect(result).toEqual({ changed: true, issues: ["grid_scroll region clamped to [0,2)x[0,2)"] })
    expect(gridLines(grid)).toEqual(["BB", "BB"])
  })

  it("reports no change for a zero-row scroll", () => {
    const grid = gridFromLines(["AAAAA", "BBBBB", "CCCCC"])
    expect(applyGridScroll(grid, scroll({ rows: 0 }))).toEqual({ changed: false, issues: [] })
  })

  it("rejects horizontal scrolling", () => {
    const grid = gridFromLines(["AAAAA", "BBBBB", "CCCCC"])
    expect(() => applyGridScroll(grid, scroll({ cols: 2 }))).toThrow(UnsupportedEventError)
    expect(gridLines(grid)).toEqual(["AAAAA", "BBBBB", "CCCCC"])
  })
})

describe("applyGridEvent", () => {
  it("resizes to a blank matrix of the new size", () => {
    const grid = gridFromLines(["abc", "def"])
    applyGridEvent(grid, { kind: "grid_resize", handle: 1, width: 4, height: 3 })
    expect(grid.width).toBe(4)
    expect(grid.height).toBe(3)
    expect(gridLines(grid)).toEqual(["    ", "    ", "    "])
  })

  it("clears on grid_clear and grid_destroy", () => {
    const grid = gridFromLines(["ab"])
    applyGridEvent(grid, { kind: "grid_clear", handle: 1 })
    expect(grid.rowText(0)).toBe("  ")
    const other = gridFromLines(["cd"])
    applyGridEvent(other, { kind: "grid_destroy", handle: 1 })
    expect(other.rowText(0)).toBe("  ")
  })

  it("moves the cursor", () => {
    const grid = new Grid(1, 5, 5)
    expect(applyGridEvent(grid, { kind: "grid_cursor_goto", handle: 1, row: 3, col: 2 }).changed).toBe(true)
    expect(grid.cursor).toEqual({ row: 3, col: 2 })
  })
})
