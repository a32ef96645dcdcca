import { describe, expect, it } from "vitest"
import { fileURLToPath } from "node:url"
import { readCapture } from "../src/capture/captureFile.js"
import { replayBatches } from "../src/commands/replay.js"
import { formatFrameDump, frameToText } from "../src/ui/frameRender.js"
import { createTestLogger } from "./helpers/logger.js"

const fixture = fileURLToPath(new URL("./fixtures/two-grids.jsonl", import.meta.url))

describe("replayBatches", () => {
  it("rebuilds every grid from a recorded capture", async () => {
    const capture = await readCapture(fixture)
    expect(capture.badLines).toEqual([])
    const result = replayBatches(capture.batches, { logger: createTestLogger() })

    expect(result.frames.map((frame) => frame.handle)).toEqual([1, 2])
    expect(result.rejected).toBe(0)
    expect(result.stats).toEqual({ applied: 12, dropped: 0, flushes: 3 })
    expect(formatFrameDump(result.frames)).toBe(
      [
        "=== grid 1 (10x3) cursor 0,3 ===",
        "~",
        "~",
        "new",
        "",
        "=== grid 2 (5x1) cursor 0,0 ===",
        "-----",
      ].join("\n"),
    )
  })

  it("keeps the highlight ids written by the capture", async () => {
    const capture = await readCapture(fixture)
    const [first] = replayBatches(capture.batches.slice(0, 2), { logger: createTestLogger() }).frames
    expect(first && frameToText(first)).toEqual(["foo bar", "~", "~"])
    expect(first?.rows[0]?.map((cell) => cell.highlightId)).toEqual([1, 1, 1, 1, 0, 0, 0, null, null, null])
  })

  it("filters to one grid and counts rejected tuples", () => {
    const logger = createTestLogger()
    const result = replayBatches(
      [
        [["grid_resize", [3, 2, 1]], ["grid_line", [3, 0, 0, [["ok"]]]]],
        [["grid_cursor_goto", ["bad"]]],
        [["grid_resize", [4, 1, 1]]],
      ],
      { grid: 3, logger },
    )
    expect(result.frames.map((frame) => frame.handle)).toEqual([3])
    expect(result.rejected).toBe(1)
    expect(logger.warn).toHaveBeenCalledWith("rejected grid_cursor_goto[0]: expected [grid, row, col]")
  })
})
