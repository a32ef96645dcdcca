import { describe, expect, it } from "vitest"
import { EditorSession } from "../editorSession.js"
import { QueueOverflowError, RemoteConnectionError } from "../errors.js"
import type { Grid } from "../../grid/grid.js"
import { RedrawDispatcher } from "../../grid/redrawDispatcher.js"
import { FakeRemote, createManualScheduler } from "../../../tests/helpers/fakeRemote.js"
import { createTestLogger } from "../../../tests/helpers/logger.js"

const HELLO_BATCH = [
  ["grid_resize", [1, 8, 2]],
  ["grid_line", [1, 0, 0, [["h"], ["i"]]]],
  ["grid_cursor_goto", [1, 0, 2]],
  ["flush", []],
]

const createHarness = (options: { queueCapacity?: number } = {}) => {
  const remote = new FakeRemote()
  const scheduler = createManualScheduler()
  const logger = createTestLogger()
  const session = new EditorSession({
    remote,
    dispatcher: new RedrawDispatcher({ logger: createTestLogger() }),
    schedule: scheduler.schedule,
    logger,
    queueCapacity: options.queueCapacity,
  })
  session.start()
  return { remote, scheduler, logger, session }
}

describe("EditorSession", () => {
  it("applies redraw batches on the drain tick, not in the transport callback", () => {
    const { remote, scheduler, session } = createHarness()
    const flushed: Grid[][] = []
    session.onFlush((grids) => flushed.push(grids))

    remote.emitRedraw(HELLO_BATCH)
    expect(session.queuedEvents).toBe(4)
    expect(session.registry.size).toBe(0)
    expect(scheduler.pending).toBe(1)

    scheduler.runAll()
    const grid = session.registry.get(1)
    expect(grid?.rowText(0)).toBe("hi      ")
    expect(grid?.cursor).toEqual({ row: 0, col: 2 })
    expect(flushed).toHaveLength(1)
    expect(flushed[0]?.map((entry) => entry.handle)).toEqual([1])
    expect(session.queuedEvents).toBe(0)
  })

  it("schedules one drain for several batches", () => {
    const { remote, scheduler, session } = createHarness()
    remote.emitRedraw([["grid_resize", [1, 4, 1]]])
    remote.emitRedraw([["grid_line", [1, 0, 0, [["x"]]]]])
    expect(scheduler.pending).toBe(1)
    scheduler.runAll()
    expect(session.registry.get(1)?.rowText(0)).toBe("x   ")
  })

  it("applies events queued before a transport error, then stops with that error", async () => {
    const { remote, scheduler, session, logger } = createHarness()
    remote.emitRedraw(HELLO_BATCH)
    remote.emitClose(new Error("pipe broke"))
    scheduler.runAll()

    expect(session.registry.get(1)?.rowText(0)).toBe("hi      ")
    const exit = await session.untilStopped()
    expect(exit.reason).toBe("error")
    expect(exit.error).toBeInstanceOf(RemoteConnectionError)
    expect(exit.error?.message).toBe("pipe broke")
    expect(logger.error).toHaveBeenCalledWith("pipe broke")
    expect(remote.shutdownCalls).toEqual([100])
    expect(remote.listenerCount).toBe(0)
  })

  it("ends with remote-closed when the editor quits cleanly", async () => {
    const { remote, scheduler, session } = createHarness()
    remote.emitClose(null)
    scheduler.runAll()
    const exit = await session.untilStopped()
    expect(exit).toEqual({ reason: "remote-closed", shutdown: { timedOut: false } })
    expect(session.stopped).toBe(true)
  })

  it("treats a queue overflow as fatal", async () => {
    const { remote, scheduler, session } = createHarness({ queueCapacity: 2 })
    remote.emitRedraw(HELLO_BATCH)
    expect(session.queuedEvents).toBe(0)
    scheduler.runAll()
    const exit = await session.untilStopped()
    expect(exit.reason).toBe("error")
    expect(exit.error).toBeInstanceOf(QueueOverflowError)
    expect(exit.error?.message).toBe("Redraw queue exceeded its capacity of 2 events")
    expect(session.registry.size).toBe(0)
  })

  it("refuses every batch after an overflow so no later flush draws a partial frame", async () => {
    const { remote, scheduler, session } = createHarness({ queueCapacity: 6 })
    const flushed: Grid[][] = []
    session.onFlush((grids) => flushed.push(grids))

    remote.emitRedraw(HELLO_BATCH)
    remote.emitRedraw([
      ["grid_line", [1, 1, 0, [["x"]]]],
      ["grid_line", [1, 1, 1, [["y"]]]],
      ["flush", []],
    ])
    remote.emitRedraw([
      ["grid_cursor_goto", [1, 1, 0]],
      ["flush", []],
    ])
    expect(session.queuedEvents).toBe(4)

    scheduler.runAll()
    const exit = await session.untilStopped()
    expect(exit.error).toBeInstanceOf(QueueOverflowError)
    expect(flushed).toHaveLength(1)
    expect(session.registry.get(1)?.cursor).toEqual({ row: 0, col: 2 })
  })

  it("stops on request and reports a shutdown timeout", async () => {
    const { remote, session, logger } = createHarness()
    remote.shutdownResult = { timedOut: true }
    const exit = await session.stop()
    expect(exit).toEqual({ reason: "quit", shutdown: { timedOut: true } })
    expect(logger.warn).toHaveBeenCalledWith("editor did not exit within 100ms; continuing")
    expect(await session.stop()).toBe(exit)
    expect(remote.shutdownCalls).toEqual([100])
  })

  it("ignores redraws and keys after stopping", async () => {
    const { remote, scheduler, session } = createHarness()
    await session.stop()
    remote.emitRedraw(HELLO_BATCH)
    session.sendKeys("i")
    await session.input.idle()
    expect(scheduler.pending).toBe(0)
    expect(remote.sent).toEqual([])
  })

  it("forwards keys to the remote in order", async () => {
    const { remote, session } = createHarness()
    session.sendKeys("i")
    session.sendKeys("<Esc>")
    session.sendKeys(":wq<CR>")
    await session.input.idle()
    expect(remote.sent).toEqual(["i", "<Esc>", ":wq<CR>"])
  })

  it("surfaces a failed key delivery on the next tick", async () => {
    const { remote, scheduler, session } = createHarness()
    remote.inputError = new Error("write EPIPE")
    session.sendKeys("x")
    await session.input.idle()
    scheduler.runAll()
    const exit = await session.untilStopped()
    expect(exit.reason).toBe("error")
    expect(exit.error).toBeInstanceOf(RemoteConnectionError)
    expect(exit.error?.message).toBe("Failed to deliver input to the editor")
    expect(exit.error?.cause).toBe(remote.inputError)
  })

  it("logs decode problems and drops the bad tuple only", () => {
    const { remote, scheduler, session, logger } = createHarness()
    remote.emitRedraw([
      ["grid_cursor_goto", [1, "row", 0]],
      ["grid_resize", [1, 3, 1]],
      ["mode_change", ["normal", 0]],
    ])
    scheduler.runAll()
    expect(logger.warn).toHaveBeenCalledWith("rejected grid_cursor_goto[0]: expected [grid, row, col]")
    expect(logger.debug).toHaveBeenCalledWith("ignored redraw events: mode_change")
    expect(session.registry.get(1)?.width).toBe(3)
  })
})
