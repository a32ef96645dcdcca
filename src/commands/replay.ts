import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { readCapture } from "../capture/captureFile.js"
import type { GridFrame } from "../grid/grid.js"
import { RedrawDispatcher, type DispatchStats } from "../grid/redrawDispatcher.js"
import { decodeRedrawBatch } from "../session/redrawDecoder.js"
import { formatFrameDump } from "../ui/frameRender.js"
import { createLogger, type Logger } from "../util/log.js"

export interface ReplayOptions {
  /** Only report this grid handle. */
  readonly grid?: number | null
  readonly logger?: Logger
}

export interface ReplayResult {
  readonly frames: GridFrame[]
  readonly stats: DispatchStats
  readonly rejected: number
}

/** Runs recorded redraw batches through a fresh engine and returns the final state of each grid. */
export const replayBatches = (batches: Iterable<unknown>, options: ReplayOptions = {}): ReplayResult => {
  const log = options.logger ?? createLogger("replay")
  const dispatcher = new RedrawDispatcher({ logger: log })
  let rejected = 0
  for (const batch of batches) {
    const decoded = decodeRedrawBatch(batch)
    for (const issue of decoded.issues) {
      log.warn(`rejected ${issue.kind}[${issue.index}]: ${issue.message}`)
    }
    rejected += decoded.issues.length
    dispatcher.dispatchAll(decoded.events)
  }
  const grids = dispatcher.registry
    .list()
    .filter((grid) => options.grid == null || grid.handle === options.grid)
  return { frames: grids.map((grid) => grid.snapshot()), stats: { ...dispatcher.stats }, rejected }
}

const captureArg = Args.text({ name: "capture" })
const gridOption = Options.integer("grid").pipe(Options.optional)

export const replayCommand = Command.make("replay", { capture: captureArg, grid: gridOption }, ({ capture, grid }) =>
  Effect.tryPromise(async () => {
    const parsed = await readCapture(capture)
    if (parsed.badLines.length > 0) {
      console.warn(`Skipped unreadable lines: ${parsed.badLines.join(", ")}`)
    }
    const result = replayBatches(parsed.batches, { grid: Option.getOrNull(grid) })
    if (result.frames.length === 0) {
      console.log("No grids in capture.")
      return
    }
    console.log(formatFrameDump(result.frames))
    const { applied, dropped, flushes } = result.stats
    console.log(`\n${parsed.batches.length} batches, ${applied} applied, ${dropped} dropped, ${flushes} flushes`)
  }).pipe(
    Effect.catchAll((error) =>
      Console.error(`replay failed: ${error.error instanceof Error ? error.error.message : String(error.error)}`).pipe(
        Effect.zipRight(Effect.sync(() => {
          process.exitCode = 1
        })),
      ),
    ),
  ),
)
