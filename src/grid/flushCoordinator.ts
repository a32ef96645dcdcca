import type { Grid } from "./grid.js"
import { createLogger } from "../util/log.js"

const log = createLogger("flush")

export class FlushCoordinator {
  private pending = new Set<Grid>()

  markDirty(grid: Grid): void {
    this.pending.add(grid)
  }

  isDirty(grid: Grid): boolean {
    return this.pending.has(grid)
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /** Notifies the subscribers of every grid touched since the last flush. Returns the grids notified. */
  flush(): Grid[] {
    const grids = [...this.pending]
    this.pending = new Set()
    for (const grid of grids) {
      for (const failure of grid.notify()) {
        log.error(`subscriber of grid ${grid.handle} failed`, failure)
      }
    }
    return grids
  }
}
