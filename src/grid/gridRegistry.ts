import { DEFAULT_GRID_HEIGHT, DEFAULT_GRID_WIDTH, Grid } from "./grid.js"

export type GridCreatedListener = (grid: Grid) => void

/**
 * Owns every grid for the lifetime of a session. Handles are never removed:
 * `grid_destroy` clears a grid in place so that a reissued handle finds its
 * subscribers still attached.
 */
export class GridRegistry {
  private readonly grids = new Map<number, Grid>()
  private readonly createdListeners = new Set<GridCreatedListener>()

  constructor(
    private readonly defaultWidth = DEFAULT_GRID_WIDTH,
    private readonly defaultHeight = DEFAULT_GRID_HEIGHT,
  ) {}

  get(handle: number): Grid | undefined {
    return this.grids.get(handle)
  }

  getOrCreate(handle: number): Grid {
    const existing = this.grids.get(handle)
    if (existing) return existing
    const grid = new Grid(handle, this.defaultWidth, this.defaultHeight)
    this.grids.set(handle, grid)
    for (const listener of [...this.createdListeners]) {
      listener(grid)
    }
    return grid
  }

  onGridCreated(listener: GridCreatedListener): () => void {
    this.createdListeners.add(listener)
    return () => {
      this.createdListeners.delete(listener)
    }
  }

  handles(): number[] {
    return [...this.grids.keys()].sort((a, b) => a - b)
  }

  list(): Grid[] {
    return [...this.grids.values()].sort((a, b) => a.handle - b.handle)
  }

  get size(): number {
    return this.grids.size
  }
}
