import { applyGridEvent } from "./eventApplier.js"
import { UnsupportedEventError } from "./errors.js"
import type { GridEvent, RedrawEvent } from "./events.js"
import { FlushCoordinator } from "./flushCoordinator.js"
import { GridRegistry } from "./gridRegistry.js"
import type { Grid } from "./grid.js"
import { HighlightAttrMap } from "./highlightAttrMap.js"
import { createLogger, type Logger } from "../util/log.js"

export interface RedrawDispatcherOptions {
  readonly registry?: GridRegistry
  readonly highlights?: HighlightAttrMap
  readonly flush?: FlushCoordinator
  readonly logger?: Logger
}

export interface DispatchStats {
  applied: number
  dropped: number
  flushes: number
}

/**
 * Single writer for grid and highlight state. Every decoded event goes
 * through `dispatch`, which never throws for a bad event: geometry issues and
 * unsupported parameters are logged and the event is dropped.
 */
export class RedrawDispatcher {
  readonly registry: GridRegistry
  readonly highlights: HighlightAttrMap
  readonly flushCoordinator: FlushCoordinator
  readonly stats: DispatchStats = { applied: 0, dropped: 0, flushes: 0 }
  private readonly log: Logger

  constructor(options: RedrawDispatcherOptions = {}) {
    this.registry = options.registry ?? new GridRegistry()
    this.highlights = options.highlights ?? new HighlightAttrMap()
    this.flushCoordinator = options.flush ?? new FlushCoordinator()
    this.log = options.logger ?? createLogger("grid")
  }

  dispatchAll(events: Iterable<RedrawEvent>): void {
    for (const event of events) {
      this.dispatch(event)
    }
  }

  dispatch(event: RedrawEvent): void {
    switch (event.kind) {
      case "flush":
        this.flushCoordinator.flush()
        this.stats.flushes += 1
        return
      case "default_colors_set":
        this.highlights.setDefaultColors(event.foreground, event.background, event.special)
        this.stats.applied += 1
        return
      case "hl_attr_define":
        try {
          this.highlights.define(event.id, event.attrs)
          this.stats.applied += 1
        } catch (error) {
          this.drop(`hl_attr_define ${event.id} rejected`, error)
        }
        return
      default:
        this.applyToGrid(this.registry.getOrCreate(event.handle), event)
    }
  }

  private applyToGrid(grid: Grid, event: GridEvent): void {
    try {
      const result = applyGridEvent(grid, event)
      for (const issue of result.issues) {
        this.log.warn(`grid ${grid.handle}: ${issue}`)
      }
      if (result.changed) {
        this.flushCoordinator.markDirty(grid)
        this.stats.applied += 1
      } else {
        this.stats.dropped += 1
      }
    } catch (error) {
      if (error instanceof UnsupportedEventError) {
        this.drop(`grid ${grid.handle}: ${error.message}`)
        return
      }
      throw error
    }
  }

  private drop(message: string, detail?: unknown): void {
    this.stats.dropped += 1
    this.log.warn(`${message}; event dropped`, detail)
  }
}
