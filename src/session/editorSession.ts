import { EventEmitter } from "node:events"
import type { RedrawEvent } from "../grid/events.js"
import { RedrawDispatcher } from "../grid/redrawDispatcher.js"
import type { Grid } from "../grid/grid.js"
import type { GridRegistry } from "../grid/gridRegistry.js"
import type { HighlightAttrMap } from "../grid/highlightAttrMap.js"
import { InputBridge } from "../input/inputBridge.js"
import type { RemoteEditor, ShutdownResult } from "../remote/types.js"
import { createLogger, type Logger } from "../util/log.js"
import { QueueOverflowError, RemoteConnectionError } from "./errors.js"
import { EventQueue } from "./eventQueue.js"
import { decodeRedrawBatch } from "./redrawDecoder.js"

export const DEFAULT_QUEUE_CAPACITY = 65_536
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 100

export type Scheduler = (task: () => void) => void

export const immediateScheduler: Scheduler = (task) => {
  setImmediate(task)
}

export type SessionExitReason = "quit" | "remote-closed" | "error"

export interface SessionExit {
  readonly reason: SessionExitReason
  readonly error?: Error
  readonly shutdown?: ShutdownResult
}

export interface EditorSessionOptions {
  readonly remote: RemoteEditor
  readonly dispatcher?: RedrawDispatcher
  readonly queueCapacity?: number
  readonly shutdownTimeoutMs?: number
  readonly schedule?: Scheduler
  /** Receives every raw redraw batch before decoding (capture recording). */
  readonly onRawBatch?: (batch: unknown) => void
  readonly logger?: Logger
}

export type FlushListener = (grids: Grid[]) => void

/**
 * Owns the engine for one remote editor. Transport callbacks only decode and
 * enqueue; grid and highlight state is written on the drain tick alone, and
 * a transport failure recorded by a callback is acted on by the next tick
 * after the events queued before it have been applied.
 */
export class EditorSession extends EventEmitter {
  readonly dispatcher: RedrawDispatcher
  readonly input: InputBridge
  private readonly remote: RemoteEditor
  private readonly queue: EventQueue<RedrawEvent>
  private readonly schedule: Scheduler
  private readonly shutdownTimeoutMs: number
  private readonly onRawBatch?: (batch: unknown) => void
  private readonly log: Logger
  private readonly disposers: Array<() => void> = []
  private drainScheduled = false
  private pendingError: Error | null = null
  private overflowed = false
  private remoteClosed = false
  private started = false
  private exit: SessionExit | null = null
  private stopping: Promise<SessionExit> | null = null
  private readonly stoppedPromise: Promise<SessionExit>
  private resolveStopped: (exit: SessionExit) => void = () => undefined

  constructor(options: EditorSessionOptions) {
    super()
    this.remote = options.remote
    this.dispatcher = options.dispatcher ?? new RedrawDispatcher()
    this.queue = new EventQueue(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY)
    this.schedule = options.schedule ?? immediateScheduler
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS
    this.onRawBatch = options.onRawBatch
    this.log = options.logger ?? createLogger("session")
    this.input = new InputBridge(
      (keys) => this.remote.input(keys),
      (error) => this.recordError(new RemoteConnectionError("Failed to deliver input to the editor", error)),
    )
    this.stoppedPromise = new Promise<SessionExit>((resolve) => {
      this.resolveStopped = resolve
    })
  }

  get registry(): GridRegistry {
    return this.dispatcher.registry
  }

  get highlights(): HighlightAttrMap {
    return this.dispatcher.highlights
  }

  get stopped(): boolean {
    return this.exit !== null
  }

  get queuedEvents(): number {
    return this.queue.size
  }

  start(): void {
    if (this.started) return
    this.started = true
    this.disposers.push(this.remote.onRedraw((batch) => this.handleRedraw(batch)))
    this.disposers.push(
      this.remote.onClose((error) => {
        this.remoteClosed = true
        this.recordError(error ? new RemoteConnectionError(error.message, error) : null)
      }),
    )
  }

  /** Queues a key sequence for the editor; never blocks. */
  sendKeys(keys: string): void {
    if (this.stopped) return
    this.input.push(keys)
  }

  onFlush(listener: FlushListener): () => void {
    this.on("flush", listener)
    return () => {
      this.off("flush", listener)
    }
  }

  untilStopped(): Promise<SessionExit> {
    return this.stoppedPromise
  }

  /** Applies everything queued so far. Runs on the scheduled tick; exposed for tests and headless replay. */
  drain(): void {
    this.drainScheduled = false
    if (this.exit) return
    const events = this.queue.drain()
    for (const event of events) {
      this.dispatcher.dispatch(event)
      if (event.kind === "flush") {
        this.emit("flush", this.dispatcher.registry.list())
      }
    }
    if (this.pendingError) {
      const error = this.pendingError
      this.pendingError = null
      this.log.error(error.message)
      void this.finish({ reason: "error", error })
      return
    }
    if (this.remoteClosed) {
      void this.finish({ reason: "remote-closed" })
    }
  }

  async stop(): Promise<SessionExit> {
    return await this.finish({ reason: "quit" })
  }

  private handleRedraw(batch: unknown): void {
    this.onRawBatch?.(batch)
    // Anything accepted after a refused batch would be drawn without it.
    if (this.overflowed) return
    const decoded = decodeRedrawBatch(batch)
    for (const issue of decoded.issues) {
      this.log.warn(`rejected ${issue.kind}[${issue.index}]: ${issue.message}`)
    }
    if (decoded.ignored.length > 0) {
      this.log.debug(`ignored redraw events: ${decoded.ignored.join(", ")}`)
    }
    if (decoded.events.length === 0) return
    if (!this.queue.push(decoded.events)) {
      this.overflowed = true
      this.recordError(new QueueOverflowError(this.queue.capacity))
      return
    }
    this.requestDrain()
  }

  private recordError(error: Error | null): void {
    if (error && !this.pendingError) {
      this.pendingError = error
    }
    this.requestDrain()
  }

  private requestDrain(): void {
    if (this.drainScheduled || this.exit) return
    this.drainScheduled = true
    this.schedule(() => this.drain())
  }

  private finish(exit: SessionExit): Promise<SessionExit> {
    if (this.stopping) return this.stopping
    this.stopping = this.teardown(exit)
    return this.stopping
  }

  private async teardown(exit: SessionExit): Promise<SessionExit> {
    for (const dispose of this.disposers.splice(0)) {
      dispose()
    }
    this.input.close()
    let result: ShutdownResult | undefined
    try {
      result = await this.remote.shutdown(this.shutdownTimeoutMs)
      if (result.timedOut) {
        this.log.warn(`editor did not exit within ${this.shutdownTimeoutMs}ms; continuing`)
      }
    } catch (error) {
      this.log.warn("editor shutdown failed", error)
    }
    const final: SessionExit = { ...exit, shutdown: result }
    this.exit = final
    this.resolveStopped(final)
    return final
  }
}
