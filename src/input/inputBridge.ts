import { createLogger } from "../util/log.js"

const log = createLogger("input")

export type KeySender = (keys: string) => Promise<void>
export type InputErrorHandler = (error: unknown) => void

/**
 * UI-side key queue. `push` never waits: keys are appended and a single pump
 * sends them one at a time, so they reach the remote in the order typed.
 */
export class InputBridge {
  private readonly queue: string[] = []
  private pump: Promise<void> | null = null
  private closed = false

  constructor(
    private readonly send: KeySender,
    private readonly onError: InputErrorHandler = (error) => log.error("key delivery failed", error),
  ) {}

  get pendingCount(): number {
    return this.queue.length
  }

  push(keys: string): void {
    if (this.closed || keys.length === 0) return
    this.queue.push(keys)
    this.schedule()
  }

  /** Resolves once every key queued so far has been handed to the sender. */
  async idle(): Promise<void> {
    while (this.pump) {
      await this.pump
    }
  }

  close(): void {
    this.closed = true
    this.queue.length = 0
  }

  private schedule(): void {
    if (this.pump) return
    this.pump = this.run().finally(() => {
      this.pump = null
      if (this.queue.length > 0 && !this.closed) this.schedule()
    })
  }

  private async run(): Promise<void> {
    while (this.queue.length > 0 && !this.closed) {
      const keys = this.queue.shift()
      if (keys === undefined) break
      try {
        await this.send(keys)
      } catch (error) {
        this.onError(error)
      }
    }
  }
}
