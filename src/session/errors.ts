export class RemoteConnectionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "RemoteConnectionError"
  }
}

export class QueueOverflowError extends Error {
  readonly capacity: number

  constructor(capacity: number) {
    super(`Redraw queue exceeded its capacity of ${capacity} events`)
    this.name = "QueueOverflowError"
    this.capacity = capacity
  }
}
