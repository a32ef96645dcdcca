export class UnsupportedEventError extends Error {
  readonly kind: string

  constructor(kind: string, message: string) {
    super(message)
    this.name = "UnsupportedEventError"
    this.kind = kind
  }
}
