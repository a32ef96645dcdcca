export type RedrawListener = (batch: unknown) => void

/** `null` when the remote went away cleanly (the editor quit). */
export type CloseListener = (error: Error | null) => void

export interface ShutdownResult {
  readonly timedOut: boolean
}

/**
 * Transport to a remote editor UI. Listeners fire from transport callbacks
 * and must only hand work off; they must not touch grid state.
 */
export interface RemoteEditor {
  onRedraw(listener: RedrawListener): () => void
  onClose(listener: CloseListener): () => void
  /** Sends a key sequence in the editor's key notation. */
  input(keys: string): Promise<void>
  shutdown(timeoutMs: number): Promise<ShutdownResult>
}
