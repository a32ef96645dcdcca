import { spawn, type ChildProcess } from "node:child_process"
import { attach, findNvim, type NeovimClient } from "neovim"
import { createLogger } from "../util/log.js"
import type { CloseListener, RedrawListener, RemoteEditor, ShutdownResult } from "./types.js"

const log = createLogger("nvim")

const MIN_NVIM_VERSION = "0.9.0"
const BASE_ARGS = ["--embed", "--headless"]

export interface NeovimSpawnOptions {
  readonly nvimPath?: string | null
  readonly args?: ReadonlyArray<string>
}

export interface NeovimAttachOptions {
  readonly width: number
  readonly height: number
  readonly file?: string | null
}

export const resolveNvimPath = (explicit?: string | null): string => {
  const trimmed = explicit?.trim()
  if (trimmed) return trimmed
  const found = findNvim({ orderBy: "desc", minVersion: MIN_NVIM_VERSION })
  const match = found.matches[0]
  if (!match) {
    throw new Error(`No Neovim >= ${MIN_NVIM_VERSION} found on PATH. Set GRIDTERM_NVIM_PATH or pass --nvim.`)
  }
  return match.path
}

const waitForExit = (child: ChildProcess, timeoutMs: number): Promise<boolean> => {
  if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve(true)
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => {
      child.off("exit", onExit)
      resolve(false)
    }, timeoutMs)
    const onExit = () => {
      clearTimeout(timer)
      resolve(true)
    }
    child.once("exit", onExit)
  })
}

/** Neovim launched as an embedded child and driven as an external line-grid UI. */
export class NeovimRemote implements RemoteEditor {
  private readonly redrawListeners = new Set<RedrawListener>()
  private readonly closeListeners = new Set<CloseListener>()
  private closed = false
  private shuttingDown = false

  private constructor(
    private readonly child: ChildProcess,
    private readonly client: NeovimClient,
  ) {
    client.on("notification", (method: string, args: unknown[]) => {
      if (method !== "redraw") return
      for (const listener of [...this.redrawListeners]) {
        listener(args)
      }
    })
    client.on("request", (method: string, _args: unknown[], response: { send: (value: unknown, isError?: boolean) => void }) => {
      log.debug(`unhandled request ${method}`)
      response.send(`gridterm does not serve ${method}`, true)
    })
    client.on("disconnect", () => this.emitClose(null))
    child.once("error", (error) => this.emitClose(error))
    child.once("exit", (code, signal) => {
      if (code === 0 || this.shuttingDown) {
        this.emitClose(null)
        return
      }
      this.emitClose(new Error(`Neovim exited with ${signal ?? `code ${code}`}`))
    })
  }

  static spawn(options: NeovimSpawnOptions = {}): NeovimRemote {
    const nvimPath = resolveNvimPath(options.nvimPath)
    const argv = [...BASE_ARGS, ...(options.args ?? [])]
    log.debug(`spawning ${nvimPath} ${argv.join(" ")}`)
    const child = spawn(nvimPath, argv, { stdio: ["pipe", "pipe", "pipe"] })
    child.stderr?.on("data", (chunk: Buffer) => log.debug(`stderr: ${chunk.toString("utf8").trimEnd()}`))
    const client = attach({ proc: child })
    return new NeovimRemote(child, client)
  }

  /** Attaches as a UI; call once the redraw listeners are in place. */
  async attachUi(options: NeovimAttachOptions): Promise<void> {
    await this.client.uiAttach(options.width, options.height, { rgb: true, ext_linegrid: true })
    if (options.file) {
      const escaped: unknown = await this.client.call("fnameescape", [options.file])
      if (typeof escaped !== "string") {
        throw new Error(`Could not escape file name ${options.file}`)
      }
      await this.client.command(`edit ${escaped}`)
    }
  }

  onRedraw(listener: RedrawListener): () => void {
    this.redrawListeners.add(listener)
    return () => {
      this.redrawListeners.delete(listener)
    }
  }

  onClose(listener: CloseListener): () => void {
    this.closeListeners.add(listener)
    return () => {
      this.closeListeners.delete(listener)
    }
  }

  async input(keys: string): Promise<void> {
    await this.client.input(keys)
  }

  async shutdown(timeoutMs: number): Promise<ShutdownResult> {
    this.shuttingDown = true
    if (this.child.exitCode === null && this.child.signalCode === null) {
      void this.client.command("qa!").catch((error: unknown) => log.debug("quit request ended without a reply", error))
    }
    try {
      await this.client.close()
    } catch (error) {
      log.debug("closing the rpc transport failed", error)
    }
    const exited = await waitForExit(this.child, timeoutMs)
    if (!exited) {
      this.child.kill()
    }
    return { timedOut: !exited }
  }

  private emitClose(error: Error | null): void {
    if (this.closed) return
    this.closed = true
    for (const listener of [...this.closeListeners]) {
      listener(error)
    }
  }
}
