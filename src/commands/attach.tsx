import React from "react"
import { promises as fs } from "node:fs"
import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { render } from "ink"
import { openCaptureRecorder, type CaptureRecorder } from "../capture/captureFile.js"
import { loadAppConfig, type AppConfig } from "../config/appConfig.js"
import { RedrawDispatcher } from "../grid/redrawDispatcher.js"
import { GridRegistry } from "../grid/gridRegistry.js"
import { NeovimRemote } from "../remote/neovimRemote.js"
import { EditorSession, type SessionExit } from "../session/editorSession.js"
import { EditorApp } from "../ui/components/EditorApp.js"
import { formatFrameDump } from "../ui/frameRender.js"
import { createPainter, resolveColorMode } from "../ui/theme.js"

const fileArg = Args.text({ name: "file" }).pipe(Args.optional)
const widthOption = Options.integer("width").pipe(Options.optional)
const heightOption = Options.integer("height").pipe(Options.optional)
const nvimOption = Options.text("nvim").pipe(Options.optional)
const recordOption = Options.text("record").pipe(Options.optional)

export interface AttachOptions {
  readonly file: string | null
  readonly width: number | null
  readonly height: number | null
  readonly nvimPath: string | null
  readonly recordPath: string | null
}

export const writeDump = async (session: EditorSession, dumpPath: string): Promise<string> => {
  const frames = session.registry.list().map((grid) => grid.lastFrame ?? grid.snapshot())
  await fs.writeFile(dumpPath, `${formatFrameDump(frames)}\n`, "utf8")
  return `Dumped ${frames.length} grid(s) to ${dumpPath}`
}

const describeExit = (exit: SessionExit): string => {
  if (exit.reason === "error") return `Session ended: ${exit.error?.message ?? "unknown error"}`
  if (exit.reason === "remote-closed") return "Neovim exited."
  return "Bye."
}

export const runAttach = async (options: AttachOptions, config: AppConfig = loadAppConfig()): Promise<SessionExit> => {
  const width = options.width ?? config.width
  const height = options.height ?? config.height
  const recorder: CaptureRecorder | null = options.recordPath ? await openCaptureRecorder(options.recordPath) : null
  let remote: NeovimRemote
  try {
    remote = NeovimRemote.spawn({ nvimPath: options.nvimPath ?? config.nvimPath, args: config.nvimArgs })
  } catch (error) {
    await recorder?.stop()
    throw error
  }
  const session = new EditorSession({
    remote,
    dispatcher: new RedrawDispatcher({ registry: new GridRegistry(width, height) }),
    queueCapacity: config.queueCapacity,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    onRawBatch: recorder ? (batch) => recorder.record(batch) : undefined,
  })
  session.start()

  const painter = createPainter(resolveColorMode(config.colorMode, Boolean(process.stdout.isTTY)))
  const ink = render(
    <EditorApp session={session} painter={painter} onDump={() => writeDump(session, config.dumpPath)} />,
    { exitOnCtrlC: false },
  )
  const onSignal = () => {
    void session.stop()
  }
  process.once("SIGINT", onSignal)
  process.once("SIGTERM", onSignal)

  let attachError: Error | null = null
  try {
    await remote.attachUi({ width, height, file: options.file })
  } catch (error) {
    attachError = error instanceof Error ? error : new Error(String(error))
    await session.stop()
  }

  const exit = await session.untilStopped()
  process.off("SIGINT", onSignal)
  process.off("SIGTERM", onSignal)
  ink.unmount()
  await recorder?.stop()
  if (attachError && exit.reason !== "error") {
    return { ...exit, reason: "error", error: attachError }
  }
  return exit
}

export const attachCommand = Command.make(
  "attach",
  { file: fileArg, width: widthOption, height: heightOption, nvim: nvimOption, record: recordOption },
  ({ file, width, height, nvim, record }) =>
    Effect.tryPromise(async () => {
      const exit = await runAttach({
        file: Option.getOrNull(file),
        width: Option.getOrNull(width),
        height: Option.getOrNull(height),
        nvimPath: Option.getOrNull(nvim),
        recordPath: Option.getOrNull(record),
      })
      if (exit.reason === "error") {
        console.error(describeExit(exit))
        process.exitCode = 1
        return
      }
      console.log(describeExit(exit))
    }).pipe(
      Effect.catchAll((error) =>
        Console.error(`attach failed: ${error.error instanceof Error ? error.error.message : String(error.error)}`).pipe(
          Effect.zipRight(
            Effect.sync(() => {
              process.exitCode = 1
            }),
          ),
        ),
      ),
    ),
)
