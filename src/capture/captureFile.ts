import { createWriteStream, promises as fs } from "node:fs"
import path from "node:path"
import { createLogger } from "../util/log.js"

const log = createLogger("capture")

export interface CaptureRecorder {
  readonly path: string
  record(batch: unknown): void
  stop(): Promise<void>
}

export interface ParsedCapture {
  readonly batches: unknown[]
  /** 1-based line numbers that were not valid JSON. */
  readonly badLines: number[]
}

/** Appends each raw redraw batch as one JSON line. */
export const openCaptureRecorder = async (target: string): Promise<CaptureRecorder> => {
  const capturePath = path.isAbsolute(target) ? target : path.join(process.cwd(), target)
  await fs.mkdir(path.dirname(capturePath), { recursive: true })
  const stream = createWriteStream(capturePath, { flags: "a" })
  let failed = false
  stream.on("error", (error) => {
    if (failed) return
    failed = true
    log.warn(`recording to ${capturePath} stopped`, error)
  })
  return {
    path: capturePath,
    record: (batch) => {
      if (failed || stream.writableEnded) return
      stream.write(`${JSON.stringify(batch)}\n`)
    },
    stop: () =>
      new Promise<void>((resolve) => {
        if (stream.writableEnded) {
          resolve()
          return
        }
        stream.end(() => resolve())
      }),
  }
}

export const parseCapture = (text: string): ParsedCapture => {
  const batches: unknown[] = []
  const badLines: number[] = []
  text.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) return
    try {
      batches.push(JSON.parse(line))
    } catch {
      badLines.push(index + 1)
    }
  })
  return { batches, badLines }
}

export const readCapture = async (capturePath: string): Promise<ParsedCapture> =>
  parseCapture(await fs.readFile(capturePath, "utf8"))
