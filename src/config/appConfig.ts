import dotenv from "dotenv"
import path from "node:path"
import { DEFAULT_QUEUE_CAPACITY, DEFAULT_SHUTDOWN_TIMEOUT_MS } from "../session/editorSession.js"
import { parseColorMode, type ColorMode } from "../ui/theme.js"
import { createLogger } from "../util/log.js"
import { loadUserConfigSync, splitArgs, type UserConfigFile } from "./userConfig.js"

dotenv.config()

const log = createLogger("config")

export interface AppConfig {
  readonly nvimPath: string | null
  readonly nvimArgs: ReadonlyArray<string>
  readonly width: number
  readonly height: number
  readonly queueCapacity: number
  readonly shutdownTimeoutMs: number
  readonly dumpPath: string
  readonly colorMode: ColorMode | null
}

export const DEFAULT_WIDTH = 100
export const DEFAULT_HEIGHT = 25
export const DEFAULT_DUMP_FILE = "gridterm-dump.txt"

const envInt = (name: string): number | undefined => {
  const raw = process.env[name]?.trim()
  if (!raw) return undefined
  const parsed = Number.parseInt(raw, 10)
  if (Number.isFinite(parsed) && parsed > 0) return parsed
  log.warn(`ignoring ${name}=${raw}: expected a positive integer`)
  return undefined
}

const envString = (name: string): string | undefined => process.env[name]?.trim() || undefined

export const computeConfig = (user: UserConfigFile = {}): AppConfig => {
  const nvimArgsEnv = envString("GRIDTERM_NVIM_ARGS")
  const dumpPath = envString("GRIDTERM_DUMP_PATH") ?? user.dumpPath ?? DEFAULT_DUMP_FILE
  return {
    nvimPath: envString("GRIDTERM_NVIM_PATH") ?? user.nvimPath ?? null,
    nvimArgs: nvimArgsEnv ? splitArgs(nvimArgsEnv) : (user.nvimArgs ?? []),
    width: envInt("GRIDTERM_WIDTH") ?? user.width ?? DEFAULT_WIDTH,
    height: envInt("GRIDTERM_HEIGHT") ?? user.height ?? DEFAULT_HEIGHT,
    queueCapacity: envInt("GRIDTERM_QUEUE_CAPACITY") ?? user.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
    shutdownTimeoutMs: envInt("GRIDTERM_SHUTDOWN_TIMEOUT_MS") ?? user.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    dumpPath: path.resolve(dumpPath),
    colorMode: parseColorMode(process.env.GRIDTERM_COLOR_MODE) ?? user.colorMode ?? null,
  }
}

/** Defaults, then the user YAML file, then GRIDTERM_* variables. */
export const loadAppConfig = (): AppConfig => {
  const user = loadUserConfigSync()
  for (const warning of user.warnings) {
    log.warn(`${user.path}: ${warning}`)
  }
  return computeConfig(user.config)
}
