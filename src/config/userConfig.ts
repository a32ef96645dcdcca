import fs from "node:fs"
import { homedir } from "node:os"
import path from "node:path"
import { parse } from "yaml"
import { parseColorMode, type ColorMode } from "../ui/theme.js"

export interface UserConfigFile {
  readonly nvimPath?: string
  readonly nvimArgs?: ReadonlyArray<string>
  readonly width?: number
  readonly height?: number
  readonly queueCapacity?: number
  readonly shutdownTimeoutMs?: number
  readonly dumpPath?: string
  readonly colorMode?: ColorMode
}

export interface ValidationIssue {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

export interface UserConfigResult {
  readonly config: UserConfigFile
  readonly warnings: string[]
  readonly path: string
}

const KNOWN_KEYS = new Set([
  "nvimPath",
  "nvimArgs",
  "width",
  "height",
  "queueCapacity",
  "shutdownTimeoutMs",
  "dumpPath",
  "colorMode",
])

export const getUserConfigPath = (): string => {
  const explicit = process.env.GRIDTERM_USER_CONFIG?.trim()
  if (explicit) return path.resolve(explicit)
  return path.join(homedir(), ".config", "gridterm", "config.yaml")
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const readString = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): string | undefined => {
  const value = source[key]
  if (value == null) return undefined
  if (typeof value !== "string" || !value.trim()) {
    issues.push({ severity: "error", path: key, message: "Expected a non-empty string." })
    return undefined
  }
  return value.trim()
}

const readPositiveInt = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): number | undefined => {
  const value = source[key]
  if (value == null) return undefined
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    issues.push({ severity: "error", path: key, message: "Expected a positive integer." })
    return undefined
  }
  return value
}

const readStringList = (
  source: Record<string, unknown>,
  key: string,
  issues: ValidationIssue[],
): string[] | undefined => {
  const value = source[key]
  if (value == null) return undefined
  if (typeof value === "string") return splitArgs(value)
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    issues.push({ severity: "error", path: key, message: "Expected a list of strings." })
    return undefined
  }
  return value
}

export const splitArgs = (value: string): string[] => value.split(/\s+/).filter((part) => part.length > 0)

export const validateUserConfig = (input: unknown): { config: UserConfigFile; issues: ValidationIssue[] } => {
  const issues: ValidationIssue[] = []
  if (input == null) return { config: {}, issues }
  if (!isRecord(input)) {
    issues.push({ severity: "error", path: "<root>", message: "Expected a mapping at the top level." })
    return { config: {}, issues }
  }
  for (const key of Object.keys(input)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push({ severity: "warning", path: key, message: "Unknown key ignored." })
    }
  }
  let colorMode: ColorMode | undefined
  const rawColorMode = input.colorMode
  if (rawColorMode != null) {
    const parsed = typeof rawColorMode === "string" ? parseColorMode(rawColorMode) : null
    if (parsed) colorMode = parsed
    else issues.push({ severity: "error", path: "colorMode", message: "Expected truecolor, ansi256, ansi16 or none." })
  }
  const config: UserConfigFile = {
    nvimPath: readString(input, "nvimPath", issues),
    nvimArgs: readStringList(input, "nvimArgs", issues),
    width: readPositiveInt(input, "width", issues),
    height: readPositiveInt(input, "height", issues),
    queueCapacity: readPositiveInt(input, "queueCapacity", issues),
    shutdownTimeoutMs: readPositiveInt(input, "shutdownTimeoutMs", issues),
    dumpPath: readString(input, "dumpPath", issues),
    colorMode,
  }
  return { config, issues }
}

export const formatValidationIssues = (issues: ReadonlyArray<ValidationIssue>): string[] =>
  issues.map((issue) => `[${issue.severity}] ${issue.path}: ${issue.message}`)

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

/** Reads the YAML user config. A missing file is an empty config; invalid content throws. */
export const loadUserConfigSync = (configPath = getUserConfigPath()): UserConfigResult => {
  let raw: string
  try {
    raw = fs.readFileSync(configPath, "utf8")
  } catch (error) {
    if (isMissingFile(error)) return { config: {}, warnings: [], path: configPath }
    throw error
  }
  const validated = validateUserConfig(parse(raw))
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new Error(`Invalid gridterm config at ${configPath}\n${formatValidationIssues(errors).join("\n")}`)
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings, path: configPath }
}
