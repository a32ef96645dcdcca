import { Chalk, type ChalkInstance } from "chalk"

export type ColorMode = "truecolor" | "ansi256" | "ansi16" | "none"

export const COLORS = {
  accent: "#f97316",
  muted: "#6b7280",
  border: "#374151",
} as const

export const parseColorMode = (value: string | undefined | null): ColorMode | null => {
  const raw = (value ?? "").toString().toLowerCase().trim()
  if (!raw) return null
  if (["0", "none", "off", "false"].includes(raw)) return "none"
  if (["16", "ansi16", "basic"].includes(raw)) return "ansi16"
  if (["256", "ansi256"].includes(raw)) return "ansi256"
  if (["truecolor", "24bit", "rgb", "1", "true"].includes(raw)) return "truecolor"
  return null
}

export const resolveColorMode = (override?: ColorMode | null, allowColor = true): ColorMode => {
  if (!allowColor) return "none"
  if (override) return override
  if (process.env.NO_COLOR) return "none"
  return parseColorMode(process.env.GRIDTERM_COLOR_MODE) ?? "truecolor"
}

const LEVELS: Record<ColorMode, 0 | 1 | 2 | 3> = {
  none: 0,
  ansi16: 1,
  ansi256: 2,
  truecolor: 3,
}

export const createPainter = (mode: ColorMode): ChalkInstance => new Chalk({ level: LEVELS[mode] })
