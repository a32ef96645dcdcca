export interface Logger {
  debug(message: string, detail?: unknown): void
  warn(message: string, detail?: unknown): void
  error(message: string, detail?: unknown): void
}

const isDebugEnabled = (): boolean => process.env.GRIDTERM_DEBUG === "1"

const format = (scope: string, message: string): string => `[${scope}] ${message}`

export const createLogger = (scope: string): Logger => ({
  debug: (message, detail) => {
    if (!isDebugEnabled()) return
    if (detail === undefined) console.error(format(scope, message))
    else console.error(format(scope, message), detail)
  },
  warn: (message, detail) => {
    if (detail === undefined) console.warn(format(scope, message))
    else console.warn(format(scope, message), detail)
  },
  error: (message, detail) => {
    if (detail === undefined) console.error(format(scope, message))
    else console.error(format(scope, message), detail)
  },
})
