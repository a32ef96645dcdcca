import { vi } from "vitest"
import type { Logger } from "../../src/util/log.js"

export const createTestLogger = () => {
  const logger = {
    debug: vi.fn<Logger["debug"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  }
  return logger satisfies Logger
}
