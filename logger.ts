export const LOG_PREFIX = "[cellsketch]"

export interface Logger {
  debug: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
}

// Prefix the first string argument, or prepend the prefix on its own
function withPrefix(args: unknown[]): unknown[] {
  const [first, ...rest] = args
  if (typeof first === "string") {
    return [`${LOG_PREFIX} ${first}`, ...rest]
  }
  return [LOG_PREFIX, ...args]
}

/**
 * Console-backed logger. Debug output is dropped unless enabled.
 */
export function createLogger(debugEnabled = false): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (!debugEnabled) return
      console.debug(...withPrefix(args))
    },
    warn: (...args: unknown[]) => {
      console.warn(...withPrefix(args))
    },
  }
}

/**
 * Whether CELLSKETCH_DEBUG=1 is set in the environment.
 */
export function debugFromEnv(): boolean {
  if (typeof process === "undefined") return false
  return process.env.CELLSKETCH_DEBUG === "1"
}
