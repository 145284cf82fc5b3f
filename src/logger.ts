/**
 * Leveled logging
 *
 * Console-backed by default. Components take a Logger so callers and tests
 * can route output elsewhere.
 */

export type LogFn = (message: string, data?: unknown) => void

export type Logger = {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

function isDebugEnabled(): boolean {
  return (process.env['QUOTA_KEEPER_DEBUG'] ?? 'false') === 'true'
}

function stamp(): string {
  return new Date().toISOString()
}

export const logger: Logger = {
  debug: (message, data) => {
    if (isDebugEnabled()) {
      console.log(`${stamp()} [DEBUG] ${message}`, data !== undefined ? data : '')
    }
  },

  info: (message, data) => {
    console.log(`${stamp()} [INFO] ${message}`, data !== undefined ? data : '')
  },

  warn: (message, data) => {
    console.warn(`${stamp()} [WARN] ${message}`, data !== undefined ? data : '')
  },

  error: (message, error) => {
    console.error(`${stamp()} [ERROR] ${message}`, error !== undefined ? error : '')
  },
}

/** Prefix every message, e.g. `[anthropic]` */
export function withPrefix(base: Logger, prefix: string): Logger {
  return {
    debug: (message, data) => base.debug(`${prefix} ${message}`, data),
    info: (message, data) => base.info(`${prefix} ${message}`, data),
    warn: (message, data) => base.warn(`${prefix} ${message}`, data),
    error: (message, data) => base.error(`${prefix} ${message}`, data),
  }
}
