import type { Logger } from './types.js'

/**
 * Console-backed logger that tags every line with `[fluxstate:<scope>]`.
 * Debug output is dropped unless `debug` is set.
 */
export function createConsoleLogger(
  scope: string,
  options: { debug?: boolean } = {},
): Logger {
  const prefix = `[fluxstate:${scope}]`
  return {
    debug(message, ...args) {
      if (options.debug) console.debug(`${prefix} ${message}`, ...args)
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args)
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args)
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
}
