/**
 * Console logging for library code
 */

import type { Logger } from '@/lib/oui/types'

export interface ConsoleLoggerOptions {
  /** Print debug messages */
  debug?: boolean
  /** Prepended to every message, e.g. "[oui]" */
  prefix?: string
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { debug = false, prefix = '[oui]' } = options
  const tag = (message: string) => (prefix ? `${prefix} ${message}` : message)

  return {
    debug(message, ...details) {
      if (debug) {
        console.debug(tag(message), ...details)
      }
    },
    info(message, ...details) {
      console.info(tag(message), ...details)
    },
    warn(message, ...details) {
      console.warn(tag(message), ...details)
    },
    error(message, ...details) {
      console.error(tag(message), ...details)
    },
  }
}

export const defaultLogger: Logger = createConsoleLogger()
