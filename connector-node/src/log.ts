/**
 * Diagnostics logging.
 *
 * The channel pair carries protocol bytes only; diagnostics go to stderr.
 * Debug lines are enabled with `DEBUG=commslink` (or `commslink:*`, `*`).
 *
 * @module
 */

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
}

/** Namespace matched against the DEBUG variable. */
export const LOG_NAMESPACE = 'commslink'

/**
 * True if the DEBUG value enables the connector's debug output.
 * Accepts comma or whitespace separated tokens.
 */
export function isDebugEnabled(debug: string | undefined): boolean {
  if (!debug) return false
  const tokens = debug.split(/[\s,]+/).filter(Boolean)
  return tokens.some(
    (token) => token === LOG_NAMESPACE || token === `${LOG_NAMESPACE}:*` || token === '*'
  )
}

/**
 * Logger writing tagged lines to stderr.
 */
export function createStderrLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const debug = isDebugEnabled(env.DEBUG)
  const write = (level: string, message: string): void => {
    process.stderr.write(`[${LOG_NAMESPACE}] ${level}: ${message}\n`)
  }

  return {
    debug(message: string): void {
      if (debug) write('debug', message)
    },
    info(message: string): void {
      write('info', message)
    },
    warn(message: string): void {
      write('warn', message)
    }
  }
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {}
}
