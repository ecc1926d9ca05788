import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/prune-config.js'

export type { Logger } from 'pino'

const STDERR = 2

/**
 * Diagnostics logger. Writes to stderr so stdout stays reserved for the
 * retention report and the confirmation prompt.
 */
export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.level !== 'silent' &&
    (config.pretty || process.env.NODE_ENV !== 'production')

  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: STDERR } },
    })
  }

  return pino({ level: config.level }, pino.destination(STDERR))
}
