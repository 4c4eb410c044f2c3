import pino, { type Logger } from 'pino'
import type { LogLevel } from './env'

export type { Logger }

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name:      'boat-link',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

/** For tests and tools that must not write to stdout. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
