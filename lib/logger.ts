/**
 * Logger - tagged console output with a level threshold
 *
 * Every line carries a bracketed component tag, e.g. `[Runtime:Poller]`.
 * Components receive a Logger at construction and derive their own tag
 * with child().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export interface Logger {
  readonly tag: string
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  child(tag: string): Logger
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(candidate => candidate === value)
}

export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level]
  const prefix = `[${tag}]`
  const enabled = (candidate: LogLevel) => LEVEL_RANK[candidate] >= threshold

  return {
    tag,
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
    },
    child: (childTag) => createLogger(`${tag}:${childTag}`, level),
  }
}
