export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogData = Record<string, unknown>

export interface Logger {
  debug(message: string, data?: LogData): void
  info(message: string, data?: LogData): void
  warn(message: string, data?: LogData): void
  error(message: string, data?: LogData): void
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const noop = () => {}

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
}

export function consoleLogger(threshold: LogLevel = 'debug'): Logger {

  const log = (level: LogLevel) => (message: string, data?: LogData): void => {
    if (LEVELS[level] < LEVELS[threshold]) return
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`
    if (data == null) console[level](line)
    else console[level](line, data)
  }

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  }
}
