/**
 * Simple logger utility for the analysis engine
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS
}

const envLevel = process.env.LOG_LEVEL
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

function formatTimestamp(): string {
  return new Date().toISOString()
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel]
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`
  }
  return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
}

function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = formatTimestamp()
  const levelStr = level.toUpperCase().padEnd(5)
  const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : ''
  return `[${timestamp}] ${levelStr} ${message}${argsStr}`
}

// All levels write to stderr; stdout carries the CLI's JSON output
export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level
  },

  getLevel(): LogLevel {
    return currentLevel
  },

  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.error(formatMessage('debug', message, ...args))
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.error(formatMessage('info', message, ...args))
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.warn(formatMessage('warn', message, ...args))
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(formatMessage('error', message, ...args))
    }
  },

  /**
   * Log with a short scope prefix, e.g. a request fingerprint or batch id
   */
  scope(scopeId: string, level: Exclude<LogLevel, 'silent'>, message: string, ...args: unknown[]): void {
    this[level](`[${scopeId.slice(0, 8)}] ${message}`, ...args)
  },
}
