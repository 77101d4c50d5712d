export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const styles: Record<LogLevel, { label: string; ansi: string; rank: number }> = {
  debug: { label: 'DEBUG', ansi: '\x1b[34m', rank: 0 },
  info: { label: 'INFO', ansi: '\x1b[32m', rank: 1 },
  warn: { label: 'WARN', ansi: '\x1b[33m', rank: 2 },
  error: { label: 'ERROR', ansi: '\x1b[31m', rank: 3 }
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'

/**
 * Overrides the minimum level read from LOG_LEVEL at startup.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function enabled(level: LogLevel): boolean {
  return styles[level].rank >= styles[threshold].rank
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  },
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(...format('debug', message, args))
  }
}
