export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const styles: Record<LogLevel, { label: string; ansi: string }> = {
  debug: { label: 'DEBUG', ansi: '\x1b[34m' },
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' }
}

const order: LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return order.some((level) => level === value)
}

const envLevel = process.env.LOG_LEVEL ?? ''
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: LogLevel): boolean {
  return order.indexOf(level) >= order.indexOf(threshold)
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

// Log lines go to stderr so command output on stdout stays clean for piping.
export const log = {
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.error(...format('debug', message, args))
  },
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.error(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.error(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  }
}
