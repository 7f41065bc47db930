import { createLogger, format, type Logger, transports } from 'winston'

export type { Logger }

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LoggerOptions = {
  logLevel?: LogLevel
  /** Render without colours, e.g. when output goes to a file */
  plain?: boolean
}

const lineFormat = format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
  return `${String(timestamp)} ${level}: ${String(message)}${extra}`
})

/**
 * Console logger with one line per entry:
 * `2024-05-01T10:00:00.000Z info: Started RPC server {"address":"..."}`
 */
export function getLogger(opts: LoggerOptions = {}): Logger {
  const { logLevel = 'info', plain = false } = opts
  const formats = [format.timestamp(), format.splat()]
  if (!plain) formats.push(format.colorize())
  formats.push(lineFormat)

  return createLogger({
    level: logLevel,
    format: format.combine(...formats),
    transports: [new transports.Console()],
  })
}

/**
 * Logger that drops every entry
 */
export function getSilentLogger(): Logger {
  return createLogger({
    silent: true,
    transports: [new transports.Console()],
  })
}
