import fs from 'node:fs'
import path from 'node:path'
import winston from 'winston'

/**
 * Leveled logging sink used by every worker in the core.
 * The core never depends on how or where messages are written.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  /** Derive a logger that tags every line with a component name */
  child(name: string): Logger
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

/**
 * Options for the winston-backed logger
 */
export interface LoggerOptions {
  /** Minimum level written (defaults to LOG_LEVEL or 'info') */
  level?: LogLevel
  /** Directory for rotating log files; console only when omitted */
  logDir?: string
  /** Disable the console transport (tests, daemons writing to files only) */
  silentConsole?: boolean
}

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
)

// Define console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    const prefix = typeof component === 'string' ? `[${component}] ` : ''
    let msg = `${String(timestamp)} [${level}] ${prefix}${String(message)}`
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`
    }
    return msg
  })
)

/**
 * Logger writing through a winston instance
 */
export class WinstonLogger implements Logger {
  constructor(private readonly inner: winston.Logger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.inner.debug(message, context ?? {})
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.inner.info(message, context ?? {})
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.inner.warn(message, context ?? {})
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.inner.error(message, context ?? {})
  }

  child(name: string): Logger {
    return new WinstonLogger(this.inner.child({ component: name }))
  }
}

function fileTransports(logDir: string): winston.transports.FileTransportInstance[] {
  // Create log directory if it doesn't exist
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true })
  }

  return [
    // File transport for all logs
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    // File transport for errors
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  ]
}

/**
 * Create the root logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const transports = [
    ...(options.silentConsole ? [] : [new winston.transports.Console({ format: consoleFormat })]),
    ...(options.logDir ? fileTransports(options.logDir) : [])
  ]

  const logger = winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: logFormat,
    transports,
    silent: transports.length === 0
  })

  return new WinstonLogger(logger)
}

/**
 * No-op logger for testing
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}

  child(_name: string): Logger {
    return this
  }
}
