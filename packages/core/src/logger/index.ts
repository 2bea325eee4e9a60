import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * Everything is written to stderr so that program output on stdout stays clean.
 * @description Call init() at the top of the entry point file before logging.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: process.env['LOG_LEVEL'] || 'info',
    },
    pino.destination(2),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level() {
    return this.pino.level
  }

  init(level?: LogLevel) {
    if (level) {
      this.pino.level = level
    }
    this.hasBeenInitialized = true
    this.pino.debug('LoggerProvider initialized')
  }

  info(message: string, ...args: unknown[]) {
    this.log('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this.log('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this.log('warn', message, args)
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    this.pino.error({ err: error, args }, message)
  }

  private log(
    level: 'info' | 'debug' | 'warn',
    message: string,
    args: unknown[],
  ) {
    if (args.length === 0) {
      this.pino[level](message)
      return
    }
    this.pino[level]({ args }, message)
  }
}

export const logger = new LoggerProvider()
