/**
 * Levelled console logger. Operator-facing messages from capture and export go through here.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface LogSink {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

interface LoggerConfig {
  minLevel: LogLevel
  sink: LogSink
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value)
}

class Logger {
  private config: LoggerConfig

  constructor(
    config: Partial<LoggerConfig> = {},
    private readonly prefix = '',
    private readonly parent?: Logger
  ) {
    this.config = {
      minLevel: config.minLevel ?? 'info',
      sink: config.sink ?? console
    }
  }

  private get effective(): LoggerConfig {
    return this.parent ? this.parent.effective : this.config
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS[level] >= LEVELS[this.effective.minLevel]
  }

  private format(tag: string, args: unknown[]): unknown[] {
    return this.prefix ? [tag, this.prefix, ...args] : [tag, ...args]
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      this.effective.sink.debug(...this.format('[DEBUG]', args))
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      this.effective.sink.info(...this.format('[INFO]', args))
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      this.effective.sink.warn(...this.format('[WARN]', args))
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      this.effective.sink.error(...this.format('[ERROR]', args))
    }
  }

  /**
   * Child logger that prefixes every line with `[name]` and follows this logger's configuration.
   */
  scope(name: string): Logger {
    const prefix = this.prefix ? `${this.prefix}[${name}]` : `[${name}]`
    return new Logger({}, prefix, this.parent ?? this)
  }

  configure(config: Partial<LoggerConfig>): void {
    if (this.parent) {
      this.parent.configure(config)
      return
    }
    this.config = { ...this.config, ...config }
  }

  getLevel(): LogLevel {
    return this.effective.minLevel
  }
}

// Export singleton instance
export const logger = new Logger()

// Export for testing
export { Logger }
