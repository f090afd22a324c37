// =============================================================================
// Bytevec - Logger
// =============================================================================
// Levelled single-line logger writing to a configurable sink.

import { format } from 'node:util'
import { LOG_LEVEL, LEVEL_COLORS, levelName } from './levels'
import type { SeverityLevel } from './levels'
import { createLoggerConfig } from './config'
import type { LoggerConfig, LoggerOptions } from './config'

const ANSI_RESET = '\x1b[0m'

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Format as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Line logger.
 *
 * Each call formats its arguments printf-style (`%s`, `%d`, `%j`, ...) and, if
 * the level passes the threshold, writes one chunk:
 *
 * `[timestamp ][[LEVEL] ]message[\n]`
 *
 * With `color` on, the level tag and message are wrapped in the level's color.
 */
export class Logger {
  readonly config: Readonly<LoggerConfig>

  constructor(options?: LoggerOptions) {
    this.config = createLoggerConfig(options)
  }

  /**
   * Copy of this logger with some options replaced.
   */
  withConfig(options: LoggerOptions): Logger {
    return new Logger({ ...this.config, ...options })
  }

  isEnabled(level: SeverityLevel): boolean {
    return this.config.level !== LOG_LEVEL.NONE && level >= this.config.level
  }

  log(level: SeverityLevel, message: string, ...args: unknown[]): void {
    if (!this.isEnabled(level)) return
    this.config.sink.write(this.formatLine(level, format(message, ...args)))
  }

  trace(message: string, ...args: unknown[]): void {
    this.log(LOG_LEVEL.TRACE, message, ...args)
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LOG_LEVEL.DEBUG, message, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LOG_LEVEL.INFO, message, ...args)
  }

  warning(message: string, ...args: unknown[]): void {
    this.log(LOG_LEVEL.WARNING, message, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LOG_LEVEL.ERROR, message, ...args)
  }

  fatal(message: string, ...args: unknown[]): void {
    this.log(LOG_LEVEL.FATAL, message, ...args)
  }

  /**
   * Write a FATAL line ending in `": <cause>"`, where the cause is the
   * error's message.
   */
  logError(error: unknown, message: string, ...args: unknown[]): void {
    if (!this.isEnabled(LOG_LEVEL.FATAL)) return
    const text = `${format(message, ...args)}: ${describeCause(error)}`
    this.config.sink.write(this.formatLine(LOG_LEVEL.FATAL, text))
  }

  private formatLine(level: SeverityLevel, message: string): string {
    const { color, appendNewline, appendTimestamp, appendLevel, clock } = this.config

    let body = appendLevel ? `[${levelName(level)}] ${message}` : message
    if (color) {
      body = `\x1b[${LEVEL_COLORS[level]}m${body}${ANSI_RESET}`
    }

    const prefix = appendTimestamp ? `${formatTimestamp(clock())} ` : ''
    return `${prefix}${body}${appendNewline ? '\n' : ''}`
  }
}
