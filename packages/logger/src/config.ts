// =============================================================================
// Bytevec - Logger Configuration
// =============================================================================

import { LOG_LEVEL } from './levels'
import type { LogLevel } from './levels'

/**
 * Destination for formatted lines, e.g. `process.stdout` or a file stream.
 */
export interface LogSink {
  write(chunk: string): unknown
}

/**
 * Logger configuration. Created once and handed to the logger; there is no
 * process-wide logger state.
 */
export interface LoggerConfig {
  /** Where lines are written (default: process.stderr) */
  sink: LogSink
  /** Minimum severity written (default: INFO) */
  level: LogLevel
  /** Wrap the level tag and message in ANSI colors (default: false) */
  color: boolean
  /** End every message with a newline (default: true) */
  appendNewline: boolean
  /** Prefix `YYYY-MM-DD HH:MM:SS` local time (default: true) */
  appendTimestamp: boolean
  /** Prefix `[LEVEL]` after the timestamp (default: true) */
  appendLevel: boolean
  /** Time source for timestamps (default: current time) */
  clock: () => Date
}

export type LoggerOptions = Partial<LoggerConfig>

const DEFAULT_CONFIG: LoggerConfig = {
  sink: process.stderr,
  level: LOG_LEVEL.INFO,
  color: false,
  appendNewline: true,
  appendTimestamp: true,
  appendLevel: true,
  clock: () => new Date()
}

/**
 * Fill unspecified options with defaults.
 */
export function createLoggerConfig(options?: LoggerOptions): Readonly<LoggerConfig> {
  return Object.freeze({ ...DEFAULT_CONFIG, ...options })
}
