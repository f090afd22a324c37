// =============================================================================
// Bytevec - Logger Module
// =============================================================================

export { LOG_LEVEL, LEVEL_COLORS, levelName, parseLevel } from './levels'
export type { LogLevel, SeverityLevel } from './levels'

export { createLoggerConfig } from './config'
export type { LogSink, LoggerConfig, LoggerOptions } from './config'

export { Logger, formatTimestamp } from './logger'
