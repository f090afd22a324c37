// =============================================================================
// Bytevec - Log Levels
// =============================================================================

/**
 * Ordered severities. `ALL` and `NONE` are threshold sentinels only: a
 * threshold of `ALL` lets every message through, `NONE` silences the logger.
 */
export const LOG_LEVEL = {
  ALL: 0,
  TRACE: 1,
  DEBUG: 2,
  INFO: 3,
  WARNING: 4,
  ERROR: 5,
  FATAL: 6,
  NONE: 7
} as const

export type LogLevel = (typeof LOG_LEVEL)[keyof typeof LOG_LEVEL]

/**
 * Levels a message can be written at.
 */
export type SeverityLevel = Exclude<LogLevel, typeof LOG_LEVEL.ALL | typeof LOG_LEVEL.NONE>

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LOG_LEVEL.ALL]: 'ALL',
  [LOG_LEVEL.TRACE]: 'TRACE',
  [LOG_LEVEL.DEBUG]: 'DEBUG',
  [LOG_LEVEL.INFO]: 'INFO',
  [LOG_LEVEL.WARNING]: 'WARNING',
  [LOG_LEVEL.ERROR]: 'ERROR',
  [LOG_LEVEL.FATAL]: 'FATAL',
  [LOG_LEVEL.NONE]: 'NONE'
}

// SGR parameters per severity
export const LEVEL_COLORS: Record<SeverityLevel, string> = {
  [LOG_LEVEL.TRACE]: '90',
  [LOG_LEVEL.DEBUG]: '36',
  [LOG_LEVEL.INFO]: '32',
  [LOG_LEVEL.WARNING]: '33',
  [LOG_LEVEL.ERROR]: '31',
  [LOG_LEVEL.FATAL]: '1;31'
}

export function levelName(level: LogLevel): string {
  return LEVEL_NAMES[level]
}

/**
 * Parse a level name such as `"warning"` (case-insensitive).
 *
 * @returns The level, or `undefined` for an unknown name
 */
export function parseLevel(name: string): LogLevel | undefined {
  const upper = name.trim().toUpperCase()
  for (const level of Object.values(LOG_LEVEL)) {
    if (LEVEL_NAMES[level] === upper) return level
  }
  return undefined
}
