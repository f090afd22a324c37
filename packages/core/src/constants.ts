// =============================================================================
// Bytevec - Core Constants
// =============================================================================
// Capacity policy and error codes for the byte array.

/**
 * Number of slots reserved by `ByteArray.createDefault`.
 */
export const DEFAULT_CAPACITY = 16

/**
 * Capacity multiplier applied when `append` finds the buffer full.
 */
export const GROWTH_FACTOR = 2

/**
 * Largest slot count an array may hold (unsigned 32-bit).
 */
export const MAX_CAPACITY = 0xffffffff

/**
 * Byte alignment used by `ArenaAllocator` unless overridden.
 */
export const DEFAULT_ARENA_ALIGNMENT = 8

/**
 * ByteArray error codes (zero-allocation error handling).
 *
 * Mutating operations return one of these directly. Operations that produce a
 * value wrap it in a `Result` whose error is one of these.
 */
export const ARRAY_ERR = {
  /** Operation succeeded */
  OK: 0,
  /** Index past the size (`set`) or the capacity (`at`) */
  INDEX_OUT_OF_BOUNDS: -1,
  /** Array requested with zero slots */
  ZERO_CAPACITY: -2,
  /** Allocator could not supply the requested bytes */
  ALLOCATION_FAILED: -3,
  /** Array was already destroyed */
  DESTROYED: -4,
  /** Element bytes do not match the array's element size */
  ELEMENT_SIZE_MISMATCH: -5,
  /** Size, capacity or element size is not a valid unsigned integer */
  INVALID_ARGUMENT: -6,
  /** Source array changed structurally after the iterator was made */
  ITERATOR_INVALIDATED: -7
} as const

export type ArrayErrorCode = (typeof ARRAY_ERR)[keyof typeof ARRAY_ERR]

/**
 * Error codes other than `OK`.
 */
export type ArrayFailureCode = Exclude<ArrayErrorCode, typeof ARRAY_ERR.OK>
