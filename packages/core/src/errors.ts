// =============================================================================
// Bytevec - Faults
// =============================================================================
// Opt-in abort path for callers that treat array errors as defects.

import { ARRAY_ERR } from './constants'
import type { ArrayErrorCode, ArrayFailureCode } from './constants'
import type { Result } from './result'

const MESSAGES: Record<ArrayErrorCode, string> = {
  [ARRAY_ERR.OK]: 'ok',
  [ARRAY_ERR.INDEX_OUT_OF_BOUNDS]: 'index out of bounds',
  [ARRAY_ERR.ZERO_CAPACITY]: 'capacity must be at least 1',
  [ARRAY_ERR.ALLOCATION_FAILED]: 'allocator could not satisfy the request',
  [ARRAY_ERR.DESTROYED]: 'array has been destroyed',
  [ARRAY_ERR.ELEMENT_SIZE_MISMATCH]: 'element size does not match the array',
  [ARRAY_ERR.INVALID_ARGUMENT]: 'expected an unsigned integer argument',
  [ARRAY_ERR.ITERATOR_INVALIDATED]: 'array was modified during iteration'
}

/**
 * Human-readable description of an error code.
 */
export function describeError(code: ArrayErrorCode): string {
  return MESSAGES[code]
}

/**
 * Thrown when a caller chooses to abort on an array error.
 */
export class ArrayFault extends Error {
  readonly code: ArrayFailureCode

  constructor(code: ArrayFailureCode, context?: string) {
    const detail = describeError(code)
    super(context === undefined ? detail : `${context}: ${detail}`)
    this.name = 'ArrayFault'
    this.code = code
  }
}

/**
 * Return the value of a successful result, or throw its error as an `ArrayFault`.
 */
export function unwrap<T>(result: Result<T, ArrayFailureCode>, context?: string): T {
  if (!result.ok) {
    throw new ArrayFault(result.error, context)
  }
  return result.value
}

/**
 * Throw an `ArrayFault` unless `code` is `ARRAY_ERR.OK`.
 */
export function check(code: ArrayErrorCode, context?: string): void {
  if (code !== ARRAY_ERR.OK) {
    throw new ArrayFault(code, context)
  }
}
