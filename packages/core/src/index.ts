// =============================================================================
// Bytevec - Core Module
// =============================================================================
// Type-erased growable array over a swappable allocator.

// Constants & error codes
export {
  DEFAULT_CAPACITY,
  GROWTH_FACTOR,
  MAX_CAPACITY,
  DEFAULT_ARENA_ALIGNMENT,
  ARRAY_ERR
} from './constants'
export type { ArrayErrorCode, ArrayFailureCode } from './constants'

// Results & faults
export { ok, err, isOk, isErr, map, andThen, unwrapOr } from './result'
export type { Ok, Err, Result } from './result'
export { ArrayFault, describeError, unwrap, check } from './errors'

// Allocators
export { STD_ALLOCATOR } from './allocator'
export type { Allocator } from './allocator'
export { ArenaAllocator } from './arena-allocator'
export { TrackingAllocator } from './tracking-allocator'
export type { TrackingAllocatorOptions } from './tracking-allocator'

// Array & iteration
export { ByteArray } from './byte-array'
export { ByteArrayIterator } from './iterator'
export type { IterationSource } from './iterator'
export { heapSort } from './sort'
export type { ElementComparator } from './sort'

// Typed layer
export { RecordArray } from './record-array'
export {
  INT8,
  UINT8,
  INT16,
  UINT16,
  INT32,
  UINT32,
  FLOAT32,
  FLOAT64,
  BIGINT64
} from './layouts'
export type { RecordLayout } from './layouts'
