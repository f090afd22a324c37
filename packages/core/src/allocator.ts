// =============================================================================
// Bytevec - Allocator Abstraction
// =============================================================================
// Every buffer a ByteArray owns is obtained, resized and released through one
// of these.

/**
 * Memory capability injected into a ByteArray at construction.
 *
 * Implementations return `null` when a request cannot be satisfied; the array
 * reports that as `ARRAY_ERR.ALLOCATION_FAILED` and keeps its previous buffer.
 *
 * @remarks
 * `deallocate` must only receive blocks this allocator handed out, and each
 * block at most once. Arrays never keep allocator-specific state, so any
 * implementation (arena, pool, tracking) can be swapped in.
 */
export interface Allocator {
  /** Obtain a block of exactly `bytes` bytes. */
  allocate(bytes: number): Uint8Array | null
  /**
   * Resize `block` to `newBytes`, preserving the first `min(oldBytes, newBytes)`
   * bytes. May return a different block, in which case `block` is released.
   */
  reallocate(block: Uint8Array, oldBytes: number, newBytes: number): Uint8Array | null
  /** Release a block obtained from this allocator. */
  deallocate(block: Uint8Array): void
}

function heapAllocate(bytes: number): Uint8Array | null {
  try {
    return new Uint8Array(bytes)
  } catch (e) {
    if (e instanceof RangeError) return null
    throw e
  }
}

/**
 * Default allocator backed by the JavaScript heap.
 *
 * Fresh blocks are zero-filled. Released blocks are reclaimed by the garbage
 * collector once nothing references them.
 */
export const STD_ALLOCATOR: Allocator = Object.freeze({
  allocate(bytes: number): Uint8Array | null {
    return heapAllocate(bytes)
  },

  reallocate(block: Uint8Array, oldBytes: number, newBytes: number): Uint8Array | null {
    const next = heapAllocate(newBytes)
    if (next === null) return null
    next.set(block.subarray(0, Math.min(oldBytes, newBytes)))
    return next
  },

  deallocate(_block: Uint8Array): void {
    // GC-owned
  }
})
