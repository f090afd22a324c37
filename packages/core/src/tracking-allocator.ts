// =============================================================================
// Bytevec - Tracking Allocator
// =============================================================================

import { STD_ALLOCATOR } from './allocator'
import type { Allocator } from './allocator'

export interface TrackingAllocatorOptions {
  /** Refuse requests that would raise live bytes above this (default: unlimited) */
  limitBytes?: number
}

const DEFAULT_OPTIONS: Required<TrackingAllocatorOptions> = {
  limitBytes: Number.POSITIVE_INFINITY
}

/**
 * Tracking Allocator - wraps another allocator and accounts for every block.
 *
 * Useful for leak checks (`getLiveBlocks() === 0` after destroy), for
 * simulating exhaustion through `limitBytes`, and for spotting releases of
 * unknown or already released blocks (`getFaultCount()`).
 */
export class TrackingAllocator implements Allocator {
  private readonly inner: Allocator
  private readonly limitBytes: number
  private readonly live = new Map<Uint8Array, number>()

  private liveBytes = 0
  private peakBytes = 0
  private allocations = 0
  private deallocations = 0
  private faults = 0

  constructor(inner: Allocator = STD_ALLOCATOR, options?: TrackingAllocatorOptions) {
    const config = { ...DEFAULT_OPTIONS, ...options }
    this.inner = inner
    this.limitBytes = config.limitBytes
  }

  allocate(bytes: number): Uint8Array | null {
    if (this.liveBytes + bytes > this.limitBytes) return null

    const block = this.inner.allocate(bytes)
    if (block === null) return null

    this.track(block, bytes)
    this.allocations++
    return block
  }

  reallocate(block: Uint8Array, oldBytes: number, newBytes: number): Uint8Array | null {
    const previous = this.live.get(block)
    if (previous === undefined) {
      this.faults++
      return null
    }
    if (this.liveBytes - previous + newBytes > this.limitBytes) return null

    const resized = this.inner.reallocate(block, oldBytes, newBytes)
    if (resized === null) return null

    this.untrack(block, previous)
    this.track(resized, newBytes)
    return resized
  }

  deallocate(block: Uint8Array): void {
    const bytes = this.live.get(block)
    if (bytes === undefined) {
      // Double release or foreign block
      this.faults++
      return
    }

    this.untrack(block, bytes)
    this.deallocations++
    this.inner.deallocate(block)
  }

  // ===========================================================================
  // Observability
  // ===========================================================================

  getLiveBlocks(): number {
    return this.live.size
  }

  getLiveBytes(): number {
    return this.liveBytes
  }

  getPeakBytes(): number {
    return this.peakBytes
  }

  getAllocationCount(): number {
    return this.allocations
  }

  getDeallocationCount(): number {
    return this.deallocations
  }

  getFaultCount(): number {
    return this.faults
  }

  private track(block: Uint8Array, bytes: number): void {
    this.live.set(block, bytes)
    this.liveBytes += bytes
    if (this.liveBytes > this.peakBytes) {
      this.peakBytes = this.liveBytes
    }
  }

  private untrack(block: Uint8Array, bytes: number): void {
    this.live.delete(block)
    this.liveBytes -= bytes
  }
}
