// =============================================================================
// Bytevec - Arena Allocator
// =============================================================================
// Bump-pointer allocator over a single fixed ArrayBuffer.

import { DEFAULT_ARENA_ALIGNMENT } from './constants'
import type { Allocator } from './allocator'

/**
 * Round `offset` up to a multiple of `alignment`. Plain arithmetic, so
 * offsets past 2^31 stay correct.
 */
export function alignUp(offset: number, alignment: number): number {
  return Math.ceil(offset / alignment) * alignment
}

/**
 * Arena Allocator.
 *
 * Hands out aligned views into one `ArrayBuffer` by bumping a pointer.
 *
 * **Reclamation:**
 * - Releasing (or resizing) the most recent block reuses its space immediately
 * - Any other released block stays reserved until `reset()`
 *
 * Zero-byte requests get an empty view that never becomes the most recent
 * block. Returns `null` once the arena cannot fit a request.
 */
export class ArenaAllocator implements Allocator {
  private readonly buffer: ArrayBuffer
  private readonly alignment: number
  private nextPtr = 0 // Byte offset to next free byte
  private lastPtr = -1 // Byte offset of the most recent block, -1 if none
  private lastBytes = 0 // Length of the most recent block

  /**
   * @param byteLength - Total arena size in bytes
   * @param alignment - Start alignment of every block, a power of two
   */
  constructor(byteLength: number, alignment: number = DEFAULT_ARENA_ALIGNMENT) {
    if (!Number.isInteger(byteLength) || byteLength < 0) {
      throw new RangeError(`Arena size must be a non-negative integer, got ${byteLength}`)
    }
    if (!Number.isInteger(alignment) || alignment < 1 || (alignment & (alignment - 1)) !== 0) {
      throw new RangeError(`Arena alignment must be a power of two, got ${alignment}`)
    }
    this.buffer = new ArrayBuffer(byteLength)
    this.alignment = alignment
  }

  allocate(bytes: number): Uint8Array | null {
    const start = alignUp(this.nextPtr, this.alignment)
    if (start + bytes > this.buffer.byteLength) {
      return null
    }
    if (bytes === 0) {
      return new Uint8Array(this.buffer, start, 0)
    }

    this.lastPtr = start
    this.lastBytes = bytes
    this.nextPtr = start + bytes

    // Zero-on-alloc: rolled-back space may hold stale bytes
    const block = new Uint8Array(this.buffer, start, bytes)
    block.fill(0)
    return block
  }

  reallocate(block: Uint8Array, oldBytes: number, newBytes: number): Uint8Array | null {
    if (this.isLast(block)) {
      const start = this.lastPtr
      if (start + newBytes > this.buffer.byteLength) {
        return null
      }
      this.nextPtr = start + newBytes
      if (newBytes === 0) {
        this.lastPtr = -1
      } else {
        this.lastBytes = newBytes
      }
      const resized = new Uint8Array(this.buffer, start, newBytes)
      if (newBytes > oldBytes) {
        resized.fill(0, oldBytes)
      }
      return resized
    }

    const moved = this.allocate(newBytes)
    if (moved === null) return null
    moved.set(block.subarray(0, Math.min(oldBytes, newBytes)))
    this.deallocate(block)
    return moved
  }

  deallocate(block: Uint8Array): void {
    if (this.isLast(block)) {
      this.nextPtr = this.lastPtr
      this.lastPtr = -1
    }
  }

  /**
   * Release every block at once.
   *
   * @remarks
   * Views handed out earlier still alias the arena and will see later
   * allocations. Only call this once no array uses the arena.
   */
  reset(): void {
    this.nextPtr = 0
    this.lastPtr = -1
  }

  // ===========================================================================
  // Telemetry
  // ===========================================================================

  getUsedBytes(): number {
    return this.nextPtr
  }

  getFreeBytes(): number {
    return this.buffer.byteLength - this.nextPtr
  }

  /**
   * @returns Ratio from 0.0 (empty) to 1.0 (full)
   */
  getUtilization(): number {
    const total = this.buffer.byteLength
    return total === 0 ? 0 : this.nextPtr / total
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private isLast(block: Uint8Array): boolean {
    return (
      this.lastPtr !== -1 &&
      block.buffer === this.buffer &&
      block.byteOffset === this.lastPtr &&
      block.byteLength === this.lastBytes
    )
  }
}
