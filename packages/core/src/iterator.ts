// =============================================================================
// Bytevec - Array Iterator
// =============================================================================

import { ARRAY_ERR } from './constants'
import type { ArrayFailureCode } from './constants'
import { ok, err } from './result'
import type { Result } from './result'
import { unwrap } from './errors'

/**
 * Anything that bumps a generation counter on structural mutation.
 */
export interface IterationSource {
  getGeneration(): number
}

/**
 * Forward cursor over the occupied elements of a ByteArray.
 *
 * Borrows the array's buffer as it was when the iterator was made and owns
 * nothing. Each step compares the array's generation against the snapshot, so
 * an append, resize, shrink, sort, combine or destroy on the source makes the
 * next step fail with `ARRAY_ERR.ITERATOR_INVALIDATED`.
 *
 * **States:**
 * - Active: each step yields the element at `current` and advances
 * - Exhausted: reached once `current === end`, every later step yields nothing
 *
 * @remarks
 * Yielded views alias the array's memory. Do not keep them past the next
 * structural mutation.
 */
export class ByteArrayIterator implements IterableIterator<Uint8Array> {
  private current = 0 // Byte offset of the next element
  private exhausted = false

  constructor(
    private readonly source: IterationSource,
    private readonly buffer: Uint8Array,
    private readonly end: number,
    private readonly elementSize: number,
    private readonly generation: number
  ) {}

  /**
   * Advance without throwing.
   *
   * @returns The next element view, `null` once exhausted, or
   * `ITERATOR_INVALIDATED` if the source changed since creation
   */
  tryNext(): Result<Uint8Array | null, ArrayFailureCode> {
    if (this.exhausted) return ok(null)

    if (this.source.getGeneration() !== this.generation) {
      return err(ARRAY_ERR.ITERATOR_INVALIDATED)
    }

    if (this.current >= this.end) {
      this.exhausted = true
      return ok(null)
    }

    const start = this.current
    this.current += this.elementSize
    return ok(this.buffer.subarray(start, this.current))
  }

  /**
   * Iterator protocol step. Throws `ArrayFault` on a stale iterator.
   */
  next(): IteratorResult<Uint8Array, undefined> {
    const element = unwrap(this.tryNext(), 'ByteArrayIterator.next')
    if (element === null) {
      return { done: true, value: undefined }
    }
    return { done: false, value: element }
  }

  [Symbol.iterator](): this {
    return this
  }
}
