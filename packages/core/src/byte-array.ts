// =============================================================================
// Bytevec - Byte Array
// =============================================================================
// Growable contiguous buffer of opaque fixed-size records.

import { ARRAY_ERR, DEFAULT_CAPACITY, GROWTH_FACTOR, MAX_CAPACITY } from './constants'
import type { ArrayErrorCode, ArrayFailureCode } from './constants'
import { STD_ALLOCATOR } from './allocator'
import type { Allocator } from './allocator'
import { ok, err } from './result'
import type { Result } from './result'
import { unwrap } from './errors'
import { ByteArrayIterator } from './iterator'
import { heapSort } from './sort'
import type { ElementComparator } from './sort'

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CAPACITY
}

/**
 * Byte Array - a vector whose elements are `elementSize`-byte records.
 *
 * The array knows nothing about what the bytes mean. Elements go in and come
 * out as `Uint8Array`s and are copied bytewise; references stored inside an
 * element are never followed or released.
 *
 * **Memory:**
 * - The buffer is exactly `capacity * elementSize` bytes
 * - Every allocation, reallocation and release goes through `allocator`
 * - `append` grows the capacity by `GROWTH_FACTOR` when full
 * - `resize` past the capacity grows it to exactly the new size
 *
 * **Errors:**
 * Operations return `ARRAY_ERR` codes (or a `Result`) instead of throwing.
 * Wrap a call in `check()` or `unwrap()` to turn errors into `ArrayFault`s.
 *
 * @remarks
 * Not thread-safe. `destroy()` must be called exactly once per array; every
 * operation afterwards returns `ARRAY_ERR.DESTROYED`.
 */
export class ByteArray implements Iterable<Uint8Array> {
  private buffer: Uint8Array
  private size: number
  private capacity: number
  private readonly elementSize: number
  private readonly allocator: Allocator

  // Bumped on every structural mutation; iterators compare against it
  private generation = 0
  private destroyed = false

  private constructor(buffer: Uint8Array, elementSize: number, capacity: number, size: number, allocator: Allocator) {
    this.buffer = buffer
    this.elementSize = elementSize
    this.capacity = capacity
    this.size = size
    this.allocator = allocator
  }

  /**
   * Create an empty array with room for `capacity` elements.
   *
   * @param elementSize - Bytes per element
   * @param capacity - Initial slot count, at least 1
   * @param allocator - Memory source for the lifetime of the array
   * @returns The array, or `ZERO_CAPACITY`, `INVALID_ARGUMENT` or `ALLOCATION_FAILED`
   */
  static create(
    elementSize: number,
    capacity: number,
    allocator: Allocator = STD_ALLOCATOR
  ): Result<ByteArray, ArrayFailureCode> {
    if (!isCount(elementSize) || elementSize === 0) {
      return err(ARRAY_ERR.INVALID_ARGUMENT)
    }
    if (capacity === 0) {
      return err(ARRAY_ERR.ZERO_CAPACITY)
    }
    if (!isCount(capacity)) {
      return err(ARRAY_ERR.INVALID_ARGUMENT)
    }

    const buffer = allocator.allocate(capacity * elementSize)
    if (buffer === null) {
      return err(ARRAY_ERR.ALLOCATION_FAILED)
    }

    return ok(new ByteArray(buffer, elementSize, capacity, 0, allocator))
  }

  /**
   * Create an empty array with `DEFAULT_CAPACITY` slots.
   */
  static createDefault(elementSize: number, allocator: Allocator = STD_ALLOCATOR): Result<ByteArray, ArrayFailureCode> {
    return ByteArray.create(elementSize, DEFAULT_CAPACITY, allocator)
  }

  /**
   * Copy this array into a new buffer of the same capacity from the same
   * allocator. Occupied elements are copied; the clone shares no memory with
   * the source.
   */
  clone(): Result<ByteArray, ArrayFailureCode> {
    if (this.destroyed) return err(ARRAY_ERR.DESTROYED)

    const buffer = this.allocator.allocate(this.capacity * this.elementSize)
    if (buffer === null) {
      return err(ARRAY_ERR.ALLOCATION_FAILED)
    }
    buffer.set(this.occupied())

    return ok(new ByteArray(buffer, this.elementSize, this.capacity, this.size, this.allocator))
  }

  /**
   * Set the size to `newSize`.
   *
   * Growing past the capacity reallocates to exactly `newSize` slots. Slots
   * uncovered this way hold whatever the allocator left there. Shrinking only
   * moves the size; the buffer is untouched.
   */
  resize(newSize: number): ArrayErrorCode {
    if (this.destroyed) return ARRAY_ERR.DESTROYED
    if (!isCount(newSize)) return ARRAY_ERR.INVALID_ARGUMENT

    if (newSize > this.capacity) {
      const code = this.reallocateTo(newSize)
      if (code !== ARRAY_ERR.OK) return code
    }

    this.size = newSize
    this.generation++
    return ARRAY_ERR.OK
  }

  /**
   * Copy `element` into the slot after the last one, growing first if full.
   *
   * The caller keeps ownership of `element`; only its bytes are copied.
   */
  append(element: Uint8Array): ArrayErrorCode {
    if (this.destroyed) return ARRAY_ERR.DESTROYED
    if (element.byteLength !== this.elementSize) return ARRAY_ERR.ELEMENT_SIZE_MISMATCH

    // A view into our own buffer must be read before the buffer can move
    const source = element.buffer === this.buffer.buffer ? element.slice() : element

    const code = this.reserve(this.size + 1)
    if (code !== ARRAY_ERR.OK) return code

    this.buffer.set(source, this.size * this.elementSize)
    this.size++
    this.generation++
    return ARRAY_ERR.OK
  }

  /**
   * Overwrite the occupied element at `index` with the bytes of `element`.
   */
  set(index: number, element: Uint8Array): ArrayErrorCode {
    if (this.destroyed) return ARRAY_ERR.DESTROYED
    if (element.byteLength !== this.elementSize) return ARRAY_ERR.ELEMENT_SIZE_MISMATCH
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      return ARRAY_ERR.INDEX_OUT_OF_BOUNDS
    }

    this.buffer.set(element, index * this.elementSize)
    return ARRAY_ERR.OK
  }

  /**
   * View of the slot at `index`. Writes through the view land in the array.
   *
   * @remarks
   * The bound is the capacity, not the size, so a buffer pre-sized with
   * `create` can be filled through `at` before `resize` marks it occupied.
   */
  at(index: number): Result<Uint8Array, ArrayFailureCode> {
    if (this.destroyed) return err(ARRAY_ERR.DESTROYED)
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      return err(ARRAY_ERR.INDEX_OUT_OF_BOUNDS)
    }

    const start = index * this.elementSize
    return ok(this.buffer.subarray(start, start + this.elementSize))
  }

  getSize(): number {
    return this.size
  }

  getCapacity(): number {
    return this.capacity
  }

  getElementSize(): number {
    return this.elementSize
  }

  getGeneration(): number {
    return this.generation
  }

  isDestroyed(): boolean {
    return this.destroyed
  }

  /**
   * Reallocate so the capacity equals the size. An empty array keeps one slot.
   */
  shrink(): ArrayErrorCode {
    if (this.destroyed) return ARRAY_ERR.DESTROYED

    const target = Math.max(this.size, 1)
    if (target !== this.capacity) {
      const code = this.reallocateTo(target)
      if (code !== ARRAY_ERR.OK) return code
    }

    this.generation++
    return ARRAY_ERR.OK
  }

  /**
   * Release the buffer through the allocator.
   *
   * Memory referenced from inside elements is not touched. A second call
   * returns `ARRAY_ERR.DESTROYED`.
   */
  destroy(): ArrayErrorCode {
    if (this.destroyed) return ARRAY_ERR.DESTROYED

    this.allocator.deallocate(this.buffer)
    this.buffer = new Uint8Array(0)
    this.size = 0
    this.capacity = 0
    this.destroyed = true
    this.generation++
    return ARRAY_ERR.OK
  }

  /**
   * Append every occupied element of `src`, in order. `src` is not modified;
   * passing the array itself appends a copy of its current contents.
   */
  combine(src: ByteArray): ArrayErrorCode {
    if (this.destroyed || src.destroyed) return ARRAY_ERR.DESTROYED
    if (src.elementSize !== this.elementSize) return ARRAY_ERR.ELEMENT_SIZE_MISMATCH

    const count = src.size
    if (count === 0) return ARRAY_ERR.OK

    const incoming = src === this ? this.occupied().slice() : src.occupied()

    const code = this.reserve(this.size + count)
    if (code !== ARRAY_ERR.OK) return code

    this.buffer.set(incoming, this.size * this.elementSize)
    this.size += count
    this.generation++
    return ARRAY_ERR.OK
  }

  /**
   * Reorder the occupied elements in place by `compare`.
   *
   * Unstable: elements comparing equal end up in no particular order. The
   * comparator receives views into the buffer and must not mutate the array.
   */
  sort(compare: ElementComparator): ArrayErrorCode {
    if (this.destroyed) return ARRAY_ERR.DESTROYED

    // Private swap slot, not taken from the allocator
    const scratch = new Uint8Array(this.elementSize)

    try {
      heapSort(this.buffer, this.size, this.elementSize, compare, scratch)
    } finally {
      this.generation++
    }
    return ARRAY_ERR.OK
  }

  /**
   * Make a forward iterator over the current occupied elements.
   */
  iterator(): Result<ByteArrayIterator, ArrayFailureCode> {
    if (this.destroyed) return err(ARRAY_ERR.DESTROYED)
    return ok(
      new ByteArrayIterator(this, this.buffer, this.size * this.elementSize, this.elementSize, this.generation)
    )
  }

  [Symbol.iterator](): ByteArrayIterator {
    return unwrap(this.iterator(), 'ByteArray iteration')
  }

  /**
   * Copy of the occupied bytes.
   */
  toUint8Array(): Uint8Array {
    return this.occupied().slice()
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private occupied(): Uint8Array {
    return this.buffer.subarray(0, this.size * this.elementSize)
  }

  /**
   * Ensure room for `required` elements, growing by `GROWTH_FACTOR`.
   */
  private reserve(required: number): ArrayErrorCode {
    if (required <= this.capacity) return ARRAY_ERR.OK
    if (required > MAX_CAPACITY) return ARRAY_ERR.ALLOCATION_FAILED

    const grown = Math.min(Math.max(this.capacity * GROWTH_FACTOR, required), MAX_CAPACITY)
    return this.reallocateTo(grown)
  }

  private reallocateTo(slots: number): ArrayErrorCode {
    const next = this.allocator.reallocate(
      this.buffer,
      this.capacity * this.elementSize,
      slots * this.elementSize
    )
    if (next === null) return ARRAY_ERR.ALLOCATION_FAILED

    this.buffer = next
    this.capacity = slots
    return ARRAY_ERR.OK
  }
}
