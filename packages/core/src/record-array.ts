// =============================================================================
// Bytevec - Record Array
// =============================================================================
// Typed facade over ByteArray: values are encoded through a RecordLayout.

import { ARRAY_ERR, DEFAULT_CAPACITY } from './constants'
import type { ArrayErrorCode, ArrayFailureCode } from './constants'
import { ByteArray } from './byte-array'
import type { Allocator } from './allocator'
import type { RecordLayout } from './layouts'
import { ok, err, map } from './result'
import type { Result } from './result'

/**
 * Array of `T` stored as fixed-size records in a ByteArray.
 *
 * Storage, growth and allocator behaviour are the ByteArray's. The layout
 * fixes the element size at compile time, so mismatched sizes cannot reach
 * the byte layer.
 *
 * @example
 * const ints = unwrap(RecordArray.createDefault(INT32))
 * ints.append(3)
 * ints.append(1)
 * ints.sort((a, b) => a - b)
 * ints.toArray() // [1, 3]
 */
export class RecordArray<T> implements Iterable<T> {
  private readonly scratch: Uint8Array

  private constructor(
    private readonly array: ByteArray,
    private readonly layout: RecordLayout<T>
  ) {
    this.scratch = new Uint8Array(layout.byteSize)
  }

  static create<T>(
    layout: RecordLayout<T>,
    capacity: number,
    allocator?: Allocator
  ): Result<RecordArray<T>, ArrayFailureCode> {
    return map(ByteArray.create(layout.byteSize, capacity, allocator), (array) => new RecordArray(array, layout))
  }

  static createDefault<T>(layout: RecordLayout<T>, allocator?: Allocator): Result<RecordArray<T>, ArrayFailureCode> {
    return RecordArray.create(layout, DEFAULT_CAPACITY, allocator)
  }

  /**
   * Build an array holding `values`, sized to fit them exactly.
   */
  static from<T>(
    layout: RecordLayout<T>,
    values: readonly T[],
    allocator?: Allocator
  ): Result<RecordArray<T>, ArrayFailureCode> {
    const created = RecordArray.create(layout, Math.max(values.length, 1), allocator)
    if (!created.ok) return created

    const records = created.value
    for (const value of values) {
      const code = records.append(value)
      if (code !== ARRAY_ERR.OK) {
        records.destroy()
        return err(code)
      }
    }
    return created
  }

  clone(): Result<RecordArray<T>, ArrayFailureCode> {
    return map(this.array.clone(), (array) => new RecordArray(array, this.layout))
  }

  append(value: T): ArrayErrorCode {
    this.layout.encode(value, this.scratch)
    return this.array.append(this.scratch)
  }

  set(index: number, value: T): ArrayErrorCode {
    this.layout.encode(value, this.scratch)
    return this.array.set(index, this.scratch)
  }

  /**
   * Decode the occupied element at `index`. Unlike `ByteArray.at`, the bound is
   * the size: unoccupied slots hold no meaningful `T`.
   */
  get(index: number): Result<T, ArrayFailureCode> {
    if (index >= this.array.getSize()) return err(ARRAY_ERR.INDEX_OUT_OF_BOUNDS)

    const slot = this.array.at(index)
    if (!slot.ok) return slot
    return ok(this.layout.decode(slot.value))
  }

  resize(newSize: number): ArrayErrorCode {
    return this.array.resize(newSize)
  }

  shrink(): ArrayErrorCode {
    return this.array.shrink()
  }

  destroy(): ArrayErrorCode {
    return this.array.destroy()
  }

  combine(src: RecordArray<T>): ArrayErrorCode {
    return this.array.combine(src.array)
  }

  sort(compare: (a: T, b: T) => number): ArrayErrorCode {
    return this.array.sort((a, b) => compare(this.layout.decode(a), this.layout.decode(b)))
  }

  getSize(): number {
    return this.array.getSize()
  }

  getCapacity(): number {
    return this.array.getCapacity()
  }

  toArray(): T[] {
    return Array.from(this)
  }

  /**
   * The underlying byte array, for byte-level access.
   */
  bytes(): ByteArray {
    return this.array
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const element of this.array) {
      yield this.layout.decode(element)
    }
  }
}
