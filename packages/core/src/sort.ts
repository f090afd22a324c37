// =============================================================================
// Bytevec - Heap Sort
// =============================================================================

/**
 * Three-way comparator over two element views: negative if `a` sorts first,
 * zero if equivalent, positive if `b` sorts first.
 */
export type ElementComparator = (a: Uint8Array, b: Uint8Array) => number

/**
 * In-place heap sort of `count` fixed-size records packed at the start of
 * `bytes`.
 *
 * Not stable. Records the comparator deems equal may end up in any order.
 *
 * @param scratch - At least `elementSize` bytes used to swap records
 */
export function heapSort(
  bytes: Uint8Array,
  count: number,
  elementSize: number,
  compare: ElementComparator,
  scratch: Uint8Array
): void {
  const view = (index: number): Uint8Array => {
    const start = index * elementSize
    return bytes.subarray(start, start + elementSize)
  }

  const swap = (i: number, j: number): void => {
    const a = i * elementSize
    const b = j * elementSize
    scratch.set(bytes.subarray(a, a + elementSize))
    bytes.copyWithin(a, b, b + elementSize)
    bytes.set(scratch.subarray(0, elementSize), b)
  }

  // Restore max-heap property below `index` within the first `length` records
  const siftDown = (index: number, length: number): void => {
    while (true) {
      const leftChild = 2 * index + 1
      const rightChild = 2 * index + 2
      let largest = index

      if (leftChild < length && compare(view(leftChild), view(largest)) > 0) {
        largest = leftChild
      }

      if (rightChild < length && compare(view(rightChild), view(largest)) > 0) {
        largest = rightChild
      }

      if (largest === index) {
        break
      }

      swap(index, largest)
      index = largest
    }
  }

  for (let i = Math.floor(count / 2) - 1; i >= 0; i--) {
    siftDown(i, count)
  }

  for (let end = count - 1; end > 0; end--) {
    swap(0, end)
    siftDown(0, end)
  }
}
