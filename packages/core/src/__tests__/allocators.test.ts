// =============================================================================
// Bytevec - Allocator Verification
// =============================================================================

import {
    STD_ALLOCATOR,
    ArenaAllocator,
    TrackingAllocator,
    ByteArray,
    ARRAY_ERR,
    unwrap
} from '../index'
import { alignUp } from '../arena-allocator'
import { int32, fromValues, valuesOf } from './helpers'

describe('STD_ALLOCATOR', () => {
    test('allocates zero-filled blocks of the requested length', () => {
        const block = STD_ALLOCATOR.allocate(16)

        expect(block).not.toBeNull()
        expect(block?.byteLength).toBe(16)
        expect(Array.from(block ?? new Uint8Array(0))).toEqual(new Array(16).fill(0))
    })

    test('reallocate preserves the common prefix when growing and shrinking', () => {
        const block = Uint8Array.of(1, 2, 3, 4)

        expect(Array.from(STD_ALLOCATOR.reallocate(block, 4, 6) ?? new Uint8Array(0))).toEqual([1, 2, 3, 4, 0, 0])
        expect(Array.from(STD_ALLOCATOR.reallocate(block, 4, 2) ?? new Uint8Array(0))).toEqual([1, 2])
    })

    test('is a frozen capability record', () => {
        expect(Object.isFrozen(STD_ALLOCATOR)).toBe(true)
    })
})

describe('ArenaAllocator', () => {
    test('hands out aligned blocks from one buffer', () => {
        const arena = new ArenaAllocator(64)

        const a = arena.allocate(3)
        const b = arena.allocate(5)

        expect(a?.byteOffset).toBe(0)
        expect(b?.byteOffset).toBe(8)
        expect(b?.buffer).toBe(a?.buffer)
        expect(arena.getUsedBytes()).toBe(13)
        expect(arena.getFreeBytes()).toBe(51)
    })

    test('returns null when exhausted', () => {
        const arena = new ArenaAllocator(16)

        expect(arena.allocate(16)).not.toBeNull()
        expect(arena.allocate(1)).toBeNull()
        expect(arena.getUtilization()).toBe(1)
    })

    test('grows the most recent block in place', () => {
        const arena = new ArenaAllocator(64)
        const block = arena.allocate(8)
        block?.set([1, 2, 3, 4, 5, 6, 7, 8])

        const grown = block === null ? null : arena.reallocate(block, 8, 16)

        expect(grown?.byteOffset).toBe(0)
        expect(Array.from(grown ?? new Uint8Array(0))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 0, 0, 0, 0, 0, 0, 0, 0])
        expect(arena.getUsedBytes()).toBe(16)
    })

    test('moves an older block to fresh space', () => {
        const arena = new ArenaAllocator(64)
        const first = arena.allocate(8)
        first?.fill(7)
        arena.allocate(8)

        const moved = first === null ? null : arena.reallocate(first, 8, 12)

        expect(moved?.byteOffset).toBe(16)
        expect(Array.from(moved ?? new Uint8Array(0))).toEqual([7, 7, 7, 7, 7, 7, 7, 7, 0, 0, 0, 0])
        expect(arena.getUsedBytes()).toBe(28)
    })

    test('releasing the most recent block rolls the pointer back', () => {
        const arena = new ArenaAllocator(64)
        const a = arena.allocate(8)
        const b = arena.allocate(8)

        if (b !== null) arena.deallocate(b)
        expect(arena.getUsedBytes()).toBe(8)

        // Only the latest block can be rolled back
        if (a !== null) arena.deallocate(a)
        expect(arena.getUsedBytes()).toBe(8)

        arena.reset()
        expect(arena.getUsedBytes()).toBe(0)
    })

    test('zeroes reused space on allocation', () => {
        const arena = new ArenaAllocator(16)
        const dirty = arena.allocate(8)
        dirty?.fill(255)
        if (dirty !== null) arena.deallocate(dirty)

        const clean = arena.allocate(8)

        expect(Array.from(clean ?? new Uint8Array(0))).toEqual([0, 0, 0, 0, 0, 0, 0, 0])
    })

    test('releasing a zero-byte block leaves the next block live', () => {
        const arena = new ArenaAllocator(64)
        const empty = arena.allocate(0)
        const live = arena.allocate(8)

        expect(empty?.byteLength).toBe(0)
        expect(live?.byteOffset).toBe(empty?.byteOffset)

        if (empty !== null) arena.deallocate(empty)
        expect(arena.getUsedBytes()).toBe(8)

        if (live !== null) arena.deallocate(live)
        expect(arena.getUsedBytes()).toBe(0)
    })

    test('a stale view at the newest offset does not roll back', () => {
        const arena = new ArenaAllocator(64)
        const block = arena.allocate(16)

        if (block !== null) arena.deallocate(block.subarray(0, 4))

        expect(arena.getUsedBytes()).toBe(16)
    })

    test('rejects invalid construction parameters', () => {
        expect(() => new ArenaAllocator(-1)).toThrow(RangeError)
        expect(() => new ArenaAllocator(64, 3)).toThrow(RangeError)
    })

    test('backs a ByteArray until the arena runs out', () => {
        const arena = new ArenaAllocator(16)
        const array = fromValues([1, 2, 3, 4], 2, arena)

        expect(array.getCapacity()).toBe(4)
        expect(arena.getUsedBytes()).toBe(16)

        expect(array.append(int32(5))).toBe(ARRAY_ERR.ALLOCATION_FAILED)
        expect(valuesOf(array)).toEqual([1, 2, 3, 4])
    })
})

describe('TrackingAllocator', () => {
    test('counts live blocks, live bytes and the peak', () => {
        const allocator = new TrackingAllocator()
        const a = allocator.allocate(10)
        allocator.allocate(20)

        expect(allocator.getLiveBlocks()).toBe(2)
        expect(allocator.getLiveBytes()).toBe(30)

        if (a !== null) allocator.deallocate(a)

        expect(allocator.getLiveBlocks()).toBe(1)
        expect(allocator.getLiveBytes()).toBe(20)
        expect(allocator.getPeakBytes()).toBe(30)
        expect(allocator.getAllocationCount()).toBe(2)
        expect(allocator.getDeallocationCount()).toBe(1)
    })

    test('counts double and foreign releases as faults', () => {
        const allocator = new TrackingAllocator()
        const block = allocator.allocate(4)
        if (block !== null) {
            allocator.deallocate(block)
            allocator.deallocate(block)
        }
        allocator.deallocate(new Uint8Array(4))

        expect(allocator.getDeallocationCount()).toBe(1)
        expect(allocator.getFaultCount()).toBe(2)
    })

    test('refuses requests beyond limitBytes', () => {
        const allocator = new TrackingAllocator(STD_ALLOCATOR, { limitBytes: 16 })

        expect(allocator.allocate(16)).not.toBeNull()
        expect(allocator.allocate(1)).toBeNull()
        expect(allocator.getLiveBytes()).toBe(16)
    })

    test('reallocate swaps the tracked block', () => {
        const allocator = new TrackingAllocator()
        const block = allocator.allocate(4)
        const resized = block === null ? null : allocator.reallocate(block, 4, 12)

        expect(resized?.byteLength).toBe(12)
        expect(allocator.getLiveBlocks()).toBe(1)
        expect(allocator.getLiveBytes()).toBe(12)
        expect(allocator.getPeakBytes()).toBe(12)
    })

    test('a destroyed array leaves nothing live in a wrapped arena', () => {
        const arena = new ArenaAllocator(64)
        const allocator = new TrackingAllocator(arena)
        const array = unwrap(ByteArray.create(4, 4, allocator))

        expect(arena.getUsedBytes()).toBe(16)

        array.destroy()

        expect(allocator.getLiveBlocks()).toBe(0)
        expect(arena.getUsedBytes()).toBe(0)
    })
})

describe('alignUp', () => {
    test('rounds up to the alignment', () => {
        expect(alignUp(0, 8)).toBe(0)
        expect(alignUp(1, 8)).toBe(8)
        expect(alignUp(13, 8)).toBe(16)
        expect(alignUp(16, 8)).toBe(16)
    })

    test('stays positive past 2^31', () => {
        expect(alignUp(2 ** 31 + 1, 8)).toBe(2 ** 31 + 8)
        expect(alignUp(2 ** 32 - 3, 4)).toBe(2 ** 32)
    })
})
