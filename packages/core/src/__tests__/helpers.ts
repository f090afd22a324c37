import { ByteArray, DEFAULT_CAPACITY, check, unwrap } from '../index'
import type { Allocator } from '../index'

export function int32(value: number): Uint8Array {
    const bytes = new Uint8Array(4)
    new DataView(bytes.buffer).setInt32(0, value, true)
    return bytes
}

export function readInt32(bytes: Uint8Array): number {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getInt32(0, true)
}

export function compareInt32(a: Uint8Array, b: Uint8Array): number {
    return readInt32(a) - readInt32(b)
}

export function fromValues(values: readonly number[], capacity: number = DEFAULT_CAPACITY, allocator?: Allocator): ByteArray {
    const array = unwrap(ByteArray.create(4, capacity, allocator))
    for (const value of values) {
        check(array.append(int32(value)))
    }
    return array
}

export function valuesOf(array: ByteArray): number[] {
    return Array.from(array, readInt32)
}

export function range(from: number, to: number): number[] {
    const out: number[] = []
    for (let i = from; i <= to; i++) out.push(i)
    return out
}
