// =============================================================================
// Bytevec - Record Layouts
// =============================================================================
// Codecs between typed values and fixed-size element bytes. All multi-byte
// layouts are little-endian.

/**
 * Describes how a value of type `T` is stored in `byteSize` bytes.
 */
export interface RecordLayout<T> {
  readonly byteSize: number
  /** Write `value` into the first `byteSize` bytes of `target`. */
  encode(value: T, target: Uint8Array): void
  /** Read a value from the first `byteSize` bytes of `source`. */
  decode(source: Uint8Array): T
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

function numberLayout(
  byteSize: number,
  write: (view: DataView, value: number) => void,
  read: (view: DataView) => number
): RecordLayout<number> {
  return Object.freeze({
    byteSize,
    encode(value: number, target: Uint8Array): void {
      write(viewOf(target), value)
    },
    decode(source: Uint8Array): number {
      return read(viewOf(source))
    }
  })
}

export const INT8 = numberLayout(1, (v, x) => v.setInt8(0, x), (v) => v.getInt8(0))
export const UINT8 = numberLayout(1, (v, x) => v.setUint8(0, x), (v) => v.getUint8(0))
export const INT16 = numberLayout(2, (v, x) => v.setInt16(0, x, true), (v) => v.getInt16(0, true))
export const UINT16 = numberLayout(2, (v, x) => v.setUint16(0, x, true), (v) => v.getUint16(0, true))
export const INT32 = numberLayout(4, (v, x) => v.setInt32(0, x, true), (v) => v.getInt32(0, true))
export const UINT32 = numberLayout(4, (v, x) => v.setUint32(0, x, true), (v) => v.getUint32(0, true))
export const FLOAT32 = numberLayout(4, (v, x) => v.setFloat32(0, x, true), (v) => v.getFloat32(0, true))
export const FLOAT64 = numberLayout(8, (v, x) => v.setFloat64(0, x, true), (v) => v.getFloat64(0, true))

export const BIGINT64: RecordLayout<bigint> = Object.freeze({
  byteSize: 8,
  encode(value: bigint, target: Uint8Array): void {
    viewOf(target).setBigInt64(0, value, true)
  },
  decode(source: Uint8Array): bigint {
    return viewOf(source).getBigInt64(0, true)
  }
})
