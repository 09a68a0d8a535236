import { OutOfRangeError } from "@tagwire/errors"
import { I64_MAX, I64_MIN, INT_RANGES, type IntRange } from "./limits"

export type ByteSinkOptions = {
  /** @default true */
  littleEndian?: boolean
  /** @default 64 */
  initialCapacity?: number
}

function checkInt(value: number, range: IntRange): void {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new OutOfRangeError(value, range.min, range.max)
  }
}

/**
 * Append-only growable buffer for the encode side.
 *
 * Every multi-byte write uses the byte order fixed at construction, and every
 * integer write rejects values its width cannot hold instead of wrapping.
 */
export class ByteSink {
  readonly littleEndian: boolean
  private buf: Uint8Array
  private view: DataView
  private pos = 0

  constructor(options: ByteSinkOptions = {}) {
    const capacity = Math.max(1, Math.floor(options.initialCapacity ?? 64))
    this.littleEndian = options.littleEndian ?? true
    this.buf = new Uint8Array(capacity)
    this.view = new DataView(this.buf.buffer)
  }

  /** Bytes written so far. */
  get length(): number {
    return this.pos
  }

  private reserve(n: number): number {
    const start = this.pos
    if (start + n > this.buf.length) {
      let capacity = this.buf.length
      while (capacity < start + n) capacity *= 2
      const next = new Uint8Array(capacity)
      next.set(this.buf.subarray(0, start))
      this.buf = next
      this.view = new DataView(next.buffer)
    }
    this.pos = start + n
    return start
  }

  writeUint8(value: number): void {
    checkInt(value, INT_RANGES.uint8)
    const at = this.reserve(1)
    this.view.setUint8(at, value)
  }

  writeInt8(value: number): void {
    checkInt(value, INT_RANGES.int8)
    const at = this.reserve(1)
    this.view.setInt8(at, value)
  }

  writeUint16(value: number): void {
    checkInt(value, INT_RANGES.uint16)
    const at = this.reserve(2)
    this.view.setUint16(at, value, this.littleEndian)
  }

  writeInt16(value: number): void {
    checkInt(value, INT_RANGES.int16)
    const at = this.reserve(2)
    this.view.setInt16(at, value, this.littleEndian)
  }

  writeUint32(value: number): void {
    checkInt(value, INT_RANGES.uint32)
    const at = this.reserve(4)
    this.view.setUint32(at, value, this.littleEndian)
  }

  writeInt32(value: number): void {
    checkInt(value, INT_RANGES.int32)
    const at = this.reserve(4)
    this.view.setInt32(at, value, this.littleEndian)
  }

  writeInt64(value: bigint): void {
    if (value < I64_MIN || value > I64_MAX) {
      throw new OutOfRangeError(value, I64_MIN, I64_MAX)
    }
    const at = this.reserve(8)
    this.view.setBigInt64(at, value, this.littleEndian)
  }

  writeFloat32(value: number): void {
    const at = this.reserve(4)
    this.view.setFloat32(at, value, this.littleEndian)
  }

  writeFloat64(value: number): void {
    const at = this.reserve(8)
    this.view.setFloat64(at, value, this.littleEndian)
  }

  writeBytes(bytes: Uint8Array): void {
    const at = this.reserve(bytes.byteLength)
    this.buf.set(bytes, at)
  }

  /** A right-sized copy of everything written. The sink stays usable. */
  finish(): Uint8Array {
    return this.buf.slice(0, this.pos)
  }
}
