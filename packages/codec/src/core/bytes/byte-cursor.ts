import { TruncatedInputError } from "@tagwire/errors"

export type ByteCursorOptions = {
  /** @default true */
  littleEndian?: boolean
}

/**
 * Bounds-checked read position over an immutable buffer.
 *
 * Nothing is read before the bounds check passes, so a short buffer fails
 * with `TruncatedInputError` and never yields a partial value.
 */
export class ByteCursor {
  readonly littleEndian: boolean
  private readonly bytes: Uint8Array
  private readonly view: DataView
  private pos: number

  constructor(bytes: Uint8Array, offset = 0, options: ByteCursorOptions = {}) {
    if (!Number.isInteger(offset) || offset < 0 || offset > bytes.byteLength) {
      throw new RangeError(
        `offset must be an integer in [0, ${bytes.byteLength}] (got ${offset})`,
      )
    }

    this.bytes = bytes
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    this.pos = offset
    this.littleEndian = options.littleEndian ?? true
  }

  get position(): number {
    return this.pos
  }

  get byteLength(): number {
    return this.bytes.byteLength
  }

  get remaining(): number {
    return this.bytes.byteLength - this.pos
  }

  /** Fails unless at least `n` bytes remain. Does not move the cursor. */
  require(n: number): void {
    if (n > this.remaining) {
      throw new TruncatedInputError(this.pos, n, this.remaining)
    }
  }

  private take(n: number): number {
    this.require(n)
    const start = this.pos
    this.pos += n
    return start
  }

  readUint8(): number {
    return this.view.getUint8(this.take(1))
  }

  readInt8(): number {
    return this.view.getInt8(this.take(1))
  }

  readUint16(): number {
    return this.view.getUint16(this.take(2), this.littleEndian)
  }

  readInt16(): number {
    return this.view.getInt16(this.take(2), this.littleEndian)
  }

  readUint32(): number {
    return this.view.getUint32(this.take(4), this.littleEndian)
  }

  readInt32(): number {
    return this.view.getInt32(this.take(4), this.littleEndian)
  }

  readInt64(): bigint {
    return this.view.getBigInt64(this.take(8), this.littleEndian)
  }

  readFloat32(): number {
    return this.view.getFloat32(this.take(4), this.littleEndian)
  }

  readFloat64(): number {
    return this.view.getFloat64(this.take(8), this.littleEndian)
  }

  /** A view into the underlying buffer; copy it before handing it out. */
  readBytes(n: number): Uint8Array {
    const start = this.take(n)
    return this.bytes.subarray(start, start + n)
  }
}
