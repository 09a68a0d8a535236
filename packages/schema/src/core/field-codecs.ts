import { type ByteCursor, type ByteSink, decodeUtf8, encodeUtf8 } from "@tagwire/codec"
import { InvalidValueError, OutOfRangeError, type PathSegment } from "@tagwire/errors"
import type { FieldSpec, FieldValue, FixedFieldType } from "../ports/field"

type NumericFieldType = Exclude<FixedFieldType, "boolean">

type FixedCodec<T> = {
  readonly size: number
  readonly write: (sink: ByteSink, value: unknown, path: readonly PathSegment[]) => void
  readonly read: (cursor: ByteCursor) => T
}

function expectNumber(value: unknown, path: readonly PathSegment[]): number {
  if (typeof value !== "number") throw new InvalidValueError("Expected a number", path, value)
  return value
}

const FLOAT32_MAX = 3.4028234663852886e38

/** Finite doubles that round to infinity in single precision do not fit. */
function expectFloat32(value: unknown, path: readonly PathSegment[]): number {
  const n = expectNumber(value, path)
  if (Number.isFinite(n) && !Number.isFinite(Math.fround(n))) {
    throw new OutOfRangeError(n, -FLOAT32_MAX, FLOAT32_MAX)
  }
  return n
}

function expectBoolean(value: unknown, path: readonly PathSegment[]): boolean {
  if (typeof value !== "boolean") throw new InvalidValueError("Expected a boolean", path, value)
  return value
}

const fixed: { boolean: FixedCodec<boolean> } & Record<NumericFieldType, FixedCodec<number>> = {
  boolean: {
    size: 1,
    write: (sink, value, path) => sink.writeUint8(expectBoolean(value, path) ? 1 : 0),
    read: (cursor) => cursor.readUint8() !== 0,
  },
  int8: {
    size: 1,
    write: (sink, value, path) => sink.writeInt8(expectNumber(value, path)),
    read: (cursor) => cursor.readInt8(),
  },
  int16: {
    size: 2,
    write: (sink, value, path) => sink.writeInt16(expectNumber(value, path)),
    read: (cursor) => cursor.readInt16(),
  },
  int32: {
    size: 4,
    write: (sink, value, path) => sink.writeInt32(expectNumber(value, path)),
    read: (cursor) => cursor.readInt32(),
  },
  uint8: {
    size: 1,
    write: (sink, value, path) => sink.writeUint8(expectNumber(value, path)),
    read: (cursor) => cursor.readUint8(),
  },
  uint16: {
    size: 2,
    write: (sink, value, path) => sink.writeUint16(expectNumber(value, path)),
    read: (cursor) => cursor.readUint16(),
  },
  uint32: {
    size: 4,
    write: (sink, value, path) => sink.writeUint32(expectNumber(value, path)),
    read: (cursor) => cursor.readUint32(),
  },
  float32: {
    size: 4,
    write: (sink, value, path) => sink.writeFloat32(expectFloat32(value, path)),
    read: (cursor) => cursor.readFloat32(),
  },
  float64: {
    size: 8,
    write: (sink, value, path) => sink.writeFloat64(expectNumber(value, path)),
    read: (cursor) => cursor.readFloat64(),
  },
}

function readItems<T>(cursor: ByteCursor, codec: FixedCodec<T>): T[] {
  const count = cursor.readUint32()
  cursor.require(count * codec.size)

  const items: T[] = []
  for (let i = 0; i < count; i++) items.push(codec.read(cursor))
  return items
}

function readArray(cursor: ByteCursor, valueType: FixedFieldType): FieldValue {
  return valueType === "boolean"
    ? readItems(cursor, fixed.boolean)
    : readItems(cursor, fixed[valueType])
}

/**
 * Writes one field. Integer types reject values their width cannot hold.
 */
export function writeField(sink: ByteSink, field: FieldSpec, value: unknown): void {
  const path: PathSegment[] = [field.key]

  switch (field.type) {
    case "string": {
      if (typeof value !== "string") throw new InvalidValueError("Expected a string", path, value)
      const bytes = encodeUtf8(value, path)
      sink.writeUint32(bytes.byteLength)
      sink.writeBytes(bytes)
      return
    }
    case "array": {
      if (!Array.isArray(value)) throw new InvalidValueError("Expected an array", path, value)
      const codec = fixed[field.valueType]
      sink.writeUint32(value.length)
      value.forEach((item: unknown, i) => codec.write(sink, item, [field.key, i]))
      return
    }
    default:
      fixed[field.type].write(sink, value, path)
  }
}

export function readField(cursor: ByteCursor, field: FieldSpec): FieldValue {
  switch (field.type) {
    case "string": {
      const length = cursor.readUint32()
      const start = cursor.position
      return decodeUtf8(cursor.readBytes(length), start)
    }
    case "array":
      return readArray(cursor, field.valueType)
    default:
      return fixed[field.type].read(cursor)
  }
}
