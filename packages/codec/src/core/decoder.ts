import { DepthExceededError, InputTooLargeError, TrailingDataError } from "@tagwire/errors"
import type { CodecOptions, DecodeResult } from "../ports/codec-options"
import type { WireEntry, WireValue } from "../ports/value"
import { ByteCursor } from "./bytes/byte-cursor"
import { decodeUtf8 } from "./bytes/utf8"
import { resolveCodecOptions } from "./options"
import { describeTag, Tag } from "./registry/tags"

// Smallest encodings of one sequence item (a bare tag) and one mapping pair
// (empty key length plus a bare tag), used to reject impossible counts early.
const MIN_ITEM_BYTES = 1
const MIN_PAIR_BYTES = 5

function readText(cursor: ByteCursor): string {
  const length = cursor.readUint32()
  const start = cursor.position
  return decodeUtf8(cursor.readBytes(length), start)
}

function readCount(cursor: ByteCursor, minUnitBytes: number): number {
  const count = cursor.readUint32()
  cursor.require(count * minUnitBytes)
  return count
}

/**
 * @param depth - number of containers enclosing the value about to be read
 */
function readValue(cursor: ByteCursor, maxDepth: number, depth: number): WireValue {
  const offset = cursor.position
  const info = describeTag(cursor.readUint8(), offset)

  switch (info.tag) {
    case Tag.Null:
      return { kind: "null" }
    case Tag.False:
      return { kind: "bool", value: false }
    case Tag.True:
      return { kind: "bool", value: true }
    case Tag.Int:
      return { kind: "int", value: cursor.readInt64() }
    case Tag.Float:
      return { kind: "float", value: cursor.readFloat64() }
    case Tag.String:
      return { kind: "string", value: readText(cursor) }
    case Tag.Bytes: {
      const length = cursor.readUint32()
      return { kind: "bytes", value: cursor.readBytes(length).slice() }
    }
    case Tag.Sequence: {
      if (depth + 1 > maxDepth) throw new DepthExceededError(maxDepth, "decode")
      const count = readCount(cursor, MIN_ITEM_BYTES)
      const items: WireValue[] = []
      for (let i = 0; i < count; i++) {
        items.push(readValue(cursor, maxDepth, depth + 1))
      }
      return { kind: "sequence", items }
    }
    case Tag.Mapping: {
      if (depth + 1 > maxDepth) throw new DepthExceededError(maxDepth, "decode")
      const count = readCount(cursor, MIN_PAIR_BYTES)
      const entries: WireEntry[] = []
      for (let i = 0; i < count; i++) {
        const key = readText(cursor)
        entries.push([key, readValue(cursor, maxDepth, depth + 1)])
      }
      return { kind: "mapping", entries }
    }
  }
}

/**
 * Decodes one value starting at `offset` and reports where it ended.
 * Bytes after the value are left alone, so values can be read back to back.
 *
 * @throws RangeError for an offset outside the buffer or invalid options
 * @throws InputTooLargeError when the bytes from `offset` exceed `maxInputBytes`
 * @throws UnknownTagError for a tag byte outside the registry
 * @throws TruncatedInputError when the buffer ends inside a value
 * @throws EncodingError for a string that is not valid UTF-8
 * @throws DepthExceededError when containers nest deeper than `maxDepth`
 */
export function decode(
  bytes: Uint8Array,
  offset = 0,
  options?: Partial<CodecOptions>,
): DecodeResult {
  const { maxDepth, maxInputBytes } = resolveCodecOptions(options)
  const cursor = new ByteCursor(bytes, offset)

  if (maxInputBytes !== undefined && cursor.remaining > maxInputBytes) {
    throw new InputTooLargeError(cursor.remaining, maxInputBytes)
  }

  const value = readValue(cursor, maxDepth, 0)
  return { value, nextOffset: cursor.position }
}

/**
 * Decodes a buffer holding exactly one value.
 *
 * @throws TrailingDataError when bytes remain after the value
 */
export function decodeExact(bytes: Uint8Array, options?: Partial<CodecOptions>): WireValue {
  const { value, nextOffset } = decode(bytes, 0, options)
  if (nextOffset !== bytes.byteLength) {
    throw new TrailingDataError(nextOffset, bytes.byteLength)
  }
  return value
}
