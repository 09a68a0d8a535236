import {
  CyclicValueError,
  DepthExceededError,
  InvalidValueError,
  type PathSegment,
} from "@tagwire/errors"
import type { CodecOptions } from "../ports/codec-options"
import type { WireMapping, WireSequence, WireValue } from "../ports/value"
import { ByteSink } from "./bytes/byte-sink"
import { encodeUtf8 } from "./bytes/utf8"
import { resolveCodecOptions } from "./options"
import { tagOf } from "./registry/tags"

type EncodeState = {
  readonly sink: ByteSink
  readonly maxDepth: number
  /** Containers on the current path, keyed by their items/entries array. */
  readonly active: Set<object>
  readonly path: PathSegment[]
}

function invalid(message: string, state: EncodeState, received: unknown): never {
  throw new InvalidValueError(message, state.path, received)
}

function writeText(state: EncodeState, text: string): void {
  const bytes = encodeUtf8(text, state.path)
  state.sink.writeUint32(bytes.byteLength)
  state.sink.writeBytes(bytes)
}

function enter(state: EncodeState, members: object, depth: number): void {
  if (state.active.has(members)) throw new CyclicValueError(state.path)
  if (depth > state.maxDepth) throw new DepthExceededError(state.maxDepth, "encode")
  state.active.add(members)
}

function writeSequence(state: EncodeState, value: WireSequence, depth: number): void {
  const { items } = value
  if (!Array.isArray(items)) invalid("Sequence items must be an array", state, items)

  enter(state, items, depth)
  state.sink.writeUint32(items.length)
  for (let i = 0; i < items.length; i++) {
    state.path.push(i)
    writeValue(state, items[i], depth)
    state.path.pop()
  }
  state.active.delete(items)
}

function writeMapping(state: EncodeState, value: WireMapping, depth: number): void {
  const { entries } = value
  if (!Array.isArray(entries)) invalid("Mapping entries must be an array", state, entries)

  enter(state, entries, depth)
  state.sink.writeUint32(entries.length)
  for (const entry of entries) {
    if (!Array.isArray(entry) || entry.length !== 2) {
      invalid("Mapping entries must be [key, value] pairs", state, entry)
    }
    const [key, item] = entry
    if (typeof key !== "string") invalid("Mapping keys must be strings", state, key)

    writeText(state, key)
    state.path.push(key)
    writeValue(state, item, depth)
    state.path.pop()
  }
  state.active.delete(entries)
}

/**
 * @param depth - number of containers enclosing `value`
 */
function writeValue(state: EncodeState, value: WireValue, depth: number): void {
  if (typeof value !== "object" || value === null) {
    invalid("Expected a wire value", state, value)
  }

  const { sink } = state

  switch (value.kind) {
    case "null":
      sink.writeUint8(tagOf(value))
      return
    case "bool":
      {
        const raw: unknown = value.value
        if (typeof raw !== "boolean") invalid("Bool value must be a boolean", state, raw)
      }
      sink.writeUint8(tagOf(value))
      return
    case "int":
      {
        const raw: unknown = value.value
        if (typeof raw !== "bigint") invalid("Int value must be a bigint", state, raw)
      }
      sink.writeUint8(tagOf(value))
      sink.writeInt64(value.value)
      return
    case "float":
      {
        const raw: unknown = value.value
        if (typeof raw !== "number") invalid("Float value must be a number", state, raw)
      }
      sink.writeUint8(tagOf(value))
      sink.writeFloat64(value.value)
      return
    case "string":
      {
        const raw: unknown = value.value
        if (typeof raw !== "string") invalid("String value must be a string", state, raw)
      }
      sink.writeUint8(tagOf(value))
      writeText(state, value.value)
      return
    case "bytes":
      if (!(value.value instanceof Uint8Array)) {
        invalid("Bytes value must be a Uint8Array", state, value.value)
      }
      sink.writeUint8(tagOf(value))
      sink.writeUint32(value.value.byteLength)
      sink.writeBytes(value.value)
      return
    case "sequence":
      sink.writeUint8(tagOf(value))
      writeSequence(state, value, depth + 1)
      return
    case "mapping":
      sink.writeUint8(tagOf(value))
      writeMapping(state, value, depth + 1)
      return
    default:
      invalid(`Unknown value kind ${String(Reflect.get(value, "kind"))}`, state, value)
  }
}

/**
 * Encodes one value into a fresh buffer: a tag byte, then the payload,
 * containers depth-first in iteration order.
 *
 * @throws OutOfRangeError for an int outside the signed 64-bit range or a
 * length that does not fit in u32. This is the format's range error
 * (`out_of_range`); the built-in `RangeError` only signals invalid options.
 * @throws EncodingError for a string (or key) holding a lone surrogate
 * @throws DepthExceededError when containers nest deeper than `maxDepth`
 * @throws CyclicValueError when a container contains itself
 * @throws InvalidValueError for anything outside the value domain
 */
export function encode(value: WireValue, options?: Partial<CodecOptions>): Uint8Array {
  const { maxDepth } = resolveCodecOptions(options)
  const state: EncodeState = {
    sink: new ByteSink(),
    maxDepth,
    active: new Set(),
    path: [],
  }

  writeValue(state, value, 0)

  return state.sink.finish()
}
