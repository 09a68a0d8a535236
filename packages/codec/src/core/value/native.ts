import {
  CyclicValueError,
  DepthExceededError,
  InvalidValueError,
  type PathSegment,
} from "@tagwire/errors"
import type { CodecOptions } from "../../ports/codec-options"
import type { WireEntry, WireValue } from "../../ports/value"
import { resolveCodecOptions } from "../options"

/**
 * Plain JavaScript shapes with a direct wire counterpart. Numbers always
 * become floats; use `bigint` for ints.
 */
export type NativeValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | Uint8Array
  | readonly NativeValue[]
  | ReadonlyMap<string, NativeValue>
  | { readonly [key: string]: NativeValue }

type ConvertState = {
  readonly maxDepth: number
  readonly active: Set<object>
  readonly path: PathSegment[]
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function enter(state: ConvertState, container: object, depth: number): void {
  if (state.active.has(container)) throw new CyclicValueError(state.path)
  if (depth > state.maxDepth) throw new DepthExceededError(state.maxDepth, "encode")
  state.active.add(container)
}

function convertEntries(
  state: ConvertState,
  container: object,
  pairs: Iterable<readonly [unknown, unknown]>,
  depth: number,
): WireValue {
  enter(state, container, depth)
  const entries: WireEntry[] = []
  for (const [key, item] of pairs) {
    if (typeof key !== "string") {
      throw new InvalidValueError("Mapping keys must be strings", state.path, key)
    }
    state.path.push(key)
    entries.push([key, convert(state, item, depth)])
    state.path.pop()
  }
  state.active.delete(container)
  return { kind: "mapping", entries }
}

function convert(state: ConvertState, input: unknown, depth: number): WireValue {
  switch (typeof input) {
    case "boolean":
      return { kind: "bool", value: input }
    case "bigint":
      return { kind: "int", value: input }
    case "number":
      return { kind: "float", value: input }
    case "string":
      return { kind: "string", value: input }
    case "object":
      break
    default:
      throw new InvalidValueError(`Unsupported ${typeof input} value`, state.path, input)
  }

  if (input === null) return { kind: "null" }
  if (input instanceof Uint8Array) return { kind: "bytes", value: input.slice() }

  if (Array.isArray(input)) {
    enter(state, input, depth + 1)
    const items: WireValue[] = []
    // Holes in a sparse array read as undefined and are rejected.
    for (let i = 0; i < input.length; i++) {
      const item: unknown = input[i]
      state.path.push(i)
      items.push(convert(state, item, depth + 1))
      state.path.pop()
    }
    state.active.delete(input)
    return { kind: "sequence", items }
  }

  if (input instanceof Map) return convertEntries(state, input, input.entries(), depth + 1)
  if (isPlainObject(input)) return convertEntries(state, input, Object.entries(input), depth + 1)

  throw new InvalidValueError("Unsupported object value", state.path, input)
}

/**
 * Converts plain JavaScript data into a wire value.
 *
 * `Uint8Array` contents are copied. Map and object entries keep insertion
 * order, with the usual caveat that integer-like object keys come first.
 *
 * @throws InvalidValueError for values with no wire counterpart, such as
 * `undefined`, functions, symbols, class instances or non-string Map keys
 * @throws CyclicValueError when a structure contains itself
 * @throws DepthExceededError when nesting exceeds `maxDepth`
 */
export function fromNative(input: unknown, options?: Partial<CodecOptions>): WireValue {
  const { maxDepth } = resolveCodecOptions(options)
  return convert({ maxDepth, active: new Set(), path: [] }, input, 0)
}

/**
 * The inverse of {@link fromNative}: ints become `bigint`, mappings become
 * plain objects. Duplicate mapping keys keep the last value. Keys such as
 * `__proto__` are stored as own properties.
 */
export function toNative(value: WireValue): NativeValue {
  switch (value.kind) {
    case "null":
      return null
    case "bool":
    case "int":
    case "float":
    case "string":
      return value.value
    case "bytes":
      return value.value.slice()
    case "sequence":
      return value.items.map(toNative)
    case "mapping": {
      const out: Record<string, NativeValue> = {}
      for (const [key, item] of value.entries) {
        Object.defineProperty(out, key, {
          value: toNative(item),
          enumerable: true,
          writable: true,
          configurable: true,
        })
      }
      return out
    }
  }
}
