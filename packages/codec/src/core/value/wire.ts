import { InvalidValueError, OutOfRangeError } from "@tagwire/errors"
import type {
  WireBool,
  WireBytes,
  WireEntry,
  WireFloat,
  WireInt,
  WireMapping,
  WireNull,
  WireSequence,
  WireString,
  WireValue,
} from "../../ports/value"
import { I64_MAX, I64_MIN } from "../bytes/limits"

const NULL: WireNull = Object.freeze({ kind: "null" })

function int(value: number | bigint): WireInt {
  if (typeof value === "number") {
    if (!Number.isInteger(value)) {
      throw new InvalidValueError(`Int value must be an integer (got ${value})`, [], value)
    }
    if (!Number.isSafeInteger(value)) {
      throw new OutOfRangeError(value, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER)
    }
    return { kind: "int", value: BigInt(value) }
  }
  if (value < I64_MIN || value > I64_MAX) throw new OutOfRangeError(value, I64_MIN, I64_MAX)
  return { kind: "int", value }
}

type EntrySource = readonly WireEntry[] | Readonly<Record<string, WireValue>>

function isEntryList(source: EntrySource): source is readonly WireEntry[] {
  return Array.isArray(source)
}

function mapping(
  source: EntrySource,
): WireMapping {
  if (isEntryList(source)) return { kind: "mapping", entries: source }
  return { kind: "mapping", entries: Object.entries(source) }
}

/**
 * Builders for each variant.
 *
 * `wire.int` takes a `number` only when it is a safe integer; pass a
 * `bigint` for the rest of the 64-bit range. `wire.bytes` keeps the array it
 * is given. `wire.mapping` takes ordered entries, or a record whose own
 * enumerable keys are taken in JavaScript property order.
 */
export const wire = {
  null: (): WireNull => NULL,
  bool: (value: boolean): WireBool => ({ kind: "bool", value }),
  int,
  float: (value: number): WireFloat => ({ kind: "float", value }),
  string: (value: string): WireString => ({ kind: "string", value }),
  bytes: (value: Uint8Array): WireBytes => ({ kind: "bytes", value }),
  sequence: (items: readonly WireValue[]): WireSequence => ({ kind: "sequence", items }),
  mapping,
} as const
