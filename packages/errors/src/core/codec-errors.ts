import { CodecError } from "./base-error"
import { formatPath, type PathSegment } from "./utils/format-path"

type Cause = Readonly<{ cause?: unknown }>

function hex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, "0")}`
}

function describeReceived(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object") {
    const name = Object.getPrototypeOf(value)?.constructor?.name
    return typeof name === "string" && name.length > 0 ? name : "object"
  }
  return typeof value
}

export type UnknownTagContext = { tag: number; offset: number }

/** A tag byte outside the registry. */
export class UnknownTagError extends CodecError<"unknown_tag", UnknownTagContext> {
  constructor(tag: number, offset: number) {
    super(`Unknown tag ${hex(tag)} at offset ${offset}`, {
      code: "unknown_tag",
      context: { tag, offset },
    })
  }
}

export type TruncatedInputContext = { offset: number; needed: number; available: number }

export class TruncatedInputError extends CodecError<"truncated_input", TruncatedInputContext> {
  constructor(offset: number, needed: number, available: number) {
    super(
      `Truncated input: needed ${needed} byte(s) at offset ${offset}, ${available} available`,
      { code: "truncated_input", context: { offset, needed, available } },
    )
  }
}

export type TrailingDataContext = { nextOffset: number; byteLength: number }

export class TrailingDataError extends CodecError<"trailing_data", TrailingDataContext> {
  constructor(nextOffset: number, byteLength: number) {
    super(
      `Trailing data: value ended at offset ${nextOffset} of ${byteLength} byte(s)`,
      { code: "trailing_data", context: { nextOffset, byteLength } },
    )
  }
}

export type EncodingContext = { offset?: number; path?: string }

/**
 * Text that cannot cross the wire: invalid UTF-8 on decode, or a string
 * holding a lone surrogate on encode.
 */
export class EncodingError extends CodecError<"encoding_error", EncodingContext> {
  constructor(message: string, context: EncodingContext, options: Cause = {}) {
    super(message, { code: "encoding_error", context, cause: options.cause })
  }
}

export type OutOfRangeContext = { value: string; min: string; max: string }

/**
 * A number outside the bit-width or signedness committed for its field.
 * Not a subclass of the built-in `RangeError`, which is left for bad options
 * and offsets. Bounds are kept as strings so 64-bit limits survive JSON.
 */
export class OutOfRangeError extends CodecError<"out_of_range", OutOfRangeContext> {
  constructor(value: number | bigint, min: number | bigint, max: number | bigint) {
    super(`Value ${String(value)} is outside [${String(min)}, ${String(max)}]`, {
      code: "out_of_range",
      context: { value: String(value), min: String(min), max: String(max) },
    })
  }
}

export type DepthDirection = "encode" | "decode"
export type DepthExceededContext = { maxDepth: number; direction: DepthDirection }

export class DepthExceededError extends CodecError<"depth_exceeded", DepthExceededContext> {
  constructor(maxDepth: number, direction: DepthDirection) {
    super(`Nesting depth exceeds the limit of ${maxDepth} while ${direction === "encode" ? "encoding" : "decoding"}`, {
      code: "depth_exceeded",
      context: { maxDepth, direction },
    })
  }
}

export type CyclicValueContext = { path: string }

export class CyclicValueError extends CodecError<"cyclic_value", CyclicValueContext> {
  constructor(path: readonly PathSegment[]) {
    const rendered = formatPath(path)
    super(`Cyclic value at ${rendered}`, {
      code: "cyclic_value",
      context: { path: rendered },
    })
  }
}

export type InputTooLargeContext = { byteLength: number; maxInputBytes: number }

export class InputTooLargeError extends CodecError<"input_too_large", InputTooLargeContext> {
  constructor(byteLength: number, maxInputBytes: number) {
    super(`Input of ${byteLength} byte(s) exceeds the limit of ${maxInputBytes}`, {
      code: "input_too_large",
      context: { byteLength, maxInputBytes },
    })
  }
}

export type InvalidValueContext = { path: string; received: string }

/** A value the logical domain has no variant for. */
export class InvalidValueError extends CodecError<"invalid_value", InvalidValueContext> {
  constructor(message: string, path: readonly PathSegment[], received: unknown) {
    super(message, {
      code: "invalid_value",
      context: { path: formatPath(path), received: describeReceived(received) },
    })
  }
}

export type UnknownDefinitionContext = { key?: string; id?: number }

export class UnknownDefinitionError extends CodecError<
  "unknown_definition",
  UnknownDefinitionContext
> {
  static forKey(key: string): UnknownDefinitionError {
    return new UnknownDefinitionError(`Definition ${JSON.stringify(key)} is not defined`, { key })
  }

  static forId(id: number): UnknownDefinitionError {
    return new UnknownDefinitionError(`Definition id ${id} is not defined`, { id })
  }

  private constructor(message: string, context: UnknownDefinitionContext) {
    super(message, { code: "unknown_definition", context })
  }
}
