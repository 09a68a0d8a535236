import { CodecError, serializeError } from "../base-error"
import { TruncatedInputError } from "../codec-errors"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("CodecError instances", () => {
    it("serializes all fields", () => {
      const err = new TruncatedInputError(5, 8, 2)

      expect(serializeError(err)).toEqual({
        name: "TruncatedInputError",
        code: "truncated_input",
        message: "Truncated input: needed 8 byte(s) at offset 5, 2 available",
        context: { offset: 5, needed: 8, available: 2 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("excludes stack by default", () => {
      const err = new CodecError("test", { code: "test", context: {} })

      expect("stack" in serializeError(err)).toBe(false)
    })

    it("includes stack when requested", () => {
      const err = new CodecError("test", { code: "test", context: {} })

      const serialized = serializeError(err, { includeStack: true })

      expect(serialized.stack).toContain("CodecError")
    })

    it("omits stack when it is empty", () => {
      const err = new CodecError("test", { code: "test", context: {} })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes cause chain recursively", () => {
      const root = new TypeError("The encoded data was not valid for encoding utf-8")
      const outer = new CodecError("outer", { code: "encoding_error", context: {}, cause: root })

      const serialized = serializeError(outer)

      expect(serialized.cause?.name).toBe("TypeError")
      expect(serialized.cause?.code).toBe("unknown")
      expect(serialized.cause?.message).toBe(
        "The encoded data was not valid for encoding utf-8",
      )
    })

    it("omits cause when undefined", () => {
      const err = new CodecError("no cause", { code: "test", context: {} })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("serializes with code unknown and isOperational false", () => {
      const serialized = serializeError(new RangeError("offset out of bounds"))

      expect(serialized).toEqual({
        name: "RangeError",
        code: "unknown",
        message: "offset out of bounds",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })

  describe("non-Error values", () => {
    it("wraps string as message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
      expect(serialized.context).toEqual({})
    })

    it("wraps other values in context.value", () => {
      const serialized = serializeError(42)

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: 42 })
    })
  })
})
