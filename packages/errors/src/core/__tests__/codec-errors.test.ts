import { CodecError } from "../base-error"
import {
  CyclicValueError,
  DepthExceededError,
  EncodingError,
  InputTooLargeError,
  InvalidValueError,
  OutOfRangeError,
  TrailingDataError,
  TruncatedInputError,
  UnknownDefinitionError,
  UnknownTagError,
} from "../codec-errors"

describe("codec error kinds", () => {
  it("UnknownTagError renders the tag in hex", () => {
    const err = new UnknownTagError(0xab, 7)

    expect(err).toBeInstanceOf(CodecError)
    expect(err.code).toBe("unknown_tag")
    expect(err.message).toBe("Unknown tag 0xab at offset 7")
    expect(err.context).toEqual({ tag: 0xab, offset: 7 })
  })

  it("TruncatedInputError carries offset, need and availability", () => {
    const err = new TruncatedInputError(1, 4, 3)

    expect(err.code).toBe("truncated_input")
    expect(err.context).toEqual({ offset: 1, needed: 4, available: 3 })
  })

  it("TrailingDataError reports where the value ended", () => {
    const err = new TrailingDataError(9, 10)

    expect(err.message).toBe("Trailing data: value ended at offset 9 of 10 byte(s)")
    expect(err.context).toEqual({ nextOffset: 9, byteLength: 10 })
  })

  it("EncodingError keeps its cause", () => {
    const cause = new TypeError("invalid")
    const err = new EncodingError("Invalid UTF-8", { offset: 5 }, { cause })

    expect(err.code).toBe("encoding_error")
    expect(err.cause).toBe(cause)
    expect(err.context).toEqual({ offset: 5 })
  })

  it("OutOfRangeError stringifies 64-bit bounds", () => {
    const err = new OutOfRangeError(2n ** 63n, -(2n ** 63n), 2n ** 63n - 1n)

    expect(err.code).toBe("out_of_range")
    expect(err.context).toEqual({
      value: "9223372036854775808",
      min: "-9223372036854775808",
      max: "9223372036854775807",
    })
    expect(err.message).toBe(
      "Value 9223372036854775808 is outside [-9223372036854775808, 9223372036854775807]",
    )
  })

  it("DepthExceededError names the direction", () => {
    expect(new DepthExceededError(10, "encode").message).toBe(
      "Nesting depth exceeds the limit of 10 while encoding",
    )
    expect(new DepthExceededError(10, "decode").context).toEqual({
      maxDepth: 10,
      direction: "decode",
    })
  })

  it("CyclicValueError renders the path", () => {
    const err = new CyclicValueError([0, "children", 2])

    expect(err.message).toBe("Cyclic value at $[0].children[2]")
    expect(err.context).toEqual({ path: "$[0].children[2]" })
  })

  it("InputTooLargeError carries both sizes", () => {
    expect(new InputTooLargeError(2048, 1024).context).toEqual({
      byteLength: 2048,
      maxInputBytes: 1024,
    })
  })

  it("InvalidValueError describes what it received", () => {
    expect(new InvalidValueError("nope", ["a"], undefined).context).toEqual({
      path: "$.a",
      received: "undefined",
    })
    expect(new InvalidValueError("nope", [], new Date(0)).context.received).toBe("Date")
    expect(new InvalidValueError("nope", [], null).context.received).toBe("null")
    expect(new InvalidValueError("nope", [], Object.create(null)).context.received).toBe(
      "object",
    )
  })

  it("UnknownDefinitionError has key and id forms", () => {
    expect(UnknownDefinitionError.forKey("spawn").message).toBe(
      'Definition "spawn" is not defined',
    )
    expect(UnknownDefinitionError.forId(3).context).toEqual({ id: 3 })
  })
})
