import { UnknownTagError } from "@tagwire/errors"
import { describeTag, FORMAT_VERSION, isTag, TAG_INFO, Tag, tagOf } from "../tags"

describe("tag registry", () => {
  it("pins format version 1", () => {
    expect(FORMAT_VERSION).toBe(1)
  })

  it("covers 0x00 through 0x08 and nothing else", () => {
    expect([...TAG_INFO.keys()].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8])

    for (let byte = 0; byte < 256; byte++) {
      expect(isTag(byte)).toBe(byte <= 0x08)
    }
  })

  it("describes each tag's payload", () => {
    expect(describeTag(Tag.Int)).toEqual({
      tag: 0x03,
      kind: "int",
      name: "int64",
      payload: "fixed",
      width: 8,
    })
    expect(describeTag(Tag.Mapping)).toMatchObject({ kind: "mapping", payload: "counted" })
    expect(describeTag(Tag.True)).toMatchObject({ kind: "bool", payload: "none" })
  })

  it("throws UnknownTagError with the offset it was given", () => {
    let caught: unknown
    try {
      describeTag(0x7f, 12)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(UnknownTagError)
    expect(caught).toMatchObject({
      message: "Unknown tag 0x7f at offset 12",
      context: { tag: 0x7f, offset: 12 },
    })
  })

  it("entries are frozen", () => {
    expect(Object.isFrozen(describeTag(Tag.Null))).toBe(true)
  })

  it("maps values to tags", () => {
    expect(tagOf({ kind: "bool", value: false })).toBe(Tag.False)
    expect(tagOf({ kind: "bool", value: true })).toBe(Tag.True)
    expect(tagOf({ kind: "bytes", value: new Uint8Array() })).toBe(Tag.Bytes)
  })
})
