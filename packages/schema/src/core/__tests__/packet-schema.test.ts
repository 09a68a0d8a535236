import {
  InvalidFieldError,
  OutOfRangeError,
  TruncatedInputError,
  UnknownDefinitionError,
} from "@tagwire/errors"
import { PacketSchema } from "../packet-schema"
import { hex } from "./hex"

function gameSchema(): PacketSchema {
  const schema = new PacketSchema()
  schema.define("spawn", [
    { key: "entity_id", type: "int32" },
    { key: "x", type: "float64" },
    { key: "y", type: "float64" },
    { key: "points", type: "array", valueType: "float64" },
    { key: "health", type: "int16" },
  ])
  schema.define("position", [
    { key: "entity_id", type: "int32" },
    { key: "x", type: "float64" },
    { key: "y", type: "float64" },
  ])
  return schema
}

describe("PacketSchema", () => {
  it("prefixes a spawn packet with its id", () => {
    const schema = gameSchema()
    const value = { entity_id: 1, x: 0.5, y: 1.5, points: [0.1, 0.2, 0.3, 0.4], health: 100 }
    const bytes = hex(`
      01
      00 00 00 01
      3f e0 00 00 00 00 00 00
      3f f8 00 00 00 00 00 00
      00 00 00 04
      3f b9 99 99 99 99 99 9a
      3f c9 99 99 99 99 99 9a
      3f d3 33 33 33 33 33 33
      3f d9 99 99 99 99 99 9a
      00 64
    `)

    expect(schema.encode("spawn", value)).toEqual(bytes)
    expect(schema.decode(bytes)).toEqual({ key: "spawn", value, nextOffset: bytes.byteLength })
  })

  it("assigns the second definition id 2", () => {
    const schema = gameSchema()
    const value = { entity_id: 1, x: -123.456, y: 7.89 }
    const bytes = hex("02 00 00 00 01 c0 5e dd 2f 1a 9f be 77 40 1f 8f 5c 28 f5 c2 8f")

    expect(schema.encode("position", value)).toEqual(bytes)
    expect(schema.decode(bytes)).toEqual({ key: "position", value, nextOffset: 21 })
  })

  it("returns the definitions it created", () => {
    const schema = gameSchema()

    expect(schema.get("position")).toMatchObject({ id: 2, key: "position", littleEndian: false })
    expect(schema.get("missing")).toBeUndefined()
  })

  it("writes wider ids big-endian", () => {
    const schema = new PacketSchema({ idType: "uint16" })
    schema.define("ping", [{ key: "seq", type: "uint8" }])

    const bytes = schema.encode("ping", { seq: 9 })
    expect(Array.from(bytes)).toEqual([0x00, 0x01, 0x09])
    expect(schema.decode(bytes).value).toEqual({ seq: 9 })
  })

  it("decodes from an offset", () => {
    const schema = gameSchema()
    const bytes = hex("ff 02 00 00 00 01 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00")

    expect(schema.decode(bytes, 1)).toEqual({
      key: "position",
      value: { entity_id: 1, x: 0, y: 0 },
      nextOffset: 22,
    })
  })

  it("rejects encoding an unknown key", () => {
    expect(() => gameSchema().encode("despawn", {})).toThrowError('Definition "despawn" is not defined')
  })

  it("rejects decoding an unknown id", () => {
    let caught: unknown
    try {
      gameSchema().decode(hex("07 00"))
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(UnknownDefinitionError)
    expect(caught).toMatchObject({ message: "Definition id 7 is not defined", context: { id: 7 } })
  })

  it("rejects redefining a key", () => {
    const schema = gameSchema()

    expect(() => schema.define("spawn", [{ key: "a", type: "uint8" }])).toThrow(InvalidFieldError)
  })

  it("rejects invalid fields without using up an id", () => {
    const schema = new PacketSchema()

    expect(() => schema.define("bad", [{ key: "", type: "uint8" }])).toThrow(InvalidFieldError)
    schema.define("good", [{ key: "a", type: "uint8" }])
    expect(schema.get("good")?.id).toBe(1)
  })

  it("runs out of uint8 ids after 255 definitions", () => {
    const schema = new PacketSchema()
    for (let i = 1; i <= 255; i++) schema.define(`p${i}`, [{ key: "a", type: "uint8" }])

    expect(() => schema.define("p256", [{ key: "a", type: "uint8" }])).toThrowError(
      "Value 256 is outside [1, 255]",
    )
    expect(() => schema.define("p257", [{ key: "a", type: "uint8" }])).toThrow(OutOfRangeError)
  })

  it("rejects a packet cut short", () => {
    expect(() => gameSchema().decode(hex("02 00 00"))).toThrow(TruncatedInputError)
    expect(() => gameSchema().decode(new Uint8Array())).toThrow(TruncatedInputError)
  })
})
