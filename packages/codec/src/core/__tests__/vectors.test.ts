import { decodeExact } from "../decoder"
import { encode } from "../encoder"
import { valuesEqual } from "../value/values-equal"
import { hex, toHex } from "./hex"
import { vectors } from "./vectors"

describe("format v1 vectors", () => {
  describe.each(vectors)("$name", ({ value, bytes }) => {
    it("encodes to the reference bytes", () => {
      expect(toHex(encode(value))).toBe(toHex(hex(bytes)))
    })

    it("decodes the reference bytes", () => {
      expect(valuesEqual(decodeExact(hex(bytes)), value)).toBe(true)
    })
  })
})
