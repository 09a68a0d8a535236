import type { WireValue } from "../../ports/value"
import { I64_MAX, I64_MIN } from "../bytes/limits"
import { wire } from "../value/wire"

export type WireVector = {
  name: string
  value: WireValue
  bytes: string
}

/**
 * Format version 1 reference encodings. Any other implementation of the
 * format must produce and accept exactly these bytes.
 */
export const vectors: WireVector[] = [
  { name: "null", value: wire.null(), bytes: "00" },
  { name: "false", value: wire.bool(false), bytes: "01" },
  { name: "true", value: wire.bool(true), bytes: "02" },
  { name: "int 0", value: wire.int(0), bytes: "03 00 00 00 00 00 00 00 00" },
  { name: "int 1", value: wire.int(1), bytes: "03 01 00 00 00 00 00 00 00" },
  { name: "int -1", value: wire.int(-1), bytes: "03 ff ff ff ff ff ff ff ff" },
  { name: "int 256", value: wire.int(256), bytes: "03 00 01 00 00 00 00 00 00" },
  { name: "int max", value: wire.int(I64_MAX), bytes: "03 ff ff ff ff ff ff ff 7f" },
  { name: "int min", value: wire.int(I64_MIN), bytes: "03 00 00 00 00 00 00 00 80" },
  { name: "float 1.5", value: wire.float(1.5), bytes: "04 00 00 00 00 00 00 f8 3f" },
  { name: "float 0", value: wire.float(0), bytes: "04 00 00 00 00 00 00 00 00" },
  { name: "float -0", value: wire.float(-0), bytes: "04 00 00 00 00 00 00 00 80" },
  { name: "float +Infinity", value: wire.float(Infinity), bytes: "04 00 00 00 00 00 00 f0 7f" },
  { name: "float -Infinity", value: wire.float(-Infinity), bytes: "04 00 00 00 00 00 00 f0 ff" },
  { name: "float NaN", value: wire.float(Number.NaN), bytes: "04 00 00 00 00 00 00 f8 7f" },
  { name: "empty string", value: wire.string(""), bytes: "05 00 00 00 00" },
  { name: "ascii string", value: wire.string("hi"), bytes: "05 02 00 00 00 68 69" },
  { name: "two-byte code point", value: wire.string("é"), bytes: "05 02 00 00 00 c3 a9" },
  {
    name: "astral code point",
    value: wire.string("\u{1F600}"),
    bytes: "05 04 00 00 00 f0 9f 98 80",
  },
  { name: "empty bytes", value: wire.bytes(new Uint8Array()), bytes: "06 00 00 00 00" },
  {
    name: "bytes",
    value: wire.bytes(Uint8Array.of(0x00, 0xff, 0x10)),
    bytes: "06 03 00 00 00 00 ff 10",
  },
  { name: "empty sequence", value: wire.sequence([]), bytes: "07 00 00 00 00" },
  {
    name: "mixed sequence",
    value: wire.sequence([wire.int(2), wire.string("x"), wire.null()]),
    bytes: "07 03 00 00 00  03 02 00 00 00 00 00 00 00  05 01 00 00 00 78  00",
  },
  { name: "empty mapping", value: wire.mapping([]), bytes: "08 00 00 00 00" },
  {
    name: "nested mapping",
    value: wire.mapping([
      ["a", wire.int(1)],
      ["b", wire.sequence([wire.bool(true), wire.null()])],
    ]),
    bytes:
      "08 02 00 00 00" +
      " 01 00 00 00 61 03 01 00 00 00 00 00 00 00" +
      " 01 00 00 00 62 07 02 00 00 00 02 00",
  },
  {
    name: "empty key",
    value: wire.mapping([["", wire.bool(false)]]),
    bytes: "08 01 00 00 00 00 00 00 00 01",
  },
]
