import { UnknownTagError } from "@tagwire/errors"
import type { WireKind, WireValue } from "../../ports/value"

/**
 * Wire format version pinned by the tag table and field widths below.
 * Any change to either is a breaking change and bumps this number.
 */
export const FORMAT_VERSION = 1

export const Tag = {
  Null: 0x00,
  False: 0x01,
  True: 0x02,
  Int: 0x03,
  Float: 0x04,
  String: 0x05,
  Bytes: 0x06,
  Sequence: 0x07,
  Mapping: 0x08,
} as const

export type Tag = (typeof Tag)[keyof typeof Tag]

/**
 * - `none`: the tag is the whole unit
 * - `fixed`: `width` bytes follow
 * - `length-prefixed`: u32 byte length, then that many bytes
 * - `counted`: u32 count, then that many tagged units (pairs for mappings)
 */
export type PayloadShape = "none" | "fixed" | "length-prefixed" | "counted"

export type TagInfo = Readonly<{
  tag: Tag
  kind: WireKind
  name: string
  payload: PayloadShape
  width?: number
}>

const entries: readonly TagInfo[] = [
  { tag: Tag.Null, kind: "null", name: "null", payload: "none" },
  { tag: Tag.False, kind: "bool", name: "false", payload: "none" },
  { tag: Tag.True, kind: "bool", name: "true", payload: "none" },
  { tag: Tag.Int, kind: "int", name: "int64", payload: "fixed", width: 8 },
  { tag: Tag.Float, kind: "float", name: "float64", payload: "fixed", width: 8 },
  { tag: Tag.String, kind: "string", name: "string", payload: "length-prefixed" },
  { tag: Tag.Bytes, kind: "bytes", name: "bytes", payload: "length-prefixed" },
  { tag: Tag.Sequence, kind: "sequence", name: "sequence", payload: "counted" },
  { tag: Tag.Mapping, kind: "mapping", name: "mapping", payload: "counted" },
]

export const TAG_INFO: ReadonlyMap<number, TagInfo> = new Map<number, TagInfo>(
  entries.map((info) => [info.tag, Object.freeze(info)]),
)

export function isTag(byte: number): byte is Tag {
  return TAG_INFO.has(byte)
}

/**
 * Looks a tag byte up in the registry.
 *
 * @param offset - where the byte was read, for the error context
 * @throws UnknownTagError for any byte outside the table
 */
export function describeTag(byte: number, offset = 0): TagInfo {
  const info = TAG_INFO.get(byte)
  if (!info) throw new UnknownTagError(byte, offset)
  return info
}

/** The tag a value is written under. */
export function tagOf(value: WireValue): Tag {
  switch (value.kind) {
    case "null":
      return Tag.Null
    case "bool":
      return value.value ? Tag.True : Tag.False
    case "int":
      return Tag.Int
    case "float":
      return Tag.Float
    case "string":
      return Tag.String
    case "bytes":
      return Tag.Bytes
    case "sequence":
      return Tag.Sequence
    case "mapping":
      return Tag.Mapping
  }
}
