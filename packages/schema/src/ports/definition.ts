import type { PacketData } from "./field"

export type DefinitionOptions = {
  /** Identifies the definition inside a packet schema. */
  id?: number
  /** Human-readable name inside a packet schema. */
  key?: string
  /** @default false */
  littleEndian?: boolean
}

export type DecodedPacket = {
  value: PacketData
  nextOffset: number
}

export type DecodedSchemaPacket = DecodedPacket & {
  key: string
}
