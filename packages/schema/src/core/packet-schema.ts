import { ByteCursor, ByteSink, INT_RANGES } from "@tagwire/codec"
import {
  InvalidFieldError,
  OutOfRangeError,
  UnknownDefinitionError,
} from "@tagwire/errors"
import type { DecodedSchemaPacket } from "../ports/definition"
import type { FieldSpec } from "../ports/field"
import { Definition } from "./definition"
import { parseFieldSpecs } from "./field-specs"

export type DefinitionIdType = "uint8" | "uint16" | "uint32"

type SchemaEntry = Readonly<{
  id: number
  key: string
  definition: Definition
}>

export type PacketSchemaOptions = {
  /** @default "uint8" */
  idType?: DefinitionIdType
}

/**
 * A set of definitions sharing one id space. Each packet starts with its
 * definition id (big-endian, `idType` wide) so the receiver can pick the
 * definition without being told.
 *
 * Ids are handed out from 1 in the order definitions are added, so both
 * ends must define the same packets in the same order.
 */
export class PacketSchema {
  readonly idType: DefinitionIdType
  private readonly byKey = new Map<string, SchemaEntry>()
  private readonly byId = new Map<number, SchemaEntry>()
  private nextId = 1

  constructor(options: PacketSchemaOptions = {}) {
    this.idType = options.idType ?? "uint8"
  }

  /**
   * @throws InvalidFieldError when `key` is already defined or the fields are invalid
   * @throws OutOfRangeError when `idType` has no ids left
   */
  define(key: string, fields: readonly FieldSpec[]): Definition {
    if (this.byKey.has(key)) {
      const message = `Definition ${JSON.stringify(key)} is already defined`
      throw new InvalidFieldError(message, [{ path: "$", message }])
    }

    const { max } = INT_RANGES[this.idType]
    if (this.nextId > max) throw new OutOfRangeError(this.nextId, 1, max)

    const id = this.nextId
    const definition = new Definition(parseFieldSpecs(fields), { id, key })
    const entry: SchemaEntry = { id, key, definition }

    this.byKey.set(key, entry)
    this.byId.set(id, entry)
    this.nextId += 1

    return definition
  }

  get(key: string): Definition | undefined {
    return this.byKey.get(key)?.definition
  }

  /**
   * @throws UnknownDefinitionError when `key` was never defined
   */
  encode(key: string, data: Readonly<Record<string, unknown>>): Uint8Array {
    const entry = this.byKey.get(key)
    if (!entry) throw UnknownDefinitionError.forKey(key)

    const body = entry.definition.encode(data)
    const sink = new ByteSink({ littleEndian: false, initialCapacity: body.byteLength + 4 })
    this.writeId(sink, entry.id)
    sink.writeBytes(body)

    return sink.finish()
  }

  /**
   * @throws UnknownDefinitionError when the packet's id was never assigned
   * @throws TruncatedInputError when the buffer ends inside the packet
   */
  decode(bytes: Uint8Array, offset = 0): DecodedSchemaPacket {
    const cursor = new ByteCursor(bytes, offset, { littleEndian: false })
    const id = this.readId(cursor)

    const entry = this.byId.get(id)
    if (!entry) throw UnknownDefinitionError.forId(id)

    const { value, nextOffset } = entry.definition.decode(bytes, cursor.position)
    return { key: entry.key, value, nextOffset }
  }

  private writeId(sink: ByteSink, id: number): void {
    switch (this.idType) {
      case "uint8":
        return sink.writeUint8(id)
      case "uint16":
        return sink.writeUint16(id)
      case "uint32":
        return sink.writeUint32(id)
    }
  }

  private readId(cursor: ByteCursor): number {
    switch (this.idType) {
      case "uint8":
        return cursor.readUint8()
      case "uint16":
        return cursor.readUint16()
      case "uint32":
        return cursor.readUint32()
    }
  }
}
