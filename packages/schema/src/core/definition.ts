import { ByteCursor, ByteSink } from "@tagwire/codec"
import { InvalidValueError } from "@tagwire/errors"
import type { DecodedPacket, DefinitionOptions } from "../ports/definition"
import type { FieldSpec, PacketData } from "../ports/field"
import { readField, writeField } from "./field-codecs"
import { parseFieldSpecs } from "./field-specs"

/**
 * A fixed sequence of typed fields. Values are written in field order with
 * no tags or names on the wire, so both ends must share the definition.
 */
export class Definition {
  readonly fields: readonly FieldSpec[]
  readonly id: number | undefined
  readonly key: string | undefined
  readonly littleEndian: boolean

  constructor(fields: readonly FieldSpec[], options: DefinitionOptions = {}) {
    this.fields = Object.freeze([...fields])
    this.id = options.id
    this.key = options.key
    this.littleEndian = options.littleEndian ?? false
  }

  /**
   * @throws InvalidValueError when a field's key is missing from `data` or
   * holds a value of the wrong type
   * @throws OutOfRangeError for integers outside their field's range, or a
   * finite number too large for a float32 field
   */
  encode(data: Readonly<Record<string, unknown>>): Uint8Array {
    const sink = new ByteSink({ littleEndian: this.littleEndian })

    for (const field of this.fields) {
      if (!Object.hasOwn(data, field.key)) {
        throw new InvalidValueError(
          `Missing value for field ${JSON.stringify(field.key)}`,
          [field.key],
          undefined,
        )
      }
      writeField(sink, field, data[field.key])
    }

    return sink.finish()
  }

  /**
   * Reads one packet at `offset`. Bytes after it are left alone.
   *
   * @throws TruncatedInputError when the buffer ends inside a field
   */
  decode(bytes: Uint8Array, offset = 0): DecodedPacket {
    const cursor = new ByteCursor(bytes, offset, { littleEndian: this.littleEndian })
    const value: PacketData = {}

    for (const field of this.fields) {
      Object.defineProperty(value, field.key, {
        value: readField(cursor, field),
        enumerable: true,
        writable: true,
        configurable: true,
      })
    }

    return { value, nextOffset: cursor.position }
  }
}

/**
 * Validates the field list and builds a standalone definition.
 *
 * @example
 * ```ts
 * const position = defineFields([
 *   { key: "entity_id", type: "uint32" },
 *   { key: "x", type: "float64" },
 *   { key: "path", type: "array", valueType: "float32" },
 * ])
 * const bytes = position.encode({ entity_id: 7, x: 1.5, path: [0, 0.5] })
 * ```
 *
 * @throws InvalidFieldError for an unknown type, a missing key, a duplicate
 * key or an array of variable-width values
 */
export function defineFields(fields: readonly FieldSpec[], options?: DefinitionOptions): Definition {
  return new Definition(parseFieldSpecs(fields), options)
}
