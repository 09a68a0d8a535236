export { Definition, defineFields } from "./core/definition"
export { fieldListSchema, parseFieldSpecs } from "./core/field-specs"
export {
  type DefinitionIdType,
  PacketSchema,
  type PacketSchemaOptions,
} from "./core/packet-schema"
export type { DecodedPacket, DecodedSchemaPacket, DefinitionOptions } from "./ports/definition"
export {
  type ArrayFieldSpec,
  type FieldSpec,
  type FieldType,
  type FieldValue,
  type FixedFieldType,
  fixedFieldTypes,
  type PacketData,
  type ScalarFieldSpec,
  type ScalarFieldType,
  scalarFieldTypes,
} from "./ports/field"
