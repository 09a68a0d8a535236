export const fixedFieldTypes = [
  "boolean",
  "int8",
  "int16",
  "int32",
  "uint8",
  "uint16",
  "uint32",
  "float32",
  "float64",
] as const

/** Types with a fixed byte width; the only types an array can hold. */
export type FixedFieldType = (typeof fixedFieldTypes)[number]

export const scalarFieldTypes = [...fixedFieldTypes, "string"] as const

export type ScalarFieldType = (typeof scalarFieldTypes)[number]

export type FieldType = ScalarFieldType | "array"

export type ScalarFieldSpec = {
  readonly key: string
  readonly type: ScalarFieldType
}

export type ArrayFieldSpec = {
  readonly key: string
  readonly type: "array"
  readonly valueType: FixedFieldType
}

export type FieldSpec = ScalarFieldSpec | ArrayFieldSpec

export type FieldValue = boolean | number | string | readonly boolean[] | readonly number[]

/** Decoded packet: one entry per field, keyed by the field's `key`. */
export type PacketData = Record<string, FieldValue>
