import { InvalidFieldError } from "@tagwire/errors"
import { z } from "zod"
import { type FieldSpec, fixedFieldTypes, scalarFieldTypes } from "../ports/field"

const key = z.string().min(1, "Field key is required")

const scalarField = z.object({
  key,
  type: z.enum(scalarFieldTypes),
})

const arrayField = z.object({
  key,
  type: z.literal("array"),
  valueType: z.enum(fixedFieldTypes, "Array valueType must be a fixed-width field type"),
})

export const fieldListSchema = z
  .array(z.union([arrayField, scalarField]))
  .superRefine((fields, ctx) => {
    const seen = new Set<string>()
    fields.forEach((field, i) => {
      if (seen.has(field.key)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate field key ${JSON.stringify(field.key)}`,
          path: [i, "key"],
        })
      }
      seen.add(field.key)
    })
  })

/**
 * @throws InvalidFieldError listing every problem with the field list
 */
export function parseFieldSpecs(fields: unknown): FieldSpec[] {
  const result = fieldListSchema.safeParse(fields)
  if (!result.success) {
    throw InvalidFieldError.fromZodError(result.error, "Invalid field definition")
  }
  return result.data
}
