import { logLevelNames } from "@tagwire/logger"
import { z } from "zod"
import { DEFAULT_MAX_DEPTH } from "../options"

export const codecConfigSchema = z.object({
  MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
  MAX_INPUT_BYTES: z.coerce.number().int().nonnegative().optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type CodecConfigValues = z.infer<typeof codecConfigSchema>

export type CodecConfigKey = keyof CodecConfigValues & string
