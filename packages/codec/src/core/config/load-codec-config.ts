import { InvalidFieldError } from "@tagwire/errors"
import { EnvSource } from "../../adapters/config/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { CodecConfig } from "./codec-config"
import { codecConfigSchema } from "./schema"

export const DEFAULT_ENV_PREFIX = "TAGWIRE_"

export type LoadCodecConfigOptions = {
  /** @default [new EnvSource({ prefix: "TAGWIRE_" })] */
  sources?: ConfigSource[]
}

/**
 * Merges the sources in order, then validates the result.
 *
 * @throws InvalidFieldError carrying every validation issue
 */
export async function loadCodecConfig({
  sources,
}: LoadCodecConfigOptions = {}): Promise<CodecConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource({ prefix: DEFAULT_ENV_PREFIX })]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = codecConfigSchema.safeParse(merged)

  if (!result.success) {
    throw InvalidFieldError.fromZodError(result.error, "Configuration validation failed")
  }

  const knownKeys = new Set(Object.keys(codecConfigSchema.shape))

  for (const key of Object.keys(provenance)) {
    if (!knownKeys.has(key)) delete provenance[key]
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) provenance[key] = "default"
  }

  return new CodecConfig(result.data, provenance, new Set(Object.keys(merged)), knownKeys)
}
