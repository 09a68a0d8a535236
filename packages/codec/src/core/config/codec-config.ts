import type { LoggerOptions } from "@tagwire/logger"
import type { CodecOptions } from "../../ports/codec-options"
import type { CodecConfigKey, CodecConfigValues } from "./schema"

/**
 * Validated codec configuration with provenance for every key.
 *
 * @example
 * ```ts
 * const config = await loadCodecConfig()
 * config.value.MAX_DEPTH       // 1000
 * config.explain("MAX_DEPTH")  // "default"
 * new WireCodec({ logger }, config.toCodecOptions())
 * ```
 */
export class CodecConfig {
  constructor(
    private readonly data: Readonly<CodecConfigValues>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
    private readonly knownKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<CodecConfigValues> {
    return this.data
  }

  /**
   * The source that supplied `key`, or "default" when the schema default was used.
   */
  explain(key: CodecConfigKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys some source provided that the schema does not define. */
  unknownKeys(): string[] {
    return [...this.providedKeys].filter((k) => !this.knownKeys.has(k))
  }

  toCodecOptions(): CodecOptions {
    const { MAX_DEPTH, MAX_INPUT_BYTES } = this.data
    return {
      maxDepth: MAX_DEPTH,
      ...(MAX_INPUT_BYTES !== undefined && { maxInputBytes: MAX_INPUT_BYTES }),
    }
  }

  toLoggerOptions(): LoggerOptions {
    return { level: this.data.LOG_LEVEL, prettify: this.data.LOG_PRETTY }
  }
}
