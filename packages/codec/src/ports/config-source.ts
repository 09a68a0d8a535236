/**
 * A source of raw configuration values.
 *
 * A ConfigSource only *loads*; validation, coercion and merging happen in
 * `loadCodecConfig`. Sources are applied in order and later sources win.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance, e.g. "env" or "object:overrides".
   */
  readonly name: string

  /**
   * Load configuration values. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
