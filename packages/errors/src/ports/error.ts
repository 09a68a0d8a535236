export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Offsets, tags and limits travel here as structured data.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface CodecFailure extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational (`true`): malformed or hostile input, values outside the format.
   * - Non-operational (`false`): a broken invariant inside the codec itself.
   *
   * Codec failures are never transient, so retrying with the same input
   * always fails the same way.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
