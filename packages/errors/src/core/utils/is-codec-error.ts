import type { CodecFailure } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for codec failures, including ones raised by another copy of
 * this package (so `instanceof` alone is not enough).
 *
 * @example
 * ```ts
 * try {
 *   decodeExact(bytes)
 * } catch (err) {
 *   if (isCodecError(err) && err.code === "truncated_input") {
 *     // wait for more bytes
 *   }
 * }
 * ```
 */
export function isCodecError(e: unknown): e is CodecFailure {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
