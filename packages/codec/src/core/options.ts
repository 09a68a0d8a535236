import type { CodecOptions } from "../ports/codec-options"

export const DEFAULT_MAX_DEPTH = 1000

export const DEFAULTS: Readonly<CodecOptions> = Object.freeze({
  maxDepth: DEFAULT_MAX_DEPTH,
})

/**
 * Applies defaults and validates limits.
 *
 * @throws RangeError when `maxDepth` is not a positive integer or
 * `maxInputBytes` is not a non-negative integer
 */
export function resolveCodecOptions(options: Partial<CodecOptions> = {}): CodecOptions {
  const maxDepth = options.maxDepth ?? DEFAULTS.maxDepth
  const { maxInputBytes } = options

  if (!Number.isSafeInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer (got ${maxDepth})`)
  }

  if (
    maxInputBytes !== undefined &&
    (!Number.isSafeInteger(maxInputBytes) || maxInputBytes < 0)
  ) {
    throw new RangeError(
      `maxInputBytes must be a non-negative integer (got ${maxInputBytes})`,
    )
  }

  return {
    maxDepth,
    ...(maxInputBytes !== undefined && { maxInputBytes }),
  }
}
