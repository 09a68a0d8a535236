import type { WireValue } from "./value"

export type CodecOptions = {
  /**
   * Deepest container nesting accepted in either direction.
   * The outermost sequence or mapping counts as depth 1.
   */
  maxDepth: number

  /**
   * Upper bound on the bytes a decode call is willing to look at, measured
   * from the starting offset to the end of the buffer. Unset means unbounded.
   */
  maxInputBytes?: number
}

export type DecodeResult = {
  value: WireValue
  nextOffset: number
}
