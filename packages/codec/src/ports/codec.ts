/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs should be pure, deterministic transforms: the same value always
 * yields the same bytes, and `decode` consumes the whole buffer.
 *
 * @example
 * Layering a domain type over the wire codec:
 * ```ts
 * const pointCodec: Codec<Point> = {
 *   encode: (p) => wireCodec.encode(wire.mapping({ x: wire.float(p.x), y: wire.float(p.y) })),
 *   decode: (bytes) => toPoint(wireCodec.decode(bytes)),
 * }
 * ```
 */
export interface Codec<T> {
  /**
   * Encode a value into its byte representation.
   */
  encode(value: T): Uint8Array

  /**
   * Decode a previously encoded byte representation back into a value.
   */
  decode(bytes: Uint8Array): T
}
