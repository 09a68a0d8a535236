import { createNullLogger, type Logger } from "@tagwire/logger"
import type { Codec } from "../ports/codec"
import type { CodecOptions, DecodeResult } from "../ports/codec-options"
import type { WireValue } from "../ports/value"
import { decode, decodeExact } from "./decoder"
import { encode } from "./encoder"
import { resolveCodecOptions } from "./options"
import { FORMAT_VERSION } from "./registry/tags"

export type WireCodecDeps = {
  /** @default NullLogger */
  logger?: Logger
}

/**
 * The wire format behind the {@link Codec} port, with limits fixed at
 * construction.
 *
 * Every call is logged on the injected logger: `trace` on success, `debug`
 * with `err` on failure. Failures are rethrown unchanged.
 */
export class WireCodec implements Codec<WireValue> {
  readonly options: Readonly<CodecOptions>
  private readonly log: Logger

  constructor(deps: WireCodecDeps = {}, options: Partial<CodecOptions> = {}) {
    this.options = Object.freeze(resolveCodecOptions(options))
    this.log = (deps.logger ?? createNullLogger()).child({
      module: "wire-codec",
      formatVersion: FORMAT_VERSION,
    })
  }

  encode(value: WireValue): Uint8Array {
    try {
      const bytes = encode(value, this.options)
      this.log.trace("Encoded value", {
        operation: "encode",
        kind: value.kind,
        byteLength: bytes.byteLength,
      })
      return bytes
    } catch (err) {
      this.log.debug("Encode failed", { operation: "encode", err })
      throw err
    }
  }

  /**
   * Decodes a buffer holding exactly one value.
   */
  decode(bytes: Uint8Array): WireValue {
    try {
      const value = decodeExact(bytes, this.options)
      this.log.trace("Decoded value", {
        operation: "decode",
        kind: value.kind,
        byteLength: bytes.byteLength,
        nextOffset: bytes.byteLength,
      })
      return value
    } catch (err) {
      this.log.debug("Decode failed", { operation: "decode", byteLength: bytes.byteLength, err })
      throw err
    }
  }

  /**
   * Decodes one value at `offset`, leaving any bytes after it unread.
   */
  decodeAt(bytes: Uint8Array, offset = 0): DecodeResult {
    try {
      const result = decode(bytes, offset, this.options)
      this.log.trace("Decoded value", {
        operation: "decodeAt",
        kind: result.value.kind,
        byteLength: bytes.byteLength,
        offset,
        nextOffset: result.nextOffset,
      })
      return result
    } catch (err) {
      this.log.debug("Decode failed", {
        operation: "decodeAt",
        byteLength: bytes.byteLength,
        offset,
        err,
      })
      throw err
    }
  }
}

export function createWireCodec(
  deps?: WireCodecDeps,
  options?: Partial<CodecOptions>,
): WireCodec {
  return new WireCodec(deps, options)
}
