export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { ObjectSource } from "./adapters/config/object-source"
export { ByteCursor, type ByteCursorOptions } from "./core/bytes/byte-cursor"
export { ByteSink, type ByteSinkOptions } from "./core/bytes/byte-sink"
export { I64_MAX, I64_MIN, INT_RANGES, type IntRange, U32_MAX } from "./core/bytes/limits"
export { decodeUtf8, encodeUtf8 } from "./core/bytes/utf8"
export { CodecConfig } from "./core/config/codec-config"
export {
  DEFAULT_ENV_PREFIX,
  type LoadCodecConfigOptions,
  loadCodecConfig,
} from "./core/config/load-codec-config"
export { type CodecConfigKey, type CodecConfigValues, codecConfigSchema } from "./core/config/schema"
export { decode, decodeExact } from "./core/decoder"
export { encode } from "./core/encoder"
export { DEFAULT_MAX_DEPTH, DEFAULTS, resolveCodecOptions } from "./core/options"
export {
  describeTag,
  FORMAT_VERSION,
  isTag,
  type PayloadShape,
  TAG_INFO,
  Tag,
  type TagInfo,
  tagOf,
} from "./core/registry/tags"
export { fromNative, type NativeValue, toNative } from "./core/value/native"
export { valuesEqual } from "./core/value/values-equal"
export { wire } from "./core/value/wire"
export { createWireCodec, WireCodec, type WireCodecDeps } from "./core/wire-codec"
export type { Codec } from "./ports/codec"
export type { CodecOptions, DecodeResult } from "./ports/codec-options"
export type { ConfigSource } from "./ports/config-source"
export type {
  WireBool,
  WireBytes,
  WireEntry,
  WireFloat,
  WireInt,
  WireKind,
  WireMapping,
  WireNull,
  WireSequence,
  WireString,
  WireValue,
} from "./ports/value"
