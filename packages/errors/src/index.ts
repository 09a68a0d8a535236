export {
  CodecError,
  type CodecErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export {
  CyclicValueError,
  type DepthDirection,
  DepthExceededError,
  EncodingError,
  InputTooLargeError,
  InvalidValueError,
  OutOfRangeError,
  TrailingDataError,
  TruncatedInputError,
  UnknownDefinitionError,
  UnknownTagError,
} from "./core/codec-errors"
export { type FieldIssue, InvalidFieldError } from "./core/invalid-field-error"
export { formatPath, type PathSegment } from "./core/utils/format-path"
export { isCodecError } from "./core/utils/is-codec-error"
export type { CodecFailure, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
