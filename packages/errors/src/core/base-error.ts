import type { CodecFailure, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type CodecErrorOptions<C extends ErrorCode, X extends ErrorContext> = Readonly<{
  code: C
  context: X
  cause?: unknown
  isOperational?: boolean
}>

export class CodecError<C extends ErrorCode = ErrorCode, X extends ErrorContext = ErrorContext>
  extends Error
  implements CodecFailure
{
  readonly code: C
  readonly context: Readonly<X>
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CodecErrorOptions<C, X>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - CodecError instances (preserves code, context, etc.)
 * - Standard Error instances (code defaults to "unknown")
 * - Non-Error thrown values (wrapped with context)
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof CodecError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
