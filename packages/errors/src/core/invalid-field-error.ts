import { CodecError } from "./base-error"
import { formatPath, type PathSegment } from "./utils/format-path"

type ZodIssueLike = {
  path: readonly PropertyKey[]
  message: string
}

type ZodErrorLike = {
  issues: readonly ZodIssueLike[]
}

export type FieldIssue = { path: string; message: string }
export type InvalidFieldContext = { issues: FieldIssue[] }

function toSegments(path: readonly PropertyKey[]): PathSegment[] {
  return path.map((part) => (typeof part === "number" ? part : String(part)))
}

/**
 * A field spec or configuration entry that failed validation.
 */
export class InvalidFieldError extends CodecError<"invalid_field", InvalidFieldContext> {
  constructor(message: string, issues: FieldIssue[]) {
    super(message, { code: "invalid_field", context: { issues } })
  }

  static fromZodError(err: ZodErrorLike, prefix?: string): InvalidFieldError {
    const issues = err.issues.map((i) => ({
      path: formatPath(toSegments(i.path)),
      message: i.message,
    }))

    const first = issues[0]
    const detail = first ? `${first.path}: ${first.message}` : "Invalid input"

    return new InvalidFieldError(prefix ? `${prefix}: ${detail}` : detail, issues)
  }
}
