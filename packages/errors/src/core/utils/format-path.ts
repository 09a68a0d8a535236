export type PathSegment = string | number

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * Renders a value path the way error contexts carry it: `$`, `$[0]`, `$.key`,
 * and `$["odd key"]` for keys that are not identifiers.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = "$"
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else if (IDENTIFIER.test(part)) out += `.${part}`
    else out += `[${JSON.stringify(part)}]`
  }
  return out
}
