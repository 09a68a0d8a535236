import { EncodingError, formatPath, type PathSegment } from "@tagwire/errors"

const encoder = new TextEncoder()
// ignoreBOM keeps a leading U+FEFF as part of the string instead of eating it
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

function findLoneSurrogate(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i)
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = text.charCodeAt(i + 1)
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++
        continue
      }
      return i
    }
    if (unit >= 0xdc00 && unit <= 0xdfff) return i
  }
  return -1
}

/**
 * UTF-8 bytes of `text`. A lone surrogate has no UTF-8 form, so it fails
 * instead of being replaced with U+FFFD.
 */
export function encodeUtf8(text: string, path: readonly PathSegment[]): Uint8Array {
  const at = findLoneSurrogate(text)
  if (at !== -1) {
    const rendered = formatPath(path)
    throw new EncodingError(
      `Lone surrogate at index ${at} of the string at ${rendered}`,
      { path: rendered },
    )
  }
  return encoder.encode(text)
}

/**
 * @param offset - where `bytes` start in the input, for the error context
 */
export function decodeUtf8(bytes: Uint8Array, offset: number): string {
  try {
    return decoder.decode(bytes)
  } catch (err) {
    throw new EncodingError(`Invalid UTF-8 in string at offset ${offset}`, { offset }, {
      cause: err,
    })
  }
}
