import type { WireValue } from "../../ports/value"

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Structural equality over the value domain, matching what survives a round
 * trip: floats compare by `Object.is` (NaN equals NaN, `0` and `-0` differ)
 * and mappings compare entry by entry in order.
 */
export function valuesEqual(a: WireValue, b: WireValue): boolean {
  if (a === b) return true

  switch (a.kind) {
    case "null":
      return b.kind === "null"
    case "bool":
      return b.kind === "bool" && b.value === a.value
    case "int":
      return b.kind === "int" && b.value === a.value
    case "string":
      return b.kind === "string" && b.value === a.value
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value)
    case "bytes":
      return b.kind === "bytes" && bytesEqual(a.value, b.value)
    case "sequence":
      return (
        b.kind === "sequence" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      )
    case "mapping":
      return (
        b.kind === "mapping" &&
        a.entries.length === b.entries.length &&
        a.entries.every(([key, value], i) => {
          const [otherKey, otherValue] = b.entries[i]
          return key === otherKey && valuesEqual(value, otherValue)
        })
      )
  }
}
