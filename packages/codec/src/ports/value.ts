/**
 * The logical value domain: a closed, recursive union with one case per wire
 * variant. `int` and `float` are distinct and never coerced into each other.
 */
export type WireNull = { readonly kind: "null" }

export type WireBool = { readonly kind: "bool"; readonly value: boolean }

/** Signed 64-bit integer. */
export type WireInt = { readonly kind: "int"; readonly value: bigint }

/** IEEE 754 double, NaN and both infinities included. */
export type WireFloat = { readonly kind: "float"; readonly value: number }

export type WireString = { readonly kind: "string"; readonly value: string }

export type WireBytes = { readonly kind: "bytes"; readonly value: Uint8Array }

export type WireSequence = {
  readonly kind: "sequence"
  readonly items: readonly WireValue[]
}

export type WireEntry = readonly [key: string, value: WireValue]

/**
 * Ordered string-keyed pairs. Order is part of the value: it is written as
 * given and decoded in the same order.
 */
export type WireMapping = {
  readonly kind: "mapping"
  readonly entries: readonly WireEntry[]
}

export type WireValue =
  | WireNull
  | WireBool
  | WireInt
  | WireFloat
  | WireString
  | WireBytes
  | WireSequence
  | WireMapping

export type WireKind = WireValue["kind"]
