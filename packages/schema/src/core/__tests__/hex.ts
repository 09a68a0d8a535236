export function hex(text: string): Uint8Array {
  const pairs = text.replace(/\s+/g, "").match(/../g) ?? []
  return Uint8Array.from(pairs, (pair) => Number.parseInt(pair, 16))
}
