export const U32_MAX = 0xffff_ffff

export const I64_MIN = -(2n ** 63n)
export const I64_MAX = 2n ** 63n - 1n

export type IntRange = Readonly<{ min: number; max: number }>

export const INT_RANGES = {
  int8: { min: -0x80, max: 0x7f },
  int16: { min: -0x8000, max: 0x7fff },
  int32: { min: -0x8000_0000, max: 0x7fff_ffff },
  uint8: { min: 0, max: 0xff },
  uint16: { min: 0, max: 0xffff },
  uint32: { min: 0, max: U32_MAX },
} as const satisfies Record<string, IntRange>
