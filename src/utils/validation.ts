export const UINT32_MAX = 0xffffffff

// Post ids, page numbers and cursor values are all unsigned 32-bit.
export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= UINT32_MAX
}

// Decimal digits only: no sign, no whitespace, no exponent.
export function parseUint32(text: string): number | null {
  if (!/^\d+$/.test(text)) return null
  const value = Number(text)
  return isUint32(value) ? value : null
}
