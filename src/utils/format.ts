// src/utils/format.ts

const TAIL_DIGITS = 30
const EXACT_TIE = '5' + '0'.repeat(TAIL_DIGITS - 1)

// fixed-point text like toFixed, but exact ties round to the even digit (12.25 -> "12.2")
export function toFixedEven(value: number, digits: number): string {
  const rounded = value.toFixed(digits)
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return rounded

  // toFixed expands the exact binary value, so the tail shows whether this is a true tie
  const exact = Math.abs(value).toFixed(digits + TAIL_DIGITS)
  if (exact.slice(-TAIL_DIGITS) !== EXACT_TIE) return rounded
  if (Number(rounded.slice(-1)) % 2 === 0) return rounded

  const truncated = exact.slice(0, -TAIL_DIGITS).replace(/\.$/, '')
  return value < 0 ? `-${truncated}` : truncated
}
