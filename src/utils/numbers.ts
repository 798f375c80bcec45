const DECIMAL_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Converts an instrument token to a number, accepting `,` as the decimal
 * separator. Returns NaN for blank tokens and anything but plain decimal notation
 * (hex, binary and `Infinity` included).
 */
export function toNumber(value: string | undefined | null): number {
  if (value === undefined || value === null) return NaN
  const cleaned = value.trim().replace(/,/g, '.')
  if (!DECIMAL_TOKEN.test(cleaned)) return NaN
  const num = Number(cleaned)
  return Number.isFinite(num) ? num : NaN
}

export function isNumericToken(value: string | undefined | null): boolean {
  return Number.isFinite(toNumber(value))
}

export function median(values: number[]): number | null {
  const filtered = values.filter((value) => Number.isFinite(value))
  if (!filtered.length) return null
  const sorted = [...filtered].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2
  }
  return sorted[mid]
}
