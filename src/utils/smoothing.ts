import { assertWindow } from '@/utils/options'

/**
 * Moving-average (box) filter. Output `i` averages `window` samples at offsets
 * `-floor(window/2) .. window-1-floor(window/2)`; indices past either end are
 * clamped to the edge sample, so every output is a mean of exactly `window` values.
 *
 * Shared by linear-region detection and integration.
 */
export function boxSmooth(values: number[], window: number): number[] {
  assertWindow(window)
  const n = values.length
  if (n === 0) return []
  if (window === 1) return [...values]

  const before = Math.floor(window / 2)
  const after = window - 1 - before
  const at = (idx: number) => values[Math.min(n - 1, Math.max(0, idx))]

  const out = new Array<number>(n)
  let sum = 0
  for (let k = -before; k <= after; k += 1) sum += at(k)
  out[0] = sum / window
  for (let i = 1; i < n; i += 1) {
    sum += at(i + after) - at(i - 1 - before)
    out[i] = sum / window
  }
  return out
}
