import type { TrimRegion } from '@/types'
import { resolveTrimOptions, type TrimOptions } from '@/utils/options'
import { boxSmooth } from '@/utils/smoothing'

export interface LinearRegionDetail {
  region: TrimRegion
  startIndex: number | null
  endIndex: number | null
  slopes: number[] // NaN where undefined
  qualifying: boolean[]
}

function emptyDetail(n: number): LinearRegionDetail {
  return {
    region: null,
    startIndex: null,
    endIndex: null,
    slopes: new Array(n).fill(Number.NaN),
    qualifying: new Array(n).fill(false),
  }
}

/** Point slopes dT/dt; index 0 and any step where time does not advance are NaN. */
export function pointSlopes(time: number[], temperature: number[]): number[] {
  const slopes = new Array<number>(temperature.length).fill(Number.NaN)
  for (let i = 1; i < temperature.length; i += 1) {
    const dt = time[i] - time[i - 1]
    if (!(dt > 0) || !Number.isFinite(dt)) continue
    slopes[i] = (temperature[i] - temperature[i - 1]) / dt
  }
  return slopes
}

/**
 * Like {@link detectLinearRegion}, also returning the slope trace and the
 * qualifying mask for diagnostics.
 */
export function detectLinearRegionDetail(
  time: number[],
  temperature: number[],
  options: TrimOptions = {},
): LinearRegionDetail {
  const { targetSlope, tolerance, smoothingEnabled, smoothingWindow, minDuration } = resolveTrimOptions(options)
  const n = temperature.length
  if (!n || time.length !== n) return emptyDetail(n)
  if (time.some((v) => !Number.isFinite(v)) || temperature.some((v) => !Number.isFinite(v))) {
    return emptyDetail(n)
  }

  const temps = smoothingEnabled ? boxSmooth(temperature, smoothingWindow) : temperature
  const slopes = pointSlopes(time, temps)
  const qualifying = slopes.map((slope) => Number.isFinite(slope) && Math.abs(slope - targetSlope) <= tolerance)

  // First run long enough wins, not the longest one.
  let runStart: number | null = null
  for (let i = 0; i <= n; i += 1) {
    if (i < n && qualifying[i]) {
      if (runStart === null) runStart = i
      continue
    }
    if (runStart === null) continue
    const runEnd = i - 1
    if (time[runEnd] - time[runStart] >= minDuration) {
      return {
        region: { startTime: time[runStart], endTime: time[runEnd] },
        startIndex: runStart,
        endIndex: runEnd,
        slopes,
        qualifying,
      }
    }
    runStart = null
  }
  return { ...emptyDetail(n), slopes, qualifying }
}

/**
 * Finds the first contiguous stretch of the heating ramp whose point slope stays
 * within `tolerance` of `targetSlope` for at least `minDuration` seconds.
 * Returns the stretch as time values, or null when no stretch qualifies.
 */
export function detectLinearRegion(time: number[], temperature: number[], options: TrimOptions = {}): TrimRegion {
  return detectLinearRegionDetail(time, temperature, options).region
}
