import {
  UNDEFINED_RATIO,
  type CalibrationFit,
  type LinearCalibrationFit,
  type PiecewiseCalibrationFit,
  type RatioValue,
} from '@/types'
import { FitConvergenceError } from '@/utils/errors'
import { median } from '@/utils/numbers'
import { PIECEWISE_FIT_DEFAULTS, type PiecewiseFitOptions } from '@/utils/options'

const EPS = 1e-12
const LAMBDA_MAX = 1e12
const REL_IMPROVEMENT = 1e-12
const RESIDUAL_TOL = 1e-10
const GRADIENT_TOL = 1e-6

const r2Score = (y: number[], yHat: number[]): number => {
  const mean = y.reduce((acc, v) => acc + v, 0) / y.length
  let ssTot = 0
  let ssRes = 0
  for (let i = 0; i < y.length; i += 1) {
    ssTot += (y[i] - mean) ** 2
    ssRes += (y[i] - yHat[i]) ** 2
  }
  return ssTot === 0 ? (ssRes === 0 ? 1 : 0) : 1 - ssRes / ssTot
}

const solve2x2 = (a: number[][], b: number[]): number[] | null => {
  const det = a[0][0] * a[1][1] - a[0][1] * a[1][0]
  if (Math.abs(det) < EPS) return null
  return [(b[0] * a[1][1] - a[0][1] * b[1]) / det, (a[0][0] * b[1] - b[0] * a[1][0]) / det]
}

function cleanPairs(x: number[], y: number[]): { xs: number[]; ys: number[] } {
  const xs: number[] = []
  const ys: number[] = []
  for (let i = 0; i < Math.min(x.length, y.length); i += 1) {
    if (!Number.isFinite(x[i]) || !Number.isFinite(y[i])) continue
    xs.push(x[i])
    ys.push(y[i])
  }
  return { xs, ys }
}

/**
 * Turns a `{dosage: value}` map into ascending x/y arrays. Undefined ratios
 * are left out.
 */
export function calibrationPairs(values: Record<number, RatioValue>): { x: number[]; y: number[] } {
  const pairs = Object.entries(values)
    .map(([dosage, value]) => ({ x: Number(dosage), y: value }))
    .filter((p): p is { x: number; y: number } => p.y !== UNDEFINED_RATIO && Number.isFinite(p.x))
    .sort((a, b) => a.x - b.x)
  return { x: pairs.map((p) => p.x), y: pairs.map((p) => p.y) }
}

export function fitLinear(x: number[], y: number[]): LinearCalibrationFit | null {
  const { xs, ys } = cleanPairs(x, y)
  const n = xs.length
  if (n < 2) return null
  const meanX = xs.reduce((acc, value) => acc + value, 0) / n
  const meanY = ys.reduce((acc, value) => acc + value, 0) / n
  let sxx = 0
  let sxy = 0
  for (let i = 0; i < n; i += 1) {
    const dx = xs[i] - meanX
    sxx += dx * dx
    sxy += dx * (ys[i] - meanY)
  }
  if (sxx === 0) return null
  const slope = sxy / sxx
  const intercept = meanY - slope * meanX
  const r2 = r2Score(ys, xs.map((v) => slope * v + intercept))
  return { kind: 'linear', slope, intercept, r2, x: xs, y: ys }
}

/** Zero below the threshold, rising with `slope` above it. */
export const evalPiecewise = (threshold: number, slope: number, x: number): number =>
  x < threshold ? 0 : slope * (x - threshold)

/**
 * Fits `f(x) = 0` for `x < threshold`, `slope * (x - threshold)` otherwise, by
 * damped Gauss-Newton from `threshold = median(x)` and
 * `slope = (max y - min y) / (max x - min x)`. Dosages and values are scaled
 * to unit magnitude for the iteration, so tolerances hold at any data scale.
 *
 * Throws {@link FitConvergenceError} when the start is undefined, the normal
 * equations are singular, the iteration cap is reached, damping runs out away
 * from a minimum, or the result leaves no point on the rising branch.
 */
export function fitPiecewise(x: number[], y: number[], opts: PiecewiseFitOptions = {}): PiecewiseCalibrationFit {
  const { maxIter, lambda0, tol } = { ...PIECEWISE_FIT_DEFAULTS, ...opts }
  const { xs, ys } = cleanPairs(x, y)
  if (xs.length < 2) {
    throw new FitConvergenceError(`Piecewise fit needs at least 2 points, got ${xs.length}`)
  }

  const xScale = Math.max(...xs.map(Math.abs)) || 1
  const yScale = Math.max(...ys.map(Math.abs)) || 1
  const u = xs.map((v) => v / xScale)
  const w = ys.map((v) => v / yScale)

  const threshold0 = median(u) ?? Number.NaN
  const slope0 = (Math.max(...w) - Math.min(...w)) / (Math.max(...u) - Math.min(...u))
  if (!Number.isFinite(threshold0) || !Number.isFinite(slope0)) {
    throw new FitConvergenceError('Initial guess is undefined (all dosages are equal)')
  }

  const residuals = (pp: number[]) => u.map((ui, i) => w[i] - evalPiecewise(pp[0], pp[1], ui))
  const sumSq = (values: number[]) => values.reduce((acc, v) => acc + v * v, 0)
  const dataNorm = Math.sqrt(sumSq(w))

  let p = [threshold0, slope0]
  let lambda = lambda0
  let r = residuals(p)
  let curSse = sumSq(r)
  let converged = false
  let iter = 0

  for (; iter < maxIter; iter += 1) {
    // Central-difference Jacobian of the model output.
    const J: number[][] = u.map(() => [0, 0])
    for (let j = 0; j < 2; j += 1) {
      const dp = 1e-6 * (Math.abs(p[j]) + 1)
      const ppPlus = [...p]
      const ppMinus = [...p]
      ppPlus[j] += dp
      ppMinus[j] -= dp
      for (let i = 0; i < u.length; i += 1) {
        J[i][j] = (evalPiecewise(ppPlus[0], ppPlus[1], u[i]) - evalPiecewise(ppMinus[0], ppMinus[1], u[i])) / (2 * dp)
      }
    }

    const JTJ = [
      [0, 0],
      [0, 0],
    ]
    const JTr = [0, 0]
    for (let i = 0; i < u.length; i += 1) {
      for (let j = 0; j < 2; j += 1) {
        JTr[j] += J[i][j] * r[i]
        for (let k = 0; k < 2; k += 1) JTJ[j][k] += J[i][j] * J[i][k]
      }
    }
    const gradNorm = Math.hypot(JTr[0], JTr[1])
    const jacNorm = Math.sqrt(JTJ[0][0] + JTJ[1][1])
    for (let d = 0; d < 2; d += 1) JTJ[d][d] += lambda * (JTJ[d][d] + 1)

    const delta = solve2x2(JTJ, JTr)
    if (!delta) {
      throw new FitConvergenceError(
        `Piecewise fit stopped on a singular normal-equation system at threshold ${p[0] * xScale}`,
        iter,
      )
    }

    const pCand = [p[0] + delta[0], p[1] + delta[1]]
    const rCand = residuals(pCand)
    const sseCand = sumSq(rCand)
    if (Number.isFinite(sseCand) && sseCand < curSse * (1 - REL_IMPROVEMENT)) {
      p = pCand
      r = rCand
      curSse = sseCand
      lambda = Math.max(EPS, lambda * 0.35)
      if (Math.hypot(delta[0], delta[1]) < tol * (1 + Math.hypot(p[0], p[1]))) {
        converged = true
        break
      }
    } else {
      lambda = Math.max(EPS, lambda * 10)
      if (lambda > LAMBDA_MAX) {
        // Damping ran out: a minimum only when the residual is negligible or orthogonal to the Jacobian.
        const residualNorm = Math.sqrt(curSse)
        converged = residualNorm <= RESIDUAL_TOL * dataNorm || gradNorm <= GRADIENT_TOL * jacNorm * residualNorm
        if (!converged) {
          throw new FitConvergenceError(
            `Piecewise fit stalled away from a minimum (gradient ${gradNorm.toExponential(3)})`,
            iter,
          )
        }
        break
      }
    }
  }

  const threshold = p[0] * xScale
  const slope = (p[1] * yScale) / xScale
  if (!converged) {
    throw new FitConvergenceError(`Piecewise fit did not converge within ${maxIter} iterations`, iter)
  }
  if (!Number.isFinite(threshold) || !Number.isFinite(slope)) {
    throw new FitConvergenceError('Piecewise fit produced non-finite parameters', iter)
  }
  if (!xs.some((v) => v >= threshold)) {
    throw new FitConvergenceError(`Fitted threshold ${threshold} lies above every dosage`, iter)
  }

  const r2 = r2Score(ys, xs.map((v) => evalPiecewise(threshold, slope, v)))
  return {
    kind: 'piecewise',
    threshold,
    slope,
    r2,
    sse: curSse * yScale * yScale,
    iterations: iter + 1,
    x: xs,
    y: ys,
  }
}

export function evaluateFit(fit: CalibrationFit, x: number): number {
  return fit.kind === 'linear' ? fit.slope * x + fit.intercept : evalPiecewise(fit.threshold, fit.slope, x)
}

/** Evenly spaced points of the fitted curve between the smallest and largest dosage. */
export function sampleFitCurve(fit: CalibrationFit, count = 100): { x: number; y: number }[] {
  if (!fit.x.length || count < 1) return []
  const lo = Math.min(...fit.x)
  const hi = Math.max(...fit.x)
  if (count === 1 || hi === lo) return [{ x: lo, y: evaluateFit(fit, lo) }]
  const step = (hi - lo) / (count - 1)
  return Array.from({ length: count }, (_, i) => {
    const xv = i === count - 1 ? hi : lo + i * step
    return { x: xv, y: evaluateFit(fit, xv) }
  })
}
