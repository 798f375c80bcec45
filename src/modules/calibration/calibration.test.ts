import { describe, expect, it } from 'vitest'
import { calibrationPairs, evalPiecewise, evaluateFit, fitLinear, fitPiecewise, sampleFitCurve } from './calibration'
import { UNDEFINED_RATIO } from '@/types'
import { FitConvergenceError } from '@/utils/errors'

const X = [1, 2, 3, 4, 5, 6]
const HOCKEY_STICK = [0, 0, 1, 3, 5, 7] // threshold 2.5, slope 2

describe('fitLinear', () => {
  it('recovers an exact line', () => {
    const fit = fitLinear(X, X.map((v) => 3 * v + 1))
    expect(fit).not.toBeNull()
    if (!fit) return
    expect(fit.slope).toBeCloseTo(3, 12)
    expect(fit.intercept).toBeCloseTo(1, 12)
    expect(fit.r2).toBeCloseTo(1, 12)
  })

  it('returns null for fewer than two distinct dosages', () => {
    expect(fitLinear([1], [2])).toBeNull()
    expect(fitLinear([2, 2, 2], [1, 2, 3])).toBeNull()
  })

  it('ignores non-finite points', () => {
    const fit = fitLinear([0, 1, NaN, 2], [0, 2, 5, 4])
    expect(fit?.x).toEqual([0, 1, 2])
    expect(fit?.slope).toBeCloseTo(2, 12)
  })
})

describe('fitPiecewise', () => {
  it('finds the threshold and slope of a hockey-stick response', () => {
    const fit = fitPiecewise(X, HOCKEY_STICK)
    expect(fit.threshold).toBeCloseTo(2.5, 5)
    expect(fit.slope).toBeCloseTo(2, 5)
    expect(fit.sse).toBeLessThan(1e-10)
    expect(fit.r2).toBeCloseTo(1, 9)
    expect(fit.iterations).toBeGreaterThan(0)
  })

  it('throws when the iteration cap is reached', () => {
    expect(() => fitPiecewise(X, HOCKEY_STICK, { maxIter: 1 })).toThrow(FitConvergenceError)
  })

  it('throws when every dosage is the same', () => {
    expect(() => fitPiecewise([2, 2, 2], [1, 2, 3])).toThrow(FitConvergenceError)
  })

  it('fits ion-current-scale integrals instead of returning the starting guess', () => {
    const x = [1, 2, 5, 10, 20, 40]
    const y = x.map((v) => 3e-9 * Math.max(0, v - 4))
    const fit = fitPiecewise(x, y)
    expect(fit.threshold).toBeCloseTo(4, 6)
    expect(fit.slope / 3e-9).toBeCloseTo(1, 6)
    expect(fit.r2).toBeCloseTo(1, 9)
  })

  it('gives the same parameters whatever the response units', () => {
    const unit = fitPiecewise(X, HOCKEY_STICK)
    const scaled = fitPiecewise(X, HOCKEY_STICK.map((v) => v * 1e-10))
    expect(scaled.threshold).toBeCloseTo(unit.threshold, 6)
    expect(scaled.slope / 1e-10).toBeCloseTo(unit.slope, 6)
  })

  it('names a singular system instead of reporting the iteration cap', () => {
    expect(() => fitPiecewise([1, 2, 3], [5, 5, 5], { lambda0: 0 })).toThrow(/singular normal-equation system/)
  })

  it('throws for a single point', () => {
    expect(() => fitPiecewise([1], [1])).toThrow('Piecewise fit needs at least 2 points, got 1')
  })
})

describe('fit helpers', () => {
  it('evaluates the piecewise model on both branches', () => {
    expect(evalPiecewise(2.5, 2, 1)).toBe(0)
    expect(evalPiecewise(2.5, 2, 4)).toBe(3)
  })

  it('orders dosages and leaves out undefined ratios', () => {
    expect(calibrationPairs({ 10: 2, 5: 1, 7: UNDEFINED_RATIO })).toEqual({ x: [5, 10], y: [1, 2] })
  })

  it('samples the fitted curve across the dosage range', () => {
    const fit = fitLinear(X, X.map((v) => 2 * v))
    expect(fit).not.toBeNull()
    if (!fit) return
    const curve = sampleFitCurve(fit, 3)
    expect(curve.map((p) => p.x)).toEqual([1, 3.5, 6])
    expect(curve[1].y).toBeCloseTo(evaluateFit(fit, 3.5), 12)
    expect(curve[1].y).toBeCloseTo(7, 12)
  })
})
