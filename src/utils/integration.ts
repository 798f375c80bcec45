/**
 * Numerical integration over sampled (x, y) data.
 *
 * Composite Simpson's rule for unevenly spaced x: consecutive interval pairs
 * are integrated under the parabola through their three points, and a single
 * leftover interval takes the three-point end correction. Both are exact for
 * quadratics.
 */

export const trapz = (x: number[], y: number[]): number => {
  let area = 0
  for (let i = 1; i < Math.min(x.length, y.length); i++) {
    area += (x[i] - x[i - 1]) * (y[i - 1] + y[i]) / 2
  }
  return area
}

const simpsonPair = (x0: number, x1: number, x2: number, y0: number, y1: number, y2: number): number => {
  const h0 = x1 - x0
  const h1 = x2 - x1
  if (h0 === 0 || h1 === 0 || h0 + h1 === 0) {
    return (h0 * (y0 + y1) + h1 * (y1 + y2)) / 2
  }
  const hsum = h0 + h1
  return (hsum / 6) * ((2 - h1 / h0) * y0 + (hsum * hsum) / (h0 * h1) * y1 + (2 - h0 / h1) * y2)
}

// Last interval [x1, x2] of the parabola through three points.
const simpsonTail = (x0: number, x1: number, x2: number, y0: number, y1: number, y2: number): number => {
  const h0 = x1 - x0
  const h1 = x2 - x1
  if (h0 === 0 || h0 + h1 === 0) return (h1 * (y1 + y2)) / 2
  const alpha = (2 * h1 * h1 + 3 * h0 * h1) / (6 * (h0 + h1))
  const beta = (h1 * h1 + 3 * h0 * h1) / (6 * h0)
  const eta = (h1 * h1 * h1) / (6 * h0 * (h0 + h1))
  return alpha * y2 + beta * y1 - eta * y0
}

export const simpson = (x: number[], y: number[]): number => {
  const n = Math.min(x.length, y.length)
  if (n < 2) return 0
  if (n === 2) return trapz(x, y)

  const pairedEnd = n % 2 === 1 ? n - 1 : n - 2
  let area = 0
  for (let i = 0; i < pairedEnd; i += 2) {
    area += simpsonPair(x[i], x[i + 1], x[i + 2], y[i], y[i + 1], y[i + 2])
  }
  if (n % 2 === 0) {
    area += simpsonTail(x[n - 3], x[n - 2], x[n - 1], y[n - 3], y[n - 2], y[n - 1])
  }
  return area
}
