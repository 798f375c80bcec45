import { ConfigError } from '@/utils/errors'

export interface TrimOptions {
  targetSlope?: number // K/s
  tolerance?: number
  smoothingEnabled?: boolean
  smoothingWindow?: number
  minDuration?: number // s
}

export interface IntegrationOptions {
  temperatureSmoothingWindow?: number
  channels?: string[] // header tokens or full channel names; empty = every ion channel
}

export interface PiecewiseFitOptions {
  maxIter?: number
  lambda0?: number
  tol?: number
}

export const TRIM_DEFAULTS: Required<TrimOptions> = {
  targetSlope: 1.0,
  tolerance: 0.3,
  smoothingEnabled: false,
  smoothingWindow: 10,
  minDuration: 20,
}

export const INTEGRATION_DEFAULTS: Required<IntegrationOptions> = {
  temperatureSmoothingWindow: 10,
  channels: [],
}

export const PIECEWISE_FIT_DEFAULTS: Required<PiecewiseFitOptions> = {
  maxIter: 200,
  lambda0: 1e-2,
  tol: 1e-10,
}

export function assertWindow(window: number, label = 'Smoothing window'): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new ConfigError(`${label} must be a positive integer, got ${window}`)
  }
}

export function resolveTrimOptions(options: TrimOptions = {}): Required<TrimOptions> {
  const resolved = { ...TRIM_DEFAULTS, ...options }
  if (!Number.isFinite(resolved.targetSlope)) {
    throw new ConfigError(`Target slope must be a finite number, got ${resolved.targetSlope}`)
  }
  if (!Number.isFinite(resolved.tolerance) || resolved.tolerance < 0) {
    throw new ConfigError(`Slope tolerance must be a non-negative number, got ${resolved.tolerance}`)
  }
  if (!Number.isFinite(resolved.minDuration) || resolved.minDuration < 0) {
    throw new ConfigError(`Minimum duration must be a non-negative number, got ${resolved.minDuration}`)
  }
  if (resolved.smoothingEnabled) assertWindow(resolved.smoothingWindow)
  return resolved
}

export function resolveIntegrationOptions(options: IntegrationOptions = {}): Required<IntegrationOptions> {
  const resolved = { ...INTEGRATION_DEFAULTS, ...options }
  assertWindow(resolved.temperatureSmoothingWindow, 'Temperature smoothing window')
  return resolved
}
