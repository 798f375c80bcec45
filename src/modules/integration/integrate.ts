import {
  UNDEFINED_RATIO,
  type Channel,
  type FullIntegrationResult,
  type IntegrationEntry,
  type IntegrationWindows,
  type RatioIntegrationResult,
  type RatioValue,
  type TrimmedExperiment,
} from '@/types'
import { temperatureOf } from '@/modules/trimming/applyTrim'
import { extractDosage } from '@/utils/dosage'
import { ConfigError } from '@/utils/errors'
import { simpson } from '@/utils/integration'
import { resolveIntegrationOptions, type IntegrationOptions } from '@/utils/options'
import { boxSmooth } from '@/utils/smoothing'

interface PreparedExperiment {
  name: string
  dosage: number
  temperature: number[] // smoothed
  ions: Channel[]
}

function selectIonChannels(trimmed: TrimmedExperiment, wanted: string[]): Channel[] {
  return trimmed.channels.filter(
    (c) => c.role === 'ion' && (!wanted.length || wanted.includes(c.label) || wanted.includes(c.name)),
  )
}

function prepare(
  trimmed: TrimmedExperiment,
  options: Required<IntegrationOptions>,
  warnings: string[],
): PreparedExperiment | null {
  const name = trimmed.experimentName
  const dosage = extractDosage(name)
  if (dosage === null) {
    warnings.push(`${name}: no dosage found in the experiment name; skipped.`)
    return null
  }
  if (!trimmed.region) {
    warnings.push(`${name}: no trim region (no linear ramp found); skipped.`)
    return null
  }
  const temperature = temperatureOf(trimmed)
  if (!temperature) {
    warnings.push(`${name}: no temperature channel; skipped.`)
    return null
  }
  if (!temperature.value.length) {
    warnings.push(`${name}: trim region contains no samples; skipped.`)
    return null
  }
  const ions = selectIonChannels(trimmed, options.channels)
  if (!ions.length) {
    warnings.push(`${name}: none of the selected ion channels are present; skipped.`)
    return null
  }
  return {
    name,
    dosage,
    temperature: boxSmooth(temperature.value, options.temperatureSmoothingWindow),
    ions,
  }
}

function record<V>(
  result: { values: Record<number, V>; entries: IntegrationEntry<V>[]; warnings: string[] },
  entry: IntegrationEntry<V>,
): void {
  const previous = result.entries.find((e) => e.dosage === entry.dosage)
  if (previous) {
    result.warnings.push(
      `${entry.experimentName}: dosage ${entry.dosage} already produced by ${previous.experimentName}; the later result replaces it.`,
    )
  }
  result.values[entry.dosage] = entry.value
  result.entries.push(entry)
}

/**
 * Integrates each selected ion channel against smoothed temperature over the
 * whole trimmed range and sums the channels, keyed by the dosage in the
 * experiment name.
 */
export function integrateFull(trimmed: TrimmedExperiment[], options: IntegrationOptions = {}): FullIntegrationResult {
  const resolved = resolveIntegrationOptions(options)
  const result: FullIntegrationResult = { values: {}, entries: [], warnings: [] }
  for (const item of trimmed) {
    const prepared = prepare(item, resolved, result.warnings)
    if (!prepared) continue
    const channels: Record<string, number> = {}
    let total = 0
    for (const ion of prepared.ions) {
      const area = simpson(prepared.temperature, ion.value)
      channels[ion.name] = area
      total += area
    }
    record(result, { experimentName: prepared.name, dosage: prepared.dosage, value: total, channels })
  }
  return result
}

export function validateWindows(windows: IntegrationWindows): void {
  const { leftStart, leftEnd, rightStart, rightEnd } = windows
  if (![leftStart, leftEnd, rightStart, rightEnd].every(Number.isFinite)) {
    throw new ConfigError('Integration window bounds must be finite numbers')
  }
  if (leftEnd < leftStart || rightEnd < rightStart) {
    throw new ConfigError('Each integration window must have its end at or after its start')
  }
  if (!(leftEnd < rightStart || rightEnd < leftStart)) {
    throw new ConfigError(
      `Integration windows overlap: [${leftStart}, ${leftEnd}] and [${rightStart}, ${rightEnd}]`,
    )
  }
}

function windowIntegral(temperature: number[], values: number[], start: number, end: number): number {
  const xs: number[] = []
  const ys: number[] = []
  temperature.forEach((t, idx) => {
    if (t >= start && t <= end) {
      xs.push(t)
      ys.push(values[idx])
    }
  })
  return simpson(xs, ys)
}

const ratioOf = (left: number, right: number): RatioValue => (right === 0 ? UNDEFINED_RATIO : left / right)

/**
 * Integrates the selected ion channels over two disjoint temperature windows
 * and reports `left / right` per dosage. A zero right-hand integral yields
 * {@link UNDEFINED_RATIO}.
 */
export function integrateRatio(
  trimmed: TrimmedExperiment[],
  windows: IntegrationWindows,
  options: IntegrationOptions = {},
): RatioIntegrationResult {
  validateWindows(windows)
  const resolved = resolveIntegrationOptions(options)
  const result: RatioIntegrationResult = { values: {}, entries: [], warnings: [] }
  for (const item of trimmed) {
    const prepared = prepare(item, resolved, result.warnings)
    if (!prepared) continue
    const channels: Record<string, RatioValue> = {}
    let left = 0
    let right = 0
    for (const ion of prepared.ions) {
      const l = windowIntegral(prepared.temperature, ion.value, windows.leftStart, windows.leftEnd)
      const r = windowIntegral(prepared.temperature, ion.value, windows.rightStart, windows.rightEnd)
      channels[ion.name] = ratioOf(l, r)
      left += l
      right += r
    }
    const value = ratioOf(left, right)
    if (value === UNDEFINED_RATIO) {
      result.warnings.push(`${prepared.name}: right-window integral is zero; ratio undefined.`)
    }
    record(result, { experimentName: prepared.name, dosage: prepared.dosage, value, channels })
  }
  return result
}
