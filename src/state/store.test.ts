import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createExperimentStore } from './store'
import { parseTpdText } from '@/modules/input_files_converter'
import { ConfigError } from '@/utils/errors'
import { buildTpdText, range, rampThenHold } from '@/test/fixtures'

// 1 K/s ramp for 30 s then a hold; ion "Xe 132" = 2t, "Xe 131" = 3.
const text = buildTpdText({
  labels: ['Xe 132', 'Xe 131', 'Temperature'],
  times: range(0, 50),
  values: [(t) => 2 * t, () => 3, rampThenHold],
  decimalComma: true,
})

function loadedStore() {
  const store = createExperimentStore({ integrationOptions: { temperatureSmoothingWindow: 1 } })
  const { experiment, warnings } = parseTpdText(text, 'Xe_5K_1')
  store.getState().addExperiment(experiment, warnings)
  return store
}

describe('experiment store', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('auto-trims on import and integrates over the ramp', () => {
    const store = loadedStore()
    const entry = store.getState().experiments['Xe_5K_1']
    expect(entry.trimRegion).toEqual({ startTime: 1, endTime: 30 })
    expect(entry.trimSource).toBe('auto')
    expect(entry.trimmed.channels[2].value[0]).toBe(301)
    expect(entry.trimmed.channels[2].value).toHaveLength(30)

    // ∫ 2(T-300) dT over 301..330 = 899, plus 3 * 29
    const result = store.getState().integrateFull()
    expect(result.values[5]).toBeCloseTo(986, 8)
    expect(store.getState().fullIntegration).toBe(result)
  })

  it('replaces the trimmed experiment on a manual trim without mutating the old one', () => {
    const store = loadedStore()
    const before = store.getState().experiments['Xe_5K_1'].trimmed
    const trimmed = store.getState().setTrimRegion('Xe_5K_1', 10, 20)

    const entry = store.getState().experiments['Xe_5K_1']
    expect(entry.trimmed).toBe(trimmed)
    expect(entry.trimSource).toBe('manual')
    expect(before.channels[0].time).toHaveLength(30)
    expect(trimmed.channels[0].time).toEqual(range(10, 20))
    expect(store.getState().integrateFull().values[5]).toBeCloseTo(330, 8)
  })

  it('computes ratios over two temperature windows', () => {
    const store = loadedStore()
    const result = store.getState().integrateRatio({ leftStart: 301, leftEnd: 310, rightStart: 320, rightEnd: 330 })
    const value = result.values[5]
    expect(typeof value).toBe('number')
    if (typeof value === 'number') expect(value).toBeCloseTo(126 / 530, 10)
    expect(store.getState().ratioIntegration).toBe(result)
  })

  it('leaves the state untouched when options are rejected', () => {
    const store = loadedStore()
    const { trimOptions, experiments } = store.getState()
    expect(() => store.getState().setTrimOptions({ tolerance: -1 })).toThrow(ConfigError)
    expect(store.getState().trimOptions).toBe(trimOptions)
    expect(store.getState().experiments).toBe(experiments)
  })

  it('re-detects every region when trim options change', () => {
    const store = loadedStore()
    store.getState().setTrimRegion('Xe_5K_1', 10, 20)
    store.getState().setTrimOptions({ targetSlope: 5 })

    const entry = store.getState().experiments['Xe_5K_1']
    expect(entry.trimRegion).toBeNull()
    expect(entry.trimSource).toBe('auto')
    expect(store.getState().warnings).toEqual(['Xe_5K_1: no linear region with slope 5 ± 0.3 found.'])

    const result = store.getState().integrateFull()
    expect(result.values).toEqual({})
    expect(result.warnings).toEqual(['Xe_5K_1: no trim region (no linear ramp found); skipped.'])
  })

  it('rejects unknown experiment names', () => {
    const store = loadedStore()
    expect(() => store.getState().integrateFull(['nope'])).toThrow('Unknown experiment "nope"')
    expect(() => store.getState().setTrimRegion('nope', 0, 1)).toThrow('Unknown experiment "nope"')
  })

  it('drops integration results that included a removed experiment', () => {
    const store = loadedStore()
    store.getState().integrateFull()
    store.getState().integrateRatio({ leftStart: 301, leftEnd: 310, rightStart: 320, rightEnd: 330 })
    store.getState().removeExperiment('Xe_5K_1')
    expect(store.getState().experiments).toEqual({})
    expect(store.getState().fullIntegration).toBeNull()
    expect(store.getState().ratioIntegration).toBeNull()
  })

  it('clears everything', () => {
    const store = loadedStore()
    store.getState().integrateFull()
    store.getState().clearAll()
    expect(store.getState().experiments).toEqual({})
    expect(store.getState().fullIntegration).toBeNull()
  })
})
