import type { Channel, Experiment } from '@/types'

export interface TpdFixtureOptions {
  labels: string[]
  times: number[]
  // one value column per label, evaluated at each time
  values: ((t: number, row: number) => number)[]
  decimalComma?: boolean
  columnHeaderRow?: boolean
  terminator?: string
}

const METADATA = [
  'Instrument\tQMS 200',
  'Operator\ttest',
  'Date\t2024-01-01',
  'Ramp\t1 K/s',
  'Comment\tsynthetic',
  '',
]

/** Builds the text of an instrument export: 6 metadata lines, the channel header, then data rows. */
export function buildTpdText(opts: TpdFixtureOptions): string {
  const fmt = (n: number) => (opts.decimalComma ? String(n).replace('.', ',') : String(n))
  const lines = [...METADATA, opts.labels.join('\t')]
  if (opts.columnHeaderRow ?? true) {
    lines.push(opts.labels.map(() => 'Cycle\tTime Relative [s]\tIon Current [A]').join('\t'))
  }
  opts.times.forEach((t, row) => {
    lines.push(opts.values.map((fn) => `${row}\t${fmt(t)}\t${fmt(fn(t, row))}`).join('\t'))
  })
  if (opts.terminator) lines.push(opts.terminator)
  return lines.join('\n')
}

export const range = (start: number, end: number, step = 1): number[] => {
  const out: number[] = []
  for (let v = start; v <= end + 1e-9; v += step) out.push(Number(v.toFixed(9)))
  return out
}

/** Temperature ramping at 1 K/s from 300 K for 30 s, then holding. */
export const rampThenHold = (t: number) => 300 + Math.min(t, 30)

export function makeExperiment(name: string, time: number[], series: Record<string, number[]>, temperature: string): Experiment {
  const channels: Channel[] = Object.entries(series).map(([label, value]): Channel => ({
    name: `${name}_${label}`,
    label,
    role: label === temperature ? 'temperature' : 'ion',
    time: [...time],
    value,
  }))
  return {
    id: `id-${name}`,
    name,
    sourceFile: `${name}.txt`,
    parserId: 'test',
    createdAt: '2024-01-01T00:00:00.000Z',
    channels,
    temperatureChannel: `${name}_${temperature}`,
  }
}
