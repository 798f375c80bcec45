import Papa from 'papaparse'
import type { Experiment, IntegrationResult, RatioValue, TrimmedExperiment } from '@/types'

export interface ChannelCsvRow {
  experiment: string
  channel: string
  label: string
  role: string
  time: number
  value: number
}

export function toChannelCSVRows(source: Experiment | TrimmedExperiment): ChannelCsvRow[] {
  const experiment = 'experimentName' in source ? source.experimentName : source.name
  const rows: ChannelCsvRow[] = []
  for (const c of source.channels) {
    c.time.forEach((time, idx) => {
      rows.push({ experiment, channel: c.name, label: c.label, role: c.role, time, value: c.value[idx] })
    })
  }
  return rows
}

/** Long-format channel table; reloadable through the channel-long-csv parser. */
export function channelsToCsv(source: Experiment | TrimmedExperiment): string {
  return Papa.unparse(toChannelCSVRows(source), {
    columns: ['experiment', 'channel', 'label', 'role', 'time', 'value'],
  })
}

export function toIntegrationCSVRows(result: IntegrationResult<RatioValue>) {
  return result.entries.map((e) => ({
    experiment: e.experimentName,
    dosage: e.dosage,
    value: e.value,
  }))
}

export function integrationToCsv(result: IntegrationResult<RatioValue>): string {
  return Papa.unparse(toIntegrationCSVRows(result), { columns: ['experiment', 'dosage', 'value'] })
}
