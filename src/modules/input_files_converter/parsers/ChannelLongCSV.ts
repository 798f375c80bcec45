import Papa from 'papaparse'
import { v4 as uuidv4 } from 'uuid'
import type { Parser, ParseResult } from './BaseParser'
import { experimentNameFromFile } from './BaseParser'
import type { Channel, ChannelRole, Experiment } from '@/types'
import { toNumber } from '@/utils/numbers'

export const LONG_CSV_COLUMNS = ['experiment', 'channel', 'label', 'role', 'time', 'value'] as const
type LongCsvRow = Partial<Record<(typeof LONG_CSV_COLUMNS)[number], string>>

function isRole(value: string): value is ChannelRole {
  return value === 'ion' || value === 'temperature'
}

/**
 * Reloads channel tables written by `channelsToCsv`
 * (one row per sample: experiment, channel, label, role, time, value).
 */
const ChannelLongCSV: Parser = {
  id: 'channel-long-csv',
  label: 'Long CSV (experiment, channel, role, time, value)',
  description: 'Channel tables exported by this library, one sample per row',
  fileExtensions: ['.csv'],
  detect: (text, filename) => {
    if (!filename.toLowerCase().endsWith('.csv')) return false
    const head = text.slice(0, 256).toLowerCase()
    return LONG_CSV_COLUMNS.every((col) => head.includes(col))
  },
  parse: (content, filename): ParseResult => {
    const res = Papa.parse<LongCsvRow>(content, { header: true, dynamicTyping: false, skipEmptyLines: 'greedy' })
    if (res.errors.length) {
      return { ok: false, error: 'CSV parsing error: ' + res.errors[0].message }
    }
    const warnings: string[] = []
    const byChannel = new Map<string, Channel>()
    let experimentName = ''
    res.data.forEach((row, idx) => {
      const name = (row.channel ?? '').trim()
      const role = (row.role ?? '').trim()
      const time = toNumber(row.time)
      const value = toNumber(row.value)
      if (!name || !isRole(role) || Number.isNaN(time) || Number.isNaN(value)) {
        warnings.push(`Skipped row ${idx + 2}: incomplete or non-numeric sample`)
        return
      }
      if (!experimentName) experimentName = (row.experiment ?? '').trim()
      let channel = byChannel.get(name)
      if (!channel) {
        channel = { name, label: (row.label ?? name).trim(), role, time: [], value: [] }
        byChannel.set(name, channel)
      }
      channel.time.push(time)
      channel.value.push(value)
    })

    const channels = [...byChannel.values()]
    if (!channels.length) {
      return { ok: false, error: 'No channel samples found in CSV' }
    }
    const lengths = new Set(channels.map((c) => c.time.length))
    if (lengths.size > 1) {
      return { ok: false, error: `Channels are not row-aligned (lengths ${[...lengths].join(', ')})` }
    }
    const temperatures = channels.filter((c) => c.role === 'temperature')
    if (temperatures.length > 1) {
      return { ok: false, error: 'More than one channel is tagged as temperature' }
    }

    const experiment: Experiment = {
      id: uuidv4(),
      name: experimentName || experimentNameFromFile(filename),
      sourceFile: filename,
      parserId: 'channel-long-csv',
      createdAt: new Date().toISOString(),
      channels,
      temperatureChannel: temperatures[0]?.name ?? null,
    }
    return { ok: true, experiment, warnings: warnings.length ? warnings : undefined }
  },
}

export default ChannelLongCSV
