import Papa from 'papaparse'
import { v4 as uuidv4 } from 'uuid'
import type { Parser, ParseResult } from './BaseParser'
import { experimentNameFromFile } from './BaseParser'
import type { Channel, Experiment } from '@/types'
import { ParseError } from '@/utils/errors'
import { isNumericToken, toNumber } from '@/utils/numbers'

export const PARSER_ID = 'tpd-ascii-txt'

/** Zero-based index of the channel-name header; the lines above it are instrument metadata. */
export const HEADER_LINE_INDEX = 6
export const COLUMNS_PER_CHANNEL = 3

const TEMPERATURE_MARKER = /temp/i

interface DataLine {
  lineNo: number // 1-based, for error messages
  cells: string[]
}

function splitHeader(line: string): string[] {
  return line
    .trim()
    .split('\t')
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
}

function tokenizeRows(lines: string[], firstLineNo: number): DataLine[] {
  const kept: { lineNo: number; text: string }[] = []
  lines.forEach((text, idx) => {
    if (text.trim().length) kept.push({ lineNo: firstLineNo + idx, text })
  })
  if (!kept.length) return []

  const res = Papa.parse<string[]>(kept.map((k) => k.text).join('\n'), {
    delimiter: '\t',
    newline: '\n',
    // instrument cells are never quoted; a stray `"` in a heading stays literal
    quoteChar: '\u0000',
    skipEmptyLines: false,
  })
  if (res.errors.length) {
    const first = res.errors[0]
    const lineNo = first.row !== undefined ? kept[first.row]?.lineNo ?? null : null
    throw new ParseError(`Tab-separated data could not be tokenized: ${first.message}`, lineNo)
  }
  return res.data.map((cells, idx) => ({ lineNo: kept[idx].lineNo, cells }))
}

function blockIsHeader(cells: string[], channelCount: number): boolean {
  for (let c = 0; c < channelCount; c += 1) {
    const time = cells[c * COLUMNS_PER_CHANNEL + 1]
    const value = cells[c * COLUMNS_PER_CHANNEL + 2]
    if (isNumericToken(time) || isNumericToken(value)) return false
  }
  return true
}

function pickTemperatureLabel(labels: string[], warnings: string[]): string {
  for (let i = labels.length - 1; i >= 0; i -= 1) {
    if (TEMPERATURE_MARKER.test(labels[i])) return labels[i]
  }
  const fallback = labels[labels.length - 1]
  warnings.push(`No channel header names a temperature; using the last channel "${fallback}" as temperature.`)
  return fallback
}

/**
 * Converts the text of one instrument export into an Experiment.
 *
 * Line 7 holds the tab-separated channel names. Every following row carries one
 * `(index, time, value)` column triple per channel, in header order; `,` and `.`
 * are both accepted as decimal separators. Throws {@link ParseError} on a missing
 * header, short rows or unparsable numbers.
 */
export function parseTpdText(
  text: string,
  experimentName: string,
  sourceFile = experimentName,
): { experiment: Experiment; warnings: string[] } {
  const warnings: string[] = []
  const lines = text.split(/\r?\n/)
  const headerLine = lines[HEADER_LINE_INDEX]
  if (headerLine === undefined) {
    throw new ParseError(`Channel header missing: file has only ${lines.length} line(s)`)
  }
  const labels = splitHeader(headerLine)
  if (!labels.length) {
    throw new ParseError('Channel header line is empty', HEADER_LINE_INDEX + 1)
  }
  const duplicate = labels.find((label, idx) => labels.indexOf(label) !== idx)
  if (duplicate !== undefined) {
    throw new ParseError(`Duplicate channel header "${duplicate}"`, HEADER_LINE_INDEX + 1)
  }

  const width = labels.length * COLUMNS_PER_CHANNEL
  let rows = tokenizeRows(lines.slice(HEADER_LINE_INDEX + 1), HEADER_LINE_INDEX + 2)

  if (rows.length && blockIsHeader(rows[0].cells, labels.length)) {
    rows = rows.slice(1)
  }
  const last = rows[rows.length - 1]
  if (last && !last.cells.some((cell) => isNumericToken(cell))) {
    rows = rows.slice(0, -1)
  }
  if (!rows.length) {
    throw new ParseError('No data rows found after the channel header')
  }

  const times: number[][] = labels.map(() => [])
  const values: number[][] = labels.map(() => [])
  for (const { lineNo, cells } of rows) {
    if (cells.length < width) {
      throw new ParseError(
        `Expected ${width} columns for ${labels.length} channel(s), found ${cells.length}`,
        lineNo,
      )
    }
    if (cells.slice(width).some((cell) => cell.trim().length > 0)) {
      throw new ParseError(
        `Found ${cells.length} columns but ${labels.length} channel(s) account for only ${width}`,
        lineNo,
      )
    }
    for (let c = 0; c < labels.length; c += 1) {
      const timeCol = c * COLUMNS_PER_CHANNEL + 1
      const valueCol = timeCol + 1
      const time = toNumber(cells[timeCol])
      const value = toNumber(cells[valueCol])
      if (Number.isNaN(time)) {
        throw new ParseError(`Unparsable time "${cells[timeCol]}" in column ${timeCol + 1}`, lineNo)
      }
      if (Number.isNaN(value)) {
        throw new ParseError(`Unparsable value "${cells[valueCol]}" in column ${valueCol + 1}`, lineNo)
      }
      times[c].push(time)
      values[c].push(value)
    }
  }

  const temperatureLabel = pickTemperatureLabel(labels, warnings)
  const channels: Channel[] = labels.map((label, c) => ({
    name: `${experimentName}_${label}`,
    label,
    role: label === temperatureLabel ? 'temperature' : 'ion',
    time: times[c],
    value: values[c],
  }))

  const experiment: Experiment = {
    id: uuidv4(),
    name: experimentName,
    sourceFile,
    parserId: PARSER_ID,
    createdAt: new Date().toISOString(),
    channels,
    temperatureChannel: `${experimentName}_${temperatureLabel}`,
  }
  return { experiment, warnings }
}

const TpdAsciiTxt: Parser = {
  id: PARSER_ID,
  label: 'TPD ASCII export (.txt / .asc)',
  description: 'Tab-separated export; channel names on line 7, then (index, time, value) triples per channel',
  fileExtensions: ['.txt', '.asc'],
  detect: (text, filename) => {
    const lower = filename.toLowerCase()
    if (!TpdAsciiTxt.fileExtensions.some((ext) => lower.endsWith(ext))) return false
    const lines = text.split(/\r?\n/, HEADER_LINE_INDEX + 3)
    const header = lines[HEADER_LINE_INDEX]
    return header !== undefined && splitHeader(header).length > 0 && lines.length > HEADER_LINE_INDEX + 1
  },
  parse: (content, filename): ParseResult => {
    try {
      const { experiment, warnings } = parseTpdText(content, experimentNameFromFile(filename), filename)
      return { ok: true, experiment, warnings: warnings.length ? warnings : undefined }
    } catch (error) {
      if (error instanceof ParseError) return { ok: false, error: error.message }
      throw error
    }
  },
}

export default TpdAsciiTxt
