import type { Parser } from './parsers/BaseParser'
import ChannelLongCSV from './parsers/ChannelLongCSV'
import TpdAsciiTxt from './parsers/TpdAsciiTxt'

const registry: Parser[] = [
  ChannelLongCSV,
  TpdAsciiTxt
]

export function getParsers(){ return registry }

export function pickParserFor(text: string, filename: string): Parser | null {
  for (const p of registry) {
    if (p.detect(text, filename)) return p
  }
  return null
}

export type { Parser, ParseResult } from './parsers/BaseParser'
export { experimentNameFromFile } from './parsers/BaseParser'
export { parseTpdText } from './parsers/TpdAsciiTxt'
