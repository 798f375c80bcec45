import type { Experiment } from '@/types'

export interface ParseResultOk {
  ok: true
  experiment: Experiment
  warnings?: string[]
}
export interface ParseResultErr {
  ok: false
  error: string
}
export type ParseResult = ParseResultOk | ParseResultErr

export interface Parser {
  id: string
  label: string
  description: string
  fileExtensions: string[]
  detect: (text: string, filename: string) => boolean
  parse: (content: string, filename: string) => ParseResult
}

/** File name without directory and extension, used as the experiment name. */
export function experimentNameFromFile(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? filename
  const dot = base.lastIndexOf('.')
  return dot > 0 ? base.slice(0, dot) : base
}
