import { readFile } from 'node:fs/promises'
import path from 'node:path'
import type { ExperimentStore } from '@/state/store'
import { pickParserFor } from '@/modules/input_files_converter'
import { errorMessage } from '@/utils/errors'

export type ImportOutcome =
  | { ok: true; file: string; name: string; parserId: string; warnings: string[] }
  | { ok: false; file: string; error: string }

/**
 * Parses one file's text and adds the experiment to the store. Unrecognised
 * formats and parse failures come back as `{ ok: false }`.
 */
export function importExperimentText(store: ExperimentStore, text: string, filename: string): ImportOutcome {
  const parser = pickParserFor(text, filename)
  if (!parser) {
    return { ok: false, file: filename, error: `Unrecognised file format: ${filename}` }
  }
  const res = parser.parse(text, filename)
  if (!res.ok) return { ok: false, file: filename, error: res.error }
  const warnings = res.warnings ?? []
  store.getState().addExperiment(res.experiment, warnings)
  return { ok: true, file: filename, name: res.experiment.name, parserId: parser.id, warnings }
}

/** Reads and imports each file in turn; a failing file does not stop the others. */
export async function importExperimentFiles(store: ExperimentStore, paths: string[]): Promise<ImportOutcome[]> {
  const outcomes: ImportOutcome[] = []
  for (const filePath of paths) {
    const filename = path.basename(filePath)
    let text: string
    try {
      text = await readFile(filePath, 'utf8')
    } catch (error) {
      outcomes.push({ ok: false, file: filename, error: `Could not read ${filePath}: ${errorMessage(error)}` })
      continue
    }
    outcomes.push(importExperimentText(store, text, filename))
  }
  const failed = outcomes.filter((o) => !o.ok).length
  if (failed) {
    console.warn(`[EXPERIMENT IMPORT] ${failed} of ${paths.length} file(s) could not be imported.`)
  }
  return outcomes
}
