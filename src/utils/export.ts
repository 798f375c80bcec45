import * as XLSX from 'xlsx'
import type { CalibrationFit, FullIntegrationResult, RatioIntegrationResult } from '@/types'
import { toIntegrationCSVRows } from '@/utils/csv'

export interface ResultsWorkbookInput {
  full?: FullIntegrationResult | null
  ratio?: RatioIntegrationResult | null
  fits?: CalibrationFit[]
}

function fitRow(fit: CalibrationFit) {
  if (fit.kind === 'linear') {
    return { model: 'linear', slope: fit.slope, intercept: fit.intercept, threshold: '', r2: fit.r2, n: fit.x.length }
  }
  return { model: 'piecewise', slope: fit.slope, intercept: '', threshold: fit.threshold, r2: fit.r2, n: fit.x.length }
}

/** One sheet per table that is present: "Integrals", "Ratios", "Fits". */
export function resultsWorkbook(input: ResultsWorkbookInput): Buffer {
  const wb = XLSX.utils.book_new()
  if (input.full) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(toIntegrationCSVRows(input.full)), 'Integrals')
  }
  if (input.ratio) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(toIntegrationCSVRows(input.ratio)), 'Ratios')
  }
  if (input.fits?.length) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(input.fits.map(fitRow)), 'Fits')
  }
  if (!wb.SheetNames.length) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([['No results']]), 'Empty')
  }
  const out: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' })
  return out
}

export function sanitizeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]+/g, '_');
}
