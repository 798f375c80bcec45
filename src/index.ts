export * from '@/types'
export { TpdError, ParseError, ConfigError, FitConvergenceError } from '@/utils/errors'
export {
  TRIM_DEFAULTS,
  INTEGRATION_DEFAULTS,
  PIECEWISE_FIT_DEFAULTS,
  resolveTrimOptions,
  resolveIntegrationOptions,
  type TrimOptions,
  type IntegrationOptions,
  type PiecewiseFitOptions,
} from '@/utils/options'
export { toNumber } from '@/utils/numbers'
export { boxSmooth } from '@/utils/smoothing'
export { simpson, trapz } from '@/utils/integration'
export { extractDosage } from '@/utils/dosage'
export { getParsers, pickParserFor, parseTpdText, experimentNameFromFile } from '@/modules/input_files_converter'
export type { Parser, ParseResult } from '@/modules/input_files_converter'
export { detectLinearRegion, detectLinearRegionDetail, pointSlopes } from '@/modules/linear_region/detectLinearRegion'
export { applyTrim, referenceChannel, temperatureOf } from '@/modules/trimming/applyTrim'
export { integrateFull, integrateRatio, validateWindows } from '@/modules/integration/integrate'
export {
  fitLinear,
  fitPiecewise,
  evalPiecewise,
  evaluateFit,
  sampleFitCurve,
  calibrationPairs,
} from '@/modules/calibration/calibration'
export { createExperimentStore, type ExperimentStore, type ExperimentState, type ExperimentEntry } from '@/state/store'
export { importExperimentFiles, importExperimentText, type ImportOutcome } from '@/utils/importers'
export { channelsToCsv, integrationToCsv } from '@/utils/csv'
export { resultsWorkbook, sanitizeFileName } from '@/utils/export'
