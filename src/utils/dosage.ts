// `<prefix>_<number>[kK]_<suffix>`, looked for after the first underscore
const DOSAGE_PATTERN = /_(\d+(?:[.,]\d+)?)[kK]_/

export function extractDosage(name: string): number | null {
  const sep = name.indexOf('_')
  if (sep < 0) return null
  const match = DOSAGE_PATTERN.exec(name.slice(sep))
  if (!match) return null
  const value = Number(match[1].replace(',', '.'))
  return Number.isFinite(value) ? value : null
}
