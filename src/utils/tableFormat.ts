import { stringify } from 'csv-stringify/sync'
import { CellValue } from './queryParser'

export type OutputFormat = 'plain' | 'csv' | 'tsv'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['plain', 'csv', 'tsv']

const cellText = (value: CellValue) => (value === null ? '' : String(value))

/** Space-padded columns, two spaces apart, without trailing blanks */
export function formatPlain(rows: string[][]): string {
  const widths: number[] = []
  for (const row of rows) {
    row.forEach((cell, i) => { widths[i] = Math.max(widths[i] ?? 0, cell.length) })
  }
  return rows
    .map((row) => row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i]))).join('  ').trimEnd())
    .join('\n')
}

export function formatTable(columns: string[], rows: CellValue[][], format: OutputFormat = 'plain'): string {
  const records = [columns, ...rows.map((row) => row.map(cellText))]
  if (format === 'plain') return formatPlain(records) + '\n'
  return stringify(records, { delimiter: format === 'tsv' ? '\t' : ',' })
}

/** Key/value listing used for metadata and forensic output */
export function formatPairs(record: Readonly<Record<string, string>>): string {
  const keys = Object.keys(record).sort()
  return formatPlain(keys.map((key) => [key, record[key]])) + (keys.length ? '\n' : '')
}
