/**
 * CSV Export
 *
 * Export predictions to CSV format.
 */

import { ATTRIBUTES, type PredictionRow, TARGET_FIELDS } from '../types'

const CSV_COLUMNS = ['id', 'master_index', ...ATTRIBUTES, ...TARGET_FIELDS] as const

/**
 * Escape a value for CSV (handle quotes and commas).
 */
function escapeCSV(value: string | number | undefined | null): string {
  if (value === undefined || value === null) {
    return ''
  }

  const str = String(value)

  // If contains comma, newline, or quote, wrap in quotes
  if (str.includes(',') || str.includes('\n') || str.includes('"') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Export predictions to CSV format.
 *
 * Attribute columns hold the input record's values; target columns hold
 * the predictions.
 *
 * @returns CSV string
 */
export function exportPredictionsToCSV(rows: readonly PredictionRow[]): string {
  const lines: string[] = []

  lines.push(CSV_COLUMNS.map(escapeCSV).join(','))

  rows.forEach(({ record, prediction }, i) => {
    const row = [
      i + 1, // id (1-indexed)
      record.master_index,
      ...ATTRIBUTES.map((attribute) => record[attribute]),
      ...TARGET_FIELDS.map((target) => prediction[target])
    ]
    lines.push(row.map(escapeCSV).join(','))
  })

  return lines.join('\n')
}
