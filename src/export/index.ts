/**
 * Export Module
 *
 * Generate prediction output files in various formats.
 */

export { exportPredictionsToCSV } from './csv'
export { exportPredictionsToJSON } from './json'

/** Formats the CLI can write. */
export const EXPORT_FORMATS = ['csv', 'json'] as const

export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value)
}
