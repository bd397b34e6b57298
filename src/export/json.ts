/**
 * JSON Export
 *
 * Export predictions to JSON format with metadata.
 */

import type { ExportMetadata, PatientRecord, Prediction, PredictionRow } from '../types'

interface JsonPrediction {
  readonly id: number
  readonly record: PatientRecord
  readonly prediction: Prediction
}

interface JsonExport {
  readonly metadata: ExportMetadata
  readonly predictions: JsonPrediction[]
}

/**
 * Export predictions to JSON format.
 *
 * @param rows Records with their predictions
 * @param metadata Export metadata; counts default to what `rows` holds
 * @returns JSON string
 */
export function exportPredictionsToJSON(
  rows: readonly PredictionRow[],
  metadata: Partial<ExportMetadata> & Pick<ExportMetadata, 'params'>
): string {
  const exportData: JsonExport = {
    metadata: {
      version: metadata.version ?? '1.0.0',
      generatedAt: metadata.generatedAt ?? new Date(),
      trainingFile: metadata.trainingFile,
      inputFile: metadata.inputFile,
      trainingCount: metadata.trainingCount ?? 0,
      predictionCount: rows.length,
      params: metadata.params
    },
    predictions: rows.map(({ record, prediction }, i) => ({ id: i + 1, record, prediction }))
  }

  return JSON.stringify(exportData, null, 2)
}
