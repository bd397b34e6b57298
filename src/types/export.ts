/**
 * Export Types
 *
 * Types for prediction output files (CSV, JSON).
 */

import type { PatientRecord } from './record'
import type { Prediction, TreeParams } from './tree'

/** One input record and what the trees predicted for it. */
export interface PredictionRow {
  readonly record: PatientRecord
  readonly prediction: Prediction
}

export interface ExportMetadata {
  readonly version: string
  readonly generatedAt: Date
  readonly trainingFile?: string | undefined
  readonly inputFile?: string | undefined
  readonly trainingCount: number
  readonly predictionCount: number
  readonly params: TreeParams
}
