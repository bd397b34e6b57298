/**
 * Evaluation
 *
 * Per-target accuracy of a predictor against labelled records.
 */

import { getTarget, type PatientRecord, TARGET_FIELDS, type TargetField } from '../types'
import type { MultiTargetPredictor } from './predictor'

export interface TargetScore {
  readonly target: TargetField
  /** Records that carry a label for this target */
  readonly labelled: number
  readonly correct: number
  /** correct / labelled, or 0 when nothing is labelled */
  readonly accuracy: number
}

/**
 * Score predictions case-insensitively. Records without a label for a target
 * are not counted for that target.
 */
export function evaluate(
  predictor: MultiTargetPredictor,
  records: readonly PatientRecord[]
): TargetScore[] {
  const predictions = records.map((record) => predictor.predict(record))

  return TARGET_FIELDS.map((target) => {
    let labelled = 0
    let correct = 0
    records.forEach((record, i) => {
      const label = getTarget(record, target)
      const prediction = predictions[i]
      if (label === undefined || !prediction) return
      labelled++
      if (prediction[target].toLowerCase() === label.toLowerCase()) correct++
    })
    return { target, labelled, correct, accuracy: labelled === 0 ? 0 : correct / labelled }
  })
}
