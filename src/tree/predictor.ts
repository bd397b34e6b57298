/**
 * Multi-Target Predictor
 *
 * One decision tree per target field, trained on the same records.
 */

import {
  type PatientRecord,
  type Prediction,
  TARGET_FIELDS,
  type TargetField,
  type TreeParams
} from '../types'
import { DecisionTree } from './decision-tree'

export type TargetTrees = Readonly<Record<TargetField, DecisionTree>>

export class MultiTargetPredictor {
  private constructor(readonly trees: TargetTrees) {}

  /**
   * Train all five trees. Trees share the records read-only.
   */
  static build(records: readonly PatientRecord[], params: TreeParams): MultiTargetPredictor {
    return new MultiTargetPredictor({
      clinician: DecisionTree.build(records, 'clinician', params),
      gpt4_0: DecisionTree.build(records, 'gpt4_0', params),
      llama: DecisionTree.build(records, 'llama', params),
      gemini: DecisionTree.build(records, 'gemini', params),
      ddx_snomed: DecisionTree.build(records, 'ddx_snomed', params)
    })
  }

  predict(record: PatientRecord): Prediction {
    return {
      clinician: this.trees.clinician.predict(record),
      gpt4_0: this.trees.gpt4_0.predict(record),
      llama: this.trees.llama.predict(record),
      gemini: this.trees.gemini.predict(record),
      ddx_snomed: this.trees.ddx_snomed.predict(record)
    }
  }

  tree(target: TargetField): DecisionTree {
    return this.trees[target]
  }

  /** Trees in target field order. */
  entries(): Array<[TargetField, DecisionTree]> {
    return TARGET_FIELDS.map((target): [TargetField, DecisionTree] => [target, this.trees[target]])
  }
}
