/**
 * Tree Module
 *
 * Gain-ratio decision trees over patient records, one per target field.
 *
 * @example
 * ```typescript
 * import { MultiTargetPredictor } from './tree'
 *
 * const predictor = MultiTargetPredictor.build(records, DEFAULT_TREE_PARAMS)
 * const prediction = predictor.predict({ clinical_panel: 'paediatrics' })
 * console.log(prediction.clinician)
 * ```
 */

export { buildNode, buildTree, chooseSplit } from './builder'
export { DecisionTree, type TreeJSON } from './decision-tree'
export { evaluate, type TargetScore } from './evaluate'
export { countLeaves, countNodes, renderTree, treeDepth } from './inspect'
export { MultiTargetPredictor, type TargetTrees } from './predictor'
export {
  classCounts,
  compareValues,
  entropy,
  gainRatio,
  majorityClass,
  partition,
  pureClass
} from './statistics'
