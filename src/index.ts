/**
 * ddx-tree Core Library
 *
 * Train interpretable decision trees that predict diagnostic labels from
 * patient context attributes, and apply them to new records.
 *
 * Design principle: Pure functions only. No IO, no progress reporting, no orchestration.
 * File handling and configuration live in the CLI.
 *
 * @license AGPL-3.0
 */

// Export module
export {
  EXPORT_FORMATS,
  type ExportFormat,
  exportPredictionsToCSV,
  exportPredictionsToJSON,
  isExportFormat
} from './export/index'
// Reader module
export {
  CSV_HEADERS,
  type DedupeResult,
  dedupeRecords,
  normalizeRecords,
  type ParseRecordsResult,
  type PreparedRecords,
  type PrepareOptions,
  parseRecords,
  prepareRecords,
  RecordLoadError
} from './reader/index'
// Tree module
export {
  buildNode,
  buildTree,
  chooseSplit,
  classCounts,
  compareValues,
  countLeaves,
  countNodes,
  DecisionTree,
  entropy,
  evaluate,
  gainRatio,
  MultiTargetPredictor,
  majorityClass,
  partition,
  pureClass,
  renderTree,
  type TargetScore,
  type TargetTrees,
  type TreeJSON,
  treeDepth
} from './tree/index'
// Types
export type {
  Attribute,
  BranchNode,
  ExportMetadata,
  LeafNode,
  PatientRecord,
  Prediction,
  PredictionRow,
  RecordField,
  TargetField,
  TreeNode,
  TreeParams
} from './types'
export {
  ATTRIBUTES,
  DEFAULT_TREE_PARAMS,
  getAttribute,
  getTarget,
  isAttribute,
  isTargetField,
  MISSING_VALUE,
  RECORD_FIELDS,
  TARGET_FIELDS,
  UNKNOWN_VALUE
} from './types'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
