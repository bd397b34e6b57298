/**
 * Tree Builder
 *
 * Recursive partitioning on the attribute with the highest gain ratio,
 * bounded by depth, partition size and minimum gain ratio.
 */

import {
  ATTRIBUTES,
  type Attribute,
  type PatientRecord,
  type TargetField,
  type TreeNode,
  type TreeParams,
  UNKNOWN_VALUE
} from '../types'
import { compareValues, entropy, gainRatio, majorityClass, partition, pureClass } from './statistics'

interface SplitChoice {
  readonly attribute: Attribute
  readonly ratio: number
}

function leaf(value: string): TreeNode {
  return { kind: 'leaf', value }
}

/**
 * Attribute with the strictly greatest gain ratio.
 * Attributes are scanned in lexicographic order, so the first one wins ties.
 */
export function chooseSplit(
  records: readonly PatientRecord[],
  attributes: readonly Attribute[],
  target: TargetField
): SplitChoice | undefined {
  const baseEntropy = entropy(records, target)
  let best: SplitChoice | undefined
  for (const attribute of [...attributes].sort(compareValues)) {
    const ratio = gainRatio(records, attribute, target, baseEntropy)
    if (!best || ratio > best.ratio) {
      best = { attribute, ratio }
    }
  }
  return best
}

/**
 * Build the (sub)tree for `records` at `depth`.
 */
export function buildNode(
  records: readonly PatientRecord[],
  target: TargetField,
  attributes: readonly Attribute[],
  depth: number,
  params: TreeParams
): TreeNode {
  const majority = majorityClass(records, target)

  if (records.length === 0) {
    return leaf(UNKNOWN_VALUE)
  }
  // Depth and size limits take priority over purity
  if (depth >= params.maxDepth || records.length < params.minSamplesLeaf) {
    return leaf(majority)
  }
  const pure = pureClass(records, target)
  if (pure !== undefined) {
    return leaf(pure)
  }

  const split = chooseSplit(records, attributes, target)
  if (!split || split.ratio < params.minGainRatio) {
    return leaf(majority)
  }

  const remaining = attributes.filter((a) => a !== split.attribute)
  const children = new Map<string, TreeNode>()
  for (const [value, subset] of partition(records, split.attribute)) {
    children.set(
      value,
      subset.length < params.minSamplesLeaf
        ? leaf(majority)
        : buildNode(subset, target, remaining, depth + 1, params)
    )
  }

  return { kind: 'branch', attribute: split.attribute, children, majority }
}

/**
 * Build a full tree for one target field over every attribute.
 */
export function buildTree(
  records: readonly PatientRecord[],
  target: TargetField,
  params: TreeParams
): TreeNode {
  return buildNode(records, target, ATTRIBUTES, 0, params)
}
