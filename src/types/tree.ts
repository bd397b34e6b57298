/**
 * Tree Types
 *
 * Build parameters, tree nodes and prediction bundles.
 */

import type { Attribute, TargetField } from './record'

/** Leaf value used when a (sub)set has no usable target values. */
export const UNKNOWN_VALUE = 'unknown'

/** Lookup key used at a branch when the record lacks the branch attribute. */
export const MISSING_VALUE = 'missing'

/**
 * Build-time pruning controls. Callers validate these before building.
 */
export interface TreeParams {
  /** Maximum number of splits from root to any leaf */
  readonly maxDepth: number
  /** Partitions smaller than this become majority leaves */
  readonly minSamplesLeaf: number
  /** Splits with a lower gain ratio are rejected */
  readonly minGainRatio: number
}

export const DEFAULT_TREE_PARAMS: TreeParams = {
  maxDepth: 4,
  minSamplesLeaf: 1,
  minGainRatio: 0
}

export interface BranchNode {
  readonly kind: 'branch'
  readonly attribute: Attribute
  /** Child per attribute value, in lexicographic key order */
  readonly children: ReadonlyMap<string, TreeNode>
  /** Majority class of the records this branch was built from */
  readonly majority: string
}

export interface LeafNode {
  readonly kind: 'leaf'
  readonly value: string
}

export type TreeNode = BranchNode | LeafNode

/** One predicted value per target field. */
export type Prediction = Readonly<Record<TargetField, string>>
