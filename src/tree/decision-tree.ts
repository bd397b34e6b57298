/**
 * Decision Tree
 *
 * A trained tree for one target field, and case-insensitive traversal.
 */

import {
  getAttribute,
  MISSING_VALUE,
  type PatientRecord,
  type TargetField,
  type TreeNode,
  type TreeParams
} from '../types'
import { buildTree } from './builder'

/** Plain-object form of a tree, as written by `inspect --json`. */
export type TreeJSON =
  | { readonly value: string }
  | {
      readonly attribute: string
      readonly majority: string
      readonly children: { readonly [value: string]: TreeJSON }
    }

function findChild(children: ReadonlyMap<string, TreeNode>, value: string): TreeNode | undefined {
  const exact = children.get(value)
  if (exact) return exact
  const lower = value.toLowerCase()
  for (const [key, child] of children) {
    if (key.toLowerCase() === lower) return child
  }
  return undefined
}

/**
 * Walk the tree for one record.
 * A missing attribute is looked up as "missing"; an unmatched value or an
 * empty result falls back to the branch majority.
 */
function traverse(node: TreeNode, record: PatientRecord): string {
  if (node.kind === 'leaf') return node.value

  const value = getAttribute(record, node.attribute) ?? MISSING_VALUE
  const child = findChild(node.children, value)
  if (!child) return node.majority

  const result = traverse(child, record)
  return result === '' ? node.majority : result
}

function toJSON(node: TreeNode): TreeJSON {
  if (node.kind === 'leaf') return { value: node.value }
  const children: { [value: string]: TreeJSON } = {}
  for (const [value, child] of node.children) {
    children[value] = toJSON(child)
  }
  return { attribute: node.attribute, majority: node.majority, children }
}

export class DecisionTree {
  private constructor(
    readonly target: TargetField,
    readonly root: TreeNode
  ) {}

  static build(
    records: readonly PatientRecord[],
    target: TargetField,
    params: TreeParams
  ): DecisionTree {
    return new DecisionTree(target, buildTree(records, target, params))
  }

  predict(record: PatientRecord): string {
    return traverse(this.root, record)
  }

  toJSON(): TreeJSON {
    return toJSON(this.root)
  }
}
