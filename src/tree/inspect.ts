/**
 * Tree Inspection
 *
 * Size metrics and an indented text rendering of a tree.
 */

import type { BranchNode, TreeNode } from '../types'

/** Number of splits on the longest root-to-leaf path. */
export function treeDepth(node: TreeNode): number {
  if (node.kind === 'leaf') return 0
  let deepest = 0
  for (const child of node.children.values()) {
    deepest = Math.max(deepest, treeDepth(child))
  }
  return deepest + 1
}

export function countLeaves(node: TreeNode): number {
  if (node.kind === 'leaf') return 1
  let total = 0
  for (const child of node.children.values()) {
    total += countLeaves(child)
  }
  return total
}

export function countNodes(node: TreeNode): number {
  if (node.kind === 'leaf') return 1
  let total = 1
  for (const child of node.children.values()) {
    total += countNodes(child)
  }
  return total
}

function renderChildren(node: BranchNode, indent: string, lines: string[]): void {
  for (const [value, child] of node.children) {
    if (child.kind === 'leaf') {
      lines.push(`${indent}${node.attribute} = ${value} → ${child.value}`)
    } else {
      lines.push(`${indent}${node.attribute} = ${value} [majority: ${child.majority}]`)
      renderChildren(child, `${indent}  `, lines)
    }
  }
}

/**
 * Render a tree as indented text, one line per node.
 *
 * @example
 * ```
 * clinician [majority: X]
 *   clinical_panel = a → X
 *   clinical_panel = b → Y
 * ```
 */
export function renderTree(node: TreeNode, label: string): string {
  if (node.kind === 'leaf') return `${label} → ${node.value}`
  const lines = [`${label} [majority: ${node.majority}]`]
  renderChildren(node, '  ', lines)
  return lines.join('\n')
}
