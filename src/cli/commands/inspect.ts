/**
 * Inspect Command
 *
 * Train on a CSV and print the resulting trees.
 */

import { countLeaves, type DecisionTree, renderTree, treeDepth } from '../../tree'
import { isTargetField, TARGET_FIELDS, type TargetField } from '../../types'
import type { CLIArgs } from '../args'
import { ConfigError } from '../config'
import { trainFromArgs } from '../helpers'
import { writeJsonOutput } from '../io'
import type { Logger } from '../logger'

function parseTarget(value: string | undefined): TargetField | undefined {
  if (value === undefined) return undefined
  if (!isTargetField(value)) {
    throw new ConfigError(`Unknown target: ${value}. Valid targets: ${TARGET_FIELDS.join(', ')}`)
  }
  return value
}

export async function cmdInspect(args: CLIArgs, logger: Logger): Promise<void> {
  const target = parseTarget(args.target)
  const { predictor } = await trainFromArgs('inspect', args, logger)

  const trees: Array<[TargetField, DecisionTree]> = target
    ? [[target, predictor.tree(target)]]
    : predictor.entries()

  if (args.jsonOutput) {
    const data = Object.fromEntries(trees.map(([field, tree]) => [field, tree.toJSON()]))
    const written = await writeJsonOutput(args.jsonOutput, JSON.stringify(data, null, 2))
    if (written) logger.success(`Saved to ${written}`)
    return
  }

  for (const [field, tree] of trees) {
    logger.log('')
    logger.verbose(`${field}: depth ${treeDepth(tree.root)}, ${countLeaves(tree.root)} leaves`)
    logger.log(renderTree(tree.root, field))
  }
}
