/**
 * CLI Helpers
 *
 * Shared training setup for the predict, evaluate and inspect commands.
 */

import { basename } from 'node:path'
import { VERSION } from '../index'
import type { PreparedRecords } from '../reader'
import { MultiTargetPredictor } from '../tree'
import type { TreeParams } from '../types'
import type { CLIArgs } from './args'
import { type Config, loadConfig, resolveTreeParams } from './config'
import { loadRecords } from './io'
import type { Logger } from './logger'

export interface TrainingResult {
  readonly predictor: MultiTargetPredictor
  readonly training: PreparedRecords
  readonly params: TreeParams
  readonly config: Config | null
}

/**
 * Log each warning in verbose mode, or a single count otherwise.
 */
export function reportWarnings(warnings: readonly string[], logger: Logger): void {
  if (warnings.length === 0) return
  logger.warn(`${warnings.length} warning${warnings.length !== 1 ? 's' : ''} while reading records`)
  for (const warning of warnings) {
    logger.verbose(warning)
  }
}

/**
 * Validate input, log header, resolve tree params, load training records and
 * build the five trees.
 */
export async function trainFromArgs(
  commandName: string,
  args: CLIArgs,
  logger: Logger
): Promise<TrainingResult> {
  if (!args.training) {
    throw new Error('No training file specified')
  }

  logger.log(`\nddx-tree ${commandName} v${VERSION}`)
  logger.log(`\n📁 ${basename(args.training)}`)

  const config = await loadConfig(args.configFile)
  const params = resolveTreeParams(args, config)
  logger.verbose(
    `maxDepth=${params.maxDepth} minSamplesLeaf=${params.minSamplesLeaf} minGainRatio=${params.minGainRatio}`
  )

  const training = await loadRecords(args.training, {
    keepDuplicates: args.keepDuplicates || (config?.keepDuplicates ?? false)
  })
  reportWarnings(training.warnings, logger)
  logger.success(
    `${training.records.length.toLocaleString()} training records (${training.duplicateCount} duplicates removed)`
  )

  const predictor = MultiTargetPredictor.build(training.records, params)
  logger.success('Trained 5 trees')

  return { predictor, training, params, config }
}
