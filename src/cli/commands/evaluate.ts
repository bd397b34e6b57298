/**
 * Evaluate Command
 *
 * Train on a CSV and score predictions against labelled hold-out records.
 */

import { basename } from 'node:path'
import { evaluate, type TargetScore } from '../../tree'
import type { CLIArgs } from '../args'
import { reportWarnings, trainFromArgs } from '../helpers'
import { loadRecords, writeJsonOutput } from '../io'
import type { Logger } from '../logger'

/**
 * Format one score line, e.g. "clinician    12/20   60.0%".
 */
export function formatScore(score: TargetScore): string {
  const ratio = `${score.correct}/${score.labelled}`
  const pct = score.labelled === 0 ? '—' : `${(score.accuracy * 100).toFixed(1)}%`
  return `${score.target.padEnd(12)} ${ratio.padStart(9)}  ${pct.padStart(6)}`
}

export async function cmdEvaluate(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No test file specified')
  }

  const { predictor } = await trainFromArgs('evaluate', args, logger)

  logger.log(`\n📊 Scoring ${basename(args.input)}...`)
  const test = await loadRecords(args.input, { keepDuplicates: true })
  reportWarnings(test.warnings, logger)

  const scores = evaluate(predictor, test.records)

  if (args.jsonOutput) {
    const written = await writeJsonOutput(args.jsonOutput, JSON.stringify(scores, null, 2))
    if (written) logger.success(`Saved to ${written}`)
    return
  }

  logger.log('')
  for (const score of scores) {
    logger.log(`  ${formatScore(score)}`)
  }
}
