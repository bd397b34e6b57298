/**
 * Predict Command
 *
 * Train on a CSV and write predictions for every record of another.
 */

import { writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { exportPredictionsToCSV, exportPredictionsToJSON, isExportFormat } from '../../export'
import { VERSION } from '../../index'
import type { PredictionRow } from '../../types'
import type { CLIArgs } from '../args'
import { ConfigError } from '../config'
import { reportWarnings, trainFromArgs } from '../helpers'
import { ensureDir, loadRecords, writeJsonOutput } from '../io'
import type { Logger } from '../logger'

const DEFAULT_OUTPUT_DIR = './output'
const DEFAULT_FORMATS = ['csv', 'json']

export async function cmdPredict(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const { predictor, training, params, config } = await trainFromArgs('predict', args, logger)

  logger.log(`\n🔮 Predicting ${basename(args.input)}...`)
  const input = await loadRecords(args.input, { keepDuplicates: true })
  reportWarnings(input.warnings, logger)

  const rows: PredictionRow[] = input.records.map((record) => ({
    record,
    prediction: predictor.predict(record)
  }))
  logger.success(`${rows.length.toLocaleString()} records predicted`)

  const metadata = {
    version: VERSION,
    trainingFile: args.training,
    inputFile: args.input,
    trainingCount: training.records.length,
    params
  }

  if (args.jsonOutput) {
    const written = await writeJsonOutput(args.jsonOutput, exportPredictionsToJSON(rows, metadata))
    if (written) logger.success(`Saved to ${written}`)
    return
  }

  const formats = args.formats ?? config?.formats ?? DEFAULT_FORMATS
  const unknown = formats.filter((f) => !isExportFormat(f))
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown format: ${unknown.join(', ')}. Valid formats: csv, json`)
  }

  const outputDir = args.outputDir ?? config?.outputDir ?? DEFAULT_OUTPUT_DIR
  await ensureDir(outputDir)

  if (formats.includes('csv')) {
    const path = join(outputDir, 'predictions.csv')
    await writeFile(path, exportPredictionsToCSV(rows))
    logger.success(`Saved to ${path}`)
  }
  if (formats.includes('json')) {
    const path = join(outputDir, 'predictions.json')
    await writeFile(path, exportPredictionsToJSON(rows, metadata))
    logger.success(`Saved to ${path}`)
  }
}
