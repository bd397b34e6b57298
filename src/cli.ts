#!/usr/bin/env node
/**
 * ddx-tree CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, configuration and progress reporting.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdEvaluate } from './cli/commands/evaluate'
import { cmdInspect } from './cli/commands/inspect'
import { cmdPredict } from './cli/commands/predict'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'predict':
        await cmdPredict(args, logger)
        break

      case 'evaluate':
        await cmdEvaluate(args, logger)
        break

      case 'inspect':
        await cmdInspect(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'ddx-tree --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
