/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export interface CLIArgs {
  command: string
  /** Training CSV */
  training: string
  /** Records to predict or evaluate */
  input: string
  outputDir: string | undefined
  formats: string[] | undefined
  jsonOutput: string | undefined
  /** For inspect command: only this target's tree */
  target: string | undefined
  maxDepth: number | undefined
  minSamplesLeaf: number | undefined
  minGainRatio: number | undefined
  keepDuplicates: boolean
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Train interpretable decision trees that predict diagnostic labels
(clinician, GPT4.0, LLAMA, GEMINI, DDX SNOMED) from patient context attributes.

One tree is trained per target field on every run; trees are not saved.

Examples:
  $ ddx-tree inspect train.csv
  $ ddx-tree predict train.csv vignettes.csv -o ./results
  $ ddx-tree evaluate train.csv holdout.csv --max-depth 2`

function addTreeOptions(command: Command): Command {
  return command
    .option('--max-depth <num>', 'Maximum tree depth')
    .option('--min-samples-leaf <num>', 'Minimum records needed to keep splitting')
    .option('--min-gain-ratio <num>', 'Minimum gain ratio to accept a split')
    .option('--keep-duplicates', 'Train on duplicate records too')
}

function createProgram(): Command {
  const program = new Command()
    .name('ddx-tree')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set DDX_TREE_CONFIG)')

  // ============ PREDICT ============
  addTreeOptions(
    program
      .command('predict')
      .description('Train on <training> and predict every target for each record in <input>')
      .argument('<training>', 'Training CSV')
      .argument('<input>', 'CSV of records to predict')
      .option('-o, --output-dir <dir>', 'Output directory (default: ./output)')
      .option('-f, --format <formats>', 'Output formats: csv,json (default: csv,json)')
      .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')
  )

  // ============ EVALUATE ============
  addTreeOptions(
    program
      .command('evaluate')
      .description('Train on <training> and report per-target accuracy on labelled <test> records')
      .argument('<training>', 'Training CSV')
      .argument('<test>', 'Labelled CSV to score against')
      .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')
  )

  // ============ INSPECT ============
  addTreeOptions(
    program
      .command('inspect')
      .description('Train on <training> and print the trees')
      .argument('<training>', 'Training CSV')
      .option(
        '-t, --target <field>',
        'Only show this target: clinician, gpt4_0, llama, gemini, ddx_snomed'
      )
      .option('--json [file]', 'Output trees as JSON (to file if specified, otherwise stdout)')
  )

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  ddx-tree config                        List current settings
  ddx-tree config set maxDepth 3         Limit trees to three splits
  ddx-tree config set formats csv        Only write predictions.csv
  ddx-tree config unset minGainRatio     Back to the default`
    )

  return program
}

/**
 * Parse a numeric option; a non-numeric value becomes NaN and is rejected
 * when tree parameters are resolved.
 */
function parseNumberOption(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined
  return value.trim() === '' ? Number.NaN : Number(value)
}

function buildCLIArgs(
  commandName: string,
  inputs: readonly string[],
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command: commandName,
    training: inputs[0] ?? '',
    input: inputs[1] ?? '',
    outputDir: typeof opts.outputDir === 'string' ? opts.outputDir : undefined,
    formats:
      typeof opts.format === 'string' ? opts.format.split(',').map((f) => f.trim()) : undefined,
    jsonOutput:
      opts.json === true ? 'stdout' : typeof opts.json === 'string' ? opts.json : undefined,
    target: typeof opts.target === 'string' ? opts.target : undefined,
    maxDepth: parseNumberOption(opts.maxDepth),
    minSamplesLeaf: parseNumberOption(opts.minSamplesLeaf),
    minGainRatio: parseNumberOption(opts.minGainRatio),
    keepDuplicates: opts.keepDuplicates === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function buildConfigCLIArgs(
  action: string | undefined,
  key: string | undefined,
  value: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  const base = buildCLIArgs('config', [], opts)
  return {
    ...base,
    configAction: parseConfigAction(action),
    configKey: key,
    configValue: value
  }
}

/**
 * Attach action handlers that capture parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        onParsed(buildConfigCLIArgs(action, key, value, cmd.optsWithGlobals()))
      })
    } else {
      cmd.action((...actionArgs: unknown[]) => {
        const inputs = actionArgs.filter((a): a is string => typeof a === 'string')
        onParsed(buildCLIArgs(cmd.name(), inputs, cmd.optsWithGlobals()))
      })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', [], {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version and on usage errors
    if (!result) {
      return buildCLIArgs('help', [], {})
    }
  }

  return result ?? buildCLIArgs('help', [], {})
}
