/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/ddx-tree/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or DDX_TREE_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { DEFAULT_TREE_PARAMS, type TreeParams } from '../types'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Maximum tree depth */
  maxDepth?: number | undefined
  /** Minimum partition size to keep splitting */
  minSamplesLeaf?: number | undefined
  /** Minimum gain ratio to accept a split */
  minGainRatio?: number | undefined
  /** Output directory for prediction files */
  outputDir?: string | undefined
  /** Export formats (csv,json) */
  formats?: string[] | undefined
  /** Keep duplicate training records */
  keepDuplicates?: boolean | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/**
 * Thrown for invalid settings or option values.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** Config keys that accept string values */
const STRING_KEYS: ConfigKey[] = ['outputDir']
/** Config keys that accept boolean values */
const BOOLEAN_KEYS: ConfigKey[] = ['keepDuplicates']
/** Config keys that accept number values */
const NUMBER_KEYS: ConfigKey[] = ['maxDepth', 'minSamplesLeaf', 'minGainRatio']
/** Config keys that accept array values */
const ARRAY_KEYS: ConfigKey[] = ['formats']

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  maxDepth: `Maximum tree depth (default: ${DEFAULT_TREE_PARAMS.maxDepth})`,
  minSamplesLeaf: `Minimum records needed to split (default: ${DEFAULT_TREE_PARAMS.minSamplesLeaf})`,
  minGainRatio: `Minimum gain ratio to accept a split (default: ${DEFAULT_TREE_PARAMS.minGainRatio})`,
  outputDir: 'Output directory for predictions (default: ./output)',
  formats: 'Export formats (default: csv,json)',
  keepDuplicates: 'Train on duplicate records too (default: false)'
}

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (BOOLEAN_KEYS.includes(key)) return 'boolean'
  if (NUMBER_KEYS.includes(key)) return 'number'
  if (ARRAY_KEYS.includes(key)) return 'comma-separated'
  return 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get the config file path.
 * Priority: configFile arg > DDX_TREE_CONFIG env var > ~/.config/ddx-tree/config.json
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.DDX_TREE_CONFIG) {
    return process.env.DDX_TREE_CONFIG
  }
  return join(homedir(), '.config', 'ddx-tree', 'config.json')
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

/**
 * Keep the recognised, well-typed settings of a parsed config file.
 */
export function parseConfig(data: unknown): Config {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return {}
  }
  const raw = new Map(Object.entries(data))
  const formats = raw.get('formats')
  const outputDir = raw.get('outputDir')
  const keepDuplicates = raw.get('keepDuplicates')
  const updatedAt = raw.get('updatedAt')

  const config: Config = {}
  const maxDepth = optionalNumber(raw.get('maxDepth'))
  if (maxDepth !== undefined) config.maxDepth = maxDepth
  const minSamplesLeaf = optionalNumber(raw.get('minSamplesLeaf'))
  if (minSamplesLeaf !== undefined) config.minSamplesLeaf = minSamplesLeaf
  const minGainRatio = optionalNumber(raw.get('minGainRatio'))
  if (minGainRatio !== undefined) config.minGainRatio = minGainRatio
  if (typeof outputDir === 'string') config.outputDir = outputDir
  if (Array.isArray(formats)) {
    config.formats = formats.filter((f): f is string => typeof f === 'string')
  }
  if (typeof keepDuplicates === 'boolean') config.keepDuplicates = keepDuplicates
  if (typeof updatedAt === 'string') config.updatedAt = updatedAt
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return parseConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

function parseNumber(key: ConfigKey, value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid number for ${key}: ${value}`)
  }
  return parsed
}

/**
 * Return a copy of `config` with `key` set from its string form.
 *
 * @throws ConfigError if a number key gets a non-numeric value
 */
export function applyConfigValue(config: Config, key: ConfigKey, value: string): Config {
  switch (key) {
    case 'maxDepth':
      return { ...config, maxDepth: parseNumber(key, value) }
    case 'minSamplesLeaf':
      return { ...config, minSamplesLeaf: parseNumber(key, value) }
    case 'minGainRatio':
      return { ...config, minGainRatio: parseNumber(key, value) }
    case 'keepDuplicates':
      return { ...config, keepDuplicates: value === 'true' || value === '1' || value === 'yes' }
    case 'formats':
      return { ...config, formats: value.split(',').map((v) => v.trim()) }
    case 'outputDir':
      return { ...config, outputDir: value }
  }
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(',')
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS, ...ARRAY_KEYS].sort()
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return getValidConfigKeys().some((valid) => valid === key)
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string,
  configFile?: string
): Promise<Config> {
  const config = applyConfigValue((await loadConfig(configFile)) ?? {}, key, value)
  await saveConfig(config, configFile)
  return config
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/** Tree options given on the command line. */
export interface TreeParamOverrides {
  readonly maxDepth?: number | undefined
  readonly minSamplesLeaf?: number | undefined
  readonly minGainRatio?: number | undefined
}

/**
 * Resolve tree parameters: command line > config file > defaults.
 *
 * @throws ConfigError if a value is negative, fractional where a count is
 *   expected, or not a finite number
 */
export function resolveTreeParams(
  overrides: TreeParamOverrides,
  config: Config | null
): TreeParams {
  const params: TreeParams = {
    maxDepth: overrides.maxDepth ?? config?.maxDepth ?? DEFAULT_TREE_PARAMS.maxDepth,
    minSamplesLeaf:
      overrides.minSamplesLeaf ?? config?.minSamplesLeaf ?? DEFAULT_TREE_PARAMS.minSamplesLeaf,
    minGainRatio:
      overrides.minGainRatio ?? config?.minGainRatio ?? DEFAULT_TREE_PARAMS.minGainRatio
  }

  if (!Number.isInteger(params.maxDepth) || params.maxDepth < 0) {
    throw new ConfigError(`maxDepth must be a non-negative integer, got ${params.maxDepth}`)
  }
  if (!Number.isInteger(params.minSamplesLeaf) || params.minSamplesLeaf < 0) {
    throw new ConfigError(
      `minSamplesLeaf must be a non-negative integer, got ${params.minSamplesLeaf}`
    )
  }
  if (!Number.isFinite(params.minGainRatio) || params.minGainRatio < 0) {
    throw new ConfigError(`minGainRatio must be a non-negative number, got ${params.minGainRatio}`)
  }
  return params
}
