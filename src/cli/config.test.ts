/**
 * Tests for CLI Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  applyConfigValue,
  ConfigError,
  formatConfigValue,
  getConfigPath,
  getConfigType,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfig,
  resolveTreeParams,
  saveConfig,
  setConfigValue,
  unsetConfigValue
} from './config'

describe('config', () => {
  let tempDir: string
  let configPath: string
  let originalEnv: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'ddx-tree-config-test-'))
    configPath = join(tempDir, 'config.json')
    originalEnv = process.env.DDX_TREE_CONFIG
    delete process.env.DDX_TREE_CONFIG
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
    if (originalEnv !== undefined) {
      process.env.DDX_TREE_CONFIG = originalEnv
    } else {
      delete process.env.DDX_TREE_CONFIG
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json')).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      process.env.DDX_TREE_CONFIG = '/env/config.json'
      expect(getConfigPath()).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      expect(getConfigPath()).toContain(join('.config', 'ddx-tree', 'config.json'))
    })

    it('explicit path takes precedence over env var', () => {
      process.env.DDX_TREE_CONFIG = '/env/config.json'
      expect(getConfigPath('/explicit/config.json')).toBe('/explicit/config.json')
    })
  })

  describe('loadConfig', () => {
    it('returns null for non-existent file', async () => {
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ maxDepth: 2, formats: ['csv'] }))
      expect(await loadConfig(configPath)).toEqual({ maxDepth: 2, formats: ['csv'] })
    })

    it('returns null for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')
      expect(await loadConfig(configPath)).toBeNull()
    })
  })

  describe('parseConfig', () => {
    it('drops unknown keys and values of the wrong type', () => {
      expect(
        parseConfig({
          maxDepth: '3',
          minGainRatio: 0.2,
          outputDir: 42,
          formats: ['csv', 7],
          keepDuplicates: true,
          homeCountry: 'Kenya'
        })
      ).toEqual({ minGainRatio: 0.2, formats: ['csv'], keepDuplicates: true })
    })

    it('returns an empty config for non-objects', () => {
      expect(parseConfig([1, 2])).toEqual({})
      expect(parseConfig(null)).toEqual({})
    })
  })

  describe('saveConfig', () => {
    it('writes the config with an updatedAt timestamp', async () => {
      await saveConfig({ minSamplesLeaf: 3 }, join(tempDir, 'nested', 'config.json'))
      const content = await readFile(join(tempDir, 'nested', 'config.json'), 'utf-8')
      const saved = JSON.parse(content)
      expect(saved.minSamplesLeaf).toBe(3)
      expect(typeof saved.updatedAt).toBe('string')
    })
  })

  describe('applyConfigValue', () => {
    it('parses values by key type', () => {
      expect(applyConfigValue({}, 'maxDepth', '3')).toEqual({ maxDepth: 3 })
      expect(applyConfigValue({}, 'minGainRatio', '0.25')).toEqual({ minGainRatio: 0.25 })
      expect(applyConfigValue({}, 'keepDuplicates', 'yes')).toEqual({ keepDuplicates: true })
      expect(applyConfigValue({}, 'formats', 'csv, json')).toEqual({ formats: ['csv', 'json'] })
      expect(applyConfigValue({}, 'outputDir', './out')).toEqual({ outputDir: './out' })
    })

    it('keeps the other settings', () => {
      expect(applyConfigValue({ maxDepth: 2 }, 'minSamplesLeaf', '4')).toEqual({
        maxDepth: 2,
        minSamplesLeaf: 4
      })
    })

    it('rejects non-numeric values for number keys', () => {
      expect(() => applyConfigValue({}, 'maxDepth', 'deep')).toThrow(ConfigError)
      expect(() => applyConfigValue({}, 'maxDepth', ' ')).toThrow('Invalid number for maxDepth')
    })
  })

  describe('setConfigValue / unsetConfigValue', () => {
    it('sets and removes a value', async () => {
      await setConfigValue('maxDepth', '2', configPath)
      expect((await loadConfig(configPath))?.maxDepth).toBe(2)

      await unsetConfigValue('maxDepth', configPath)
      expect((await loadConfig(configPath))?.maxDepth).toBeUndefined()
    })

    it('returns the saved config', async () => {
      const config = await setConfigValue('formats', 'json', configPath)
      expect(config.formats).toEqual(['json'])
    })
  })

  describe('keys', () => {
    it('lists keys alphabetically', () => {
      expect(getValidConfigKeys()).toEqual([
        'formats',
        'keepDuplicates',
        'maxDepth',
        'minGainRatio',
        'minSamplesLeaf',
        'outputDir'
      ])
    })

    it('validates keys', () => {
      expect(isValidConfigKey('maxDepth')).toBe(true)
      expect(isValidConfigKey('updatedAt')).toBe(false)
      expect(isValidConfigKey('depth')).toBe(false)
    })

    it('reports key types', () => {
      expect(getConfigType('maxDepth')).toBe('number')
      expect(getConfigType('keepDuplicates')).toBe('boolean')
      expect(getConfigType('formats')).toBe('comma-separated')
      expect(getConfigType('outputDir')).toBe('string')
    })
  })

  describe('formatConfigValue', () => {
    it('formats arrays, booleans and numbers', () => {
      expect(formatConfigValue(['csv', 'json'])).toBe('csv,json')
      expect(formatConfigValue(false)).toBe('false')
      expect(formatConfigValue(0.5)).toBe('0.5')
    })
  })

  describe('resolveTreeParams', () => {
    it('uses defaults when nothing is set', () => {
      expect(resolveTreeParams({}, null)).toEqual({
        maxDepth: 4,
        minSamplesLeaf: 1,
        minGainRatio: 0
      })
    })

    it('prefers command line over config file', () => {
      expect(
        resolveTreeParams(
          { maxDepth: 1 },
          { maxDepth: 3, minSamplesLeaf: 5, minGainRatio: 0.1 }
        )
      ).toEqual({ maxDepth: 1, minSamplesLeaf: 5, minGainRatio: 0.1 })
    })

    it('accepts zero for every parameter', () => {
      expect(resolveTreeParams({ maxDepth: 0, minSamplesLeaf: 0, minGainRatio: 0 }, null)).toEqual({
        maxDepth: 0,
        minSamplesLeaf: 0,
        minGainRatio: 0
      })
    })

    it('rejects negative or fractional depth', () => {
      expect(() => resolveTreeParams({ maxDepth: -1 }, null)).toThrow(ConfigError)
      expect(() => resolveTreeParams({ maxDepth: 1.5 }, null)).toThrow(
        'maxDepth must be a non-negative integer, got 1.5'
      )
    })

    it('rejects NaN values', () => {
      expect(() => resolveTreeParams({ minSamplesLeaf: Number.NaN }, null)).toThrow(ConfigError)
      expect(() => resolveTreeParams({ minGainRatio: Number.NaN }, null)).toThrow(
        'minGainRatio must be a non-negative number, got NaN'
      )
    })
  })
})
