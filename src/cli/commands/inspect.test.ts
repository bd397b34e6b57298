import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createRecordingLogger } from '../../test-support'
import { parseArgs } from '../args'
import { cmdInspect } from './inspect'

const TRAINING = [
  'County,Clinical Panel,Clinician',
  'Kiambu,Paediatrics,Malaria',
  'Kiambu,Maternal,Pre-eclampsia'
].join('\n')

describe('cmdInspect', () => {
  let tempDir: string
  let configPath: string
  let trainingPath: string

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'ddx-tree-inspect-test-'))
    configPath = join(tempDir, 'config.json')
    trainingPath = join(tempDir, 'train.csv')
    await writeFile(trainingPath, TRAINING)
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('prints the tree for one target', async () => {
    const args = parseArgs(
      ['inspect', trainingPath, '--target', 'clinician', '--config-file', configPath],
      false
    )
    const logger = createRecordingLogger()

    await cmdInspect(args, logger)

    expect(logger.lines).toContain(
      [
        'clinician [majority: Malaria]',
        '  clinical_panel = maternal → Pre-eclampsia',
        '  clinical_panel = paediatrics → Malaria'
      ].join('\n')
    )
    expect(logger.lines).toContain('[debug] clinician: depth 1, 2 leaves')
  })

  it('writes trees as JSON', async () => {
    const jsonPath = join(tempDir, 'trees.json')
    const args = parseArgs(
      ['inspect', trainingPath, '-t', 'clinician', '--json', jsonPath, '--config-file', configPath],
      false
    )

    await cmdInspect(args, createRecordingLogger())

    expect(JSON.parse(await readFile(jsonPath, 'utf-8'))).toEqual({
      clinician: {
        attribute: 'clinical_panel',
        majority: 'Malaria',
        children: {
          maternal: { value: 'Pre-eclampsia' },
          paediatrics: { value: 'Malaria' }
        }
      }
    })
  })

  it('rejects an unknown target', async () => {
    const args = parseArgs(['inspect', trainingPath, '--target', 'doctor'], false)
    await expect(cmdInspect(args, createRecordingLogger())).rejects.toThrow(
      'Unknown target: doctor'
    )
  })
})
