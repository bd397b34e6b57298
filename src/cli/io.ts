/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { type PrepareOptions, type PreparedRecords, prepareRecords, RecordLoadError } from '../reader'

/**
 * Read a CSV file and turn it into prepared records.
 *
 * @throws RecordLoadError if the file cannot be read or holds no records
 */
export async function loadRecords(
  path: string,
  options: PrepareOptions = {}
): Promise<PreparedRecords> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw new RecordLoadError(`Could not read ${path}: ${msg}`)
  }
  return prepareRecords(content, path, options)
}

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Write JSON output to stdout, or to a file (creating its directory).
 * Returns the file path written, or undefined for stdout.
 */
export async function writeJsonOutput(
  target: string,
  data: string
): Promise<string | undefined> {
  if (target === 'stdout') {
    console.log(data)
    return undefined
  }
  await ensureDir(dirname(target))
  await writeFile(target, data)
  return target
}
