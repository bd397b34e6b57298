/**
 * Reader Module
 *
 * CSV content → normalized, deduplicated patient records.
 * File access lives in the CLI; everything here works on strings.
 */

import type { PatientRecord } from '../types'
import { parseRecords } from './csv'
import { dedupeRecords, normalizeRecords } from './normalize'

export { CSV_HEADERS, type ParseRecordsResult, parseRecords, RecordLoadError } from './csv'
export { type DedupeResult, dedupeRecords, normalizeRecords } from './normalize'

export interface PreparedRecords {
  readonly records: PatientRecord[]
  readonly rowCount: number
  readonly duplicateCount: number
  readonly warnings: string[]
}

export interface PrepareOptions {
  /** Keep exact duplicates (prediction input keeps every row) */
  readonly keepDuplicates?: boolean
}

export async function prepareRecords(
  content: string,
  source?: string,
  options: PrepareOptions = {}
): Promise<PreparedRecords> {
  const parsed = await parseRecords(content, source)
  const normalized = normalizeRecords(parsed.records)

  if (options.keepDuplicates) {
    return {
      records: normalized,
      rowCount: parsed.rowCount,
      duplicateCount: 0,
      warnings: parsed.warnings
    }
  }

  const { records, duplicateCount } = dedupeRecords(normalized)
  return { records, rowCount: parsed.rowCount, duplicateCount, warnings: parsed.warnings }
}
