/**
 * CSV Record Reader
 *
 * Parses the headered training/prediction CSV into patient records.
 * Unknown columns are ignored; missing columns and empty cells become
 * missing values.
 */

import { parse } from 'csv-parse'
import type { PatientRecord, RecordField } from '../types'

/** Source CSV header → record field. */
export const CSV_HEADERS: Readonly<Record<string, RecordField>> = {
  Master_Index: 'master_index',
  County: 'county',
  'Health level': 'health_level',
  'Years of Experience': 'years_experience',
  Prompt: 'prompt',
  'Nursing Competency': 'nursing_competency',
  'Clinical Panel': 'clinical_panel',
  Clinician: 'clinician',
  'GPT4.0': 'gpt4_0',
  LLAMA: 'llama',
  GEMINI: 'gemini',
  'DDX SNOMED': 'ddx_snomed'
}

type MutableRecord = { -readonly [K in RecordField]?: string }

export interface ParseRecordsResult {
  readonly records: PatientRecord[]
  /** Data rows read, including ones that produced warnings */
  readonly rowCount: number
  readonly warnings: string[]
}

export class RecordLoadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RecordLoadError'
  }
}

function toRecord(row: unknown): PatientRecord | null {
  if (typeof row !== 'object' || row === null || Array.isArray(row)) return null
  const record: MutableRecord = {}
  for (const [header, value] of Object.entries(row)) {
    const key = header.trim()
    const field = Object.hasOwn(CSV_HEADERS, key) ? CSV_HEADERS[key] : undefined
    if (!field || typeof value !== 'string' || value === '') continue
    record[field] = value
  }
  return record
}

function readRows(content: string, source: string, warnings: string[]): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const parser = parse(
      content,
      {
        columns: true,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_records_with_error: true
      },
      (error: Error | undefined, rows: unknown) => {
        if (error) {
          reject(new RecordLoadError(`Could not parse ${source}: ${error.message}`))
          return
        }
        resolve(rows)
      }
    )
    // Emitted for each row dropped under skip_records_with_error
    parser.on('skip', (error: unknown) => {
      const reason = error instanceof Error ? error.message : 'unreadable row'
      warnings.push(`Skipped malformed row in ${source}: ${reason}`)
    })
  })
}

/**
 * Parse CSV content into records.
 *
 * Malformed rows are skipped with a warning. Rejects with RecordLoadError when
 * the content cannot be parsed or yields no records.
 */
export async function parseRecords(
  content: string,
  source = 'input'
): Promise<ParseRecordsResult> {
  const warnings: string[] = []
  const rows = await readRows(content, source, warnings)

  const list: unknown[] = Array.isArray(rows) ? rows : []
  const records: PatientRecord[] = []
  for (const row of list) {
    const record = toRecord(row)
    if (!record) continue
    if (record.clinician === undefined && record.gpt4_0 === undefined) {
      warnings.push(
        `Record ${records.length + 1} in ${source} is missing both Clinician and GPT4.0`
      )
    }
    records.push(record)
  }

  if (records.length === 0) {
    throw new RecordLoadError(`No valid records in ${source}`)
  }

  return { records, rowCount: list.length, warnings }
}
