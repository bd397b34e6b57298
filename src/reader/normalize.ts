/**
 * Record Normalization
 *
 * Whitespace cleanup, attribute lowercasing and exact-duplicate removal.
 */

import { ATTRIBUTES, type PatientRecord, RECORD_FIELDS, type RecordField, TARGET_FIELDS } from '../types'

const ATTRIBUTE_SET = new Set<RecordField>(ATTRIBUTES)

function cleanValue(value: string | undefined, lowercase: boolean): string | undefined {
  if (value === undefined) return undefined
  const cleaned = value.replace(/\s+/g, ' ').trim()
  if (cleaned === '') return undefined
  return lowercase ? cleaned.toLowerCase() : cleaned
}

/**
 * Collapse internal whitespace in every field and lowercase attribute values.
 * Target values keep their case. Returns new record objects.
 */
export function normalizeRecords(records: readonly PatientRecord[]): PatientRecord[] {
  return records.map((record) => {
    const normalized: { -readonly [K in RecordField]?: string } = {}
    for (const field of RECORD_FIELDS) {
      const value = cleanValue(record[field], ATTRIBUTE_SET.has(field))
      if (value !== undefined) normalized[field] = value
    }
    return normalized
  })
}

function dedupeKey(record: PatientRecord): string {
  return JSON.stringify([...ATTRIBUTES, ...TARGET_FIELDS].map((field) => record[field] ?? null))
}

export interface DedupeResult {
  readonly records: PatientRecord[]
  readonly duplicateCount: number
}

/**
 * Drop records whose attribute and target values repeat an earlier record.
 * The first occurrence is kept.
 */
export function dedupeRecords(records: readonly PatientRecord[]): DedupeResult {
  const seen = new Set<string>()
  const unique: PatientRecord[] = []
  for (const record of records) {
    const key = dedupeKey(record)
    if (seen.has(key)) continue
    seen.add(key)
    unique.push(record)
  }
  return { records: unique, duplicateCount: records.length - unique.length }
}
