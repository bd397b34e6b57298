/**
 * Test Support Module
 *
 * Record factories shared by tests.
 */

import type { Logger } from '../cli/logger'
import type { PatientRecord } from '../types'

/**
 * Create a PatientRecord for testing. Unset fields are missing.
 */
export function createRecord(fields: PatientRecord = {}): PatientRecord {
  return { ...fields }
}

/**
 * The four-record panel set: panel A labelled X, panel B labelled Y.
 */
export function panelRecords(): PatientRecord[] {
  return [
    createRecord({ clinical_panel: 'A', county: 'kisumu', clinician: 'X' }),
    createRecord({ clinical_panel: 'A', county: 'kisumu', clinician: 'X' }),
    createRecord({ clinical_panel: 'B', county: 'kisumu', clinician: 'Y' }),
    createRecord({ clinical_panel: 'B', county: 'kisumu', clinician: 'Y' })
  ]
}

/**
 * Six records where clinical_panel is missing on two. Splitting on the panel
 * separates the classes better than splitting on county.
 */
export function partlyMissingPanelRecords(): PatientRecord[] {
  return [
    createRecord({ clinical_panel: 'b', county: 'k2', clinician: 'Y' }),
    createRecord({ clinical_panel: 'a', county: 'k1', clinician: 'X' }),
    createRecord({ clinical_panel: 'b', county: 'k2', clinician: 'X' }),
    createRecord({ clinical_panel: 'a', county: 'k1', clinician: 'Y' }),
    createRecord({ county: 'k1', clinician: 'X' }),
    createRecord({ county: 'k2', clinician: 'Y' })
  ]
}

/**
 * A Logger that keeps every message instead of printing it.
 */
export function createRecordingLogger(): Logger & { readonly lines: string[] } {
  const lines: string[] = []
  return {
    lines,
    log: (msg) => lines.push(msg),
    verbose: (msg) => lines.push(`[debug] ${msg}`),
    success: (msg) => lines.push(`✓ ${msg}`),
    warn: (msg) => lines.push(`! ${msg}`),
    error: (msg) => lines.push(`✗ ${msg}`)
  }
}
