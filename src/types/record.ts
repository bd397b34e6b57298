/**
 * Record Types
 *
 * Patient/context records as produced by the reader, and the closed sets of
 * attribute and target fields the trees work with.
 */

/** Attributes a tree may split on, in evaluation order. */
export const ATTRIBUTES = ['clinical_panel', 'county', 'health_level', 'years_experience'] as const

/** Fields a tree may predict. One tree is built per field. */
export const TARGET_FIELDS = ['clinician', 'gpt4_0', 'llama', 'gemini', 'ddx_snomed'] as const

export type Attribute = (typeof ATTRIBUTES)[number]
export type TargetField = (typeof TARGET_FIELDS)[number]

/** Every field a record can carry. */
export const RECORD_FIELDS = [
  'master_index',
  ...ATTRIBUTES,
  'prompt',
  'nursing_competency',
  ...TARGET_FIELDS
] as const

export type RecordField = (typeof RECORD_FIELDS)[number]

/**
 * One deduplicated, normalized row of input data.
 *
 * Every field is optional; `undefined` means the value is missing.
 * `master_index`, `prompt` and `nursing_competency` are carried through to
 * output files but never used for induction.
 */
export type PatientRecord = { readonly [K in RecordField]?: string | undefined }

export function getAttribute(record: PatientRecord, attribute: Attribute): string | undefined {
  return record[attribute]
}

export function getTarget(record: PatientRecord, target: TargetField): string | undefined {
  return record[target]
}

export function isAttribute(value: string): value is Attribute {
  return ATTRIBUTES.some((attribute) => attribute === value)
}

export function isTargetField(value: string): value is TargetField {
  return TARGET_FIELDS.some((target) => target === value)
}
