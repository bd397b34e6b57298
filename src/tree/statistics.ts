/**
 * Attribute Statistics
 *
 * Class histograms, Shannon entropy and gain ratio over a record set.
 * Pure functions, no state.
 */

import {
  type Attribute,
  getAttribute,
  getTarget,
  type PatientRecord,
  type TargetField,
  UNKNOWN_VALUE
} from '../types'

/**
 * Count non-missing target values.
 */
export function classCounts(
  records: readonly PatientRecord[],
  target: TargetField
): Map<string, number> {
  const counts = new Map<string, number>()
  for (const record of records) {
    const value = getTarget(record, target)
    if (value === undefined) continue
    counts.set(value, (counts.get(value) ?? 0) + 1)
  }
  return counts
}

/**
 * Most frequent non-missing target value.
 * Equal counts go to the value that sorts first; no values gives "unknown".
 */
export function majorityClass(records: readonly PatientRecord[], target: TargetField): string {
  let best: string | undefined
  let bestCount = 0
  for (const [value, count] of classCounts(records, target)) {
    if (count > bestCount || (count === bestCount && best !== undefined && value < best)) {
      best = value
      bestCount = count
    }
  }
  return best ?? UNKNOWN_VALUE
}

/**
 * The single target value shared by every record that has one, if any.
 */
export function pureClass(
  records: readonly PatientRecord[],
  target: TargetField
): string | undefined {
  const counts = classCounts(records, target)
  if (counts.size !== 1) return undefined
  const [value] = counts.keys()
  return value
}

/**
 * Shannon entropy (base 2) of a count distribution.
 */
function entropyOfCounts(counts: Iterable<number>): number {
  const values = [...counts]
  const total = values.reduce((sum, c) => sum + c, 0)
  if (total === 0) return 0
  let result = 0
  for (const count of values) {
    if (count === 0) continue
    const p = count / total
    result -= p * Math.log2(p)
  }
  return result
}

/**
 * Entropy of the target distribution.
 * Records with a missing target are left out of both the histogram and the total.
 */
export function entropy(records: readonly PatientRecord[], target: TargetField): number {
  return entropyOfCounts(classCounts(records, target).values())
}

/**
 * Group records by attribute value, in lexicographic key order.
 * Records missing the attribute belong to no partition.
 */
export function partition(
  records: readonly PatientRecord[],
  attribute: Attribute
): Map<string, PatientRecord[]> {
  const groups = new Map<string, PatientRecord[]>()
  for (const record of records) {
    const value = getAttribute(record, attribute)
    if (value === undefined) continue
    const group = groups.get(value) ?? []
    group.push(record)
    groups.set(value, group)
  }
  const keys = [...groups.keys()].sort(compareValues)
  const sorted = new Map<string, PatientRecord[]>()
  for (const key of keys) {
    const group = groups.get(key)
    if (group) sorted.set(key, group)
  }
  return sorted
}

/**
 * Information gain of splitting on `attribute`, normalized by the split's
 * intrinsic information. Returns 0 when the split information is 0.
 *
 * Partition weights divide by the full record count, so records missing the
 * attribute dilute both terms without belonging to any partition.
 */
export function gainRatio(
  records: readonly PatientRecord[],
  attribute: Attribute,
  target: TargetField,
  baseEntropy: number
): number {
  const total = records.length
  if (total === 0) return 0

  let splitInfo = 0
  let infoAttr = 0
  for (const subset of partition(records, attribute).values()) {
    const p = subset.length / total
    splitInfo -= p * Math.log2(p)
    infoAttr += p * entropy(subset, target)
  }
  if (splitInfo === 0) return 0

  return (baseEntropy - infoAttr) / splitInfo
}

/**
 * Code-unit ordering, independent of locale.
 */
export function compareValues(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
