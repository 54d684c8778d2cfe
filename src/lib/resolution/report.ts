import { createLogger } from '../utils/logger'
import type { UsageTracker } from './usage'
import type { DuplicatedLabel, FieldResolution, ResolutionSummary } from '../../types'

const log = createLogger('report')

export function partitionCounts(counts: Iterable<[string, number]>): {
  unique: string[]
  duplicated: DuplicatedLabel[]
} {
  const unique: string[] = []
  const duplicated: DuplicatedLabel[] = []
  for (const [label, count] of counts) {
    if (count === 1) unique.push(label)
    else if (count > 1) duplicated.push({ label, count })
  }
  return { unique, duplicated }
}

export function findDuplicateLabels(labels: Iterable<string>): {
  unique: string[]
  duplicated: DuplicatedLabel[]
} {
  const counts = new Map<string, number>()
  for (const label of labels) counts.set(label, (counts.get(label) ?? 0) + 1)
  return partitionCounts(counts)
}

/**
 * Post-run check. Duplicates mean the oracle kept ignoring conflict
 * feedback; they are reported as a warning for review, never thrown.
 */
export function summarizeResolutions(
  fileName: string,
  results: FieldResolution[],
  tracker: UsageTracker
): ResolutionSummary {
  const { unique, duplicated } = partitionCounts(tracker.entries())

  const summary: ResolutionSummary = {
    fileName,
    totalFields: results.length,
    kept: 0,
    matched: 0,
    created: 0,
    failed: 0,
    synthesized: 0,
    uniqueLabels: unique,
    duplicatedLabels: duplicated,
    newLabels: [],
    failures: [],
    ok: false,
  }

  for (const result of results) {
    if (result.status === 'failed') {
      summary.failed++
      summary.failures.push({ fieldIndex: result.fieldIndex, rawName: result.rawName, error: result.error })
      continue
    }
    if (result.synthesized) summary.synthesized++
    if (result.action === 'keep') summary.kept++
    else if (result.action === 'match_existing') summary.matched++
    else {
      summary.created++
      summary.newLabels.push(result.label)
    }
  }

  summary.ok = summary.duplicatedLabels.length === 0 && summary.failed === 0

  if (duplicated.length) {
    log.warn('Duplicate labels remain after resolution', { fileName, duplicated })
  }
  log.info(`Resolved ${fileName}`, {
    kept: summary.kept,
    matched: summary.matched,
    created: summary.created,
    failed: summary.failed,
  })
  return summary
}

export function formatSummary(summary: ResolutionSummary): string {
  const lines = [
    `${summary.fileName}`,
    `  Fields:        ${summary.totalFields}`,
    `  Kept:          ${summary.kept}`,
    `  Matched:       ${summary.matched}`,
    `  Created:       ${summary.created}`,
    `  Failed:        ${summary.failed}`,
    `  Unique labels: ${summary.uniqueLabels.length}`,
  ]
  if (summary.synthesized) lines.push(`  Synthesized:   ${summary.synthesized}`)
  if (summary.newLabels.length) lines.push(`  New labels:    ${summary.newLabels.join(', ')}`)
  for (const dup of summary.duplicatedLabels) {
    lines.push(`  WARNING duplicate label ${dup.label} (${dup.count}x)`)
  }
  for (const failure of summary.failures) {
    lines.push(`  FAILED field ${failure.fieldIndex} ${failure.rawName}: ${failure.error}`)
  }
  return lines.join('\n')
}
