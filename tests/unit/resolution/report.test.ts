import { describe, expect, it } from 'vitest'
import { findDuplicateLabels, formatSummary, summarizeResolutions } from '../../../src/lib/resolution/report'
import { UsageTracker } from '../../../src/lib/resolution/usage'
import type { FieldResolution } from '../../../src/types'

describe('findDuplicateLabels', () => {
  it('partitions labels by count', () => {
    expect(findDuplicateLabels(['a_b', 'c_d', 'a_b', 'e_f', 'a_b'])).toEqual({
      unique: ['c_d', 'e_f'],
      duplicated: [{ label: 'a_b', count: 3 }],
    })
  })

  it('counts labels that share a name with object built-ins', () => {
    expect(findDuplicateLabels(['constructor', 'constructor', 'first_name', 'to_string'])).toEqual({
      unique: ['first_name', 'to_string'],
      duplicated: [{ label: 'constructor', count: 2 }],
    })
    expect(findDuplicateLabels(['constructor'])).toEqual({ unique: ['constructor'], duplicated: [] })
  })
})

describe('summarizeResolutions', () => {
  const results: FieldResolution[] = [
    {
      status: 'resolved',
      fieldIndex: 0,
      rawName: 'first_name',
      label: 'first_name',
      action: 'keep',
      candidates: [],
      attempts: 1,
      synthesized: false,
    },
    {
      status: 'resolved',
      fieldIndex: 1,
      rawName: 'Text2',
      label: 'spouse_name',
      action: 'match_existing',
      candidates: ['spouse_name'],
      attempts: 1,
      synthesized: false,
    },
    {
      status: 'resolved',
      fieldIndex: 2,
      rawName: 'Text3',
      label: 'marriage_3_date',
      action: 'create_new',
      candidates: ['marriage_3_date'],
      attempts: 2,
      synthesized: true,
    },
    {
      status: 'failed',
      fieldIndex: 3,
      rawName: 'Text4',
      error: 'Field 3 unresolved after 3 attempt(s): boom',
      candidates: [],
      attempts: 3,
    },
  ]

  it('counts actions and failures', () => {
    const tracker = new UsageTracker()
    tracker.record('first_name', 0)
    tracker.record('spouse_name', 1)
    tracker.record('marriage_3_date', 2)

    const summary = summarizeResolutions('form.pdf', results, tracker)
    expect(summary).toEqual({
      fileName: 'form.pdf',
      totalFields: 4,
      kept: 1,
      matched: 1,
      created: 1,
      failed: 1,
      synthesized: 1,
      uniqueLabels: ['first_name', 'spouse_name', 'marriage_3_date'],
      duplicatedLabels: [],
      newLabels: ['marriage_3_date'],
      failures: [{ fieldIndex: 3, rawName: 'Text4', error: 'Field 3 unresolved after 3 attempt(s): boom' }],
      ok: false,
    })
  })

  it('reports duplicates as data, not errors', () => {
    const tracker = new UsageTracker()
    tracker.record('spouse_name', 0)
    tracker.record('spouse_name', 1)

    const summary = summarizeResolutions('form.pdf', [], tracker)
    expect(summary.duplicatedLabels).toEqual([{ label: 'spouse_name', count: 2 }])
    expect(summary.ok).toBe(false)
  })

  it('is ok with unique labels and no failures', () => {
    const tracker = new UsageTracker()
    tracker.record('first_name', 0)
    expect(summarizeResolutions('form.pdf', results.slice(0, 1), tracker).ok).toBe(true)
  })
})

describe('formatSummary', () => {
  it('renders counts, warnings and failures', () => {
    const tracker = new UsageTracker()
    tracker.record('city', 0)
    tracker.record('city', 1)
    const text = formatSummary(
      summarizeResolutions(
        'form.pdf',
        [
          {
            status: 'failed',
            fieldIndex: 2,
            rawName: 'Text9',
            error: 'timeout',
            candidates: [],
            attempts: 3,
          },
        ],
        tracker
      )
    )

    expect(text.split('\n')).toEqual([
      'form.pdf',
      '  Fields:        1',
      '  Kept:          0',
      '  Matched:       0',
      '  Created:       0',
      '  Failed:        1',
      '  Unique labels: 0',
      '  WARNING duplicate label city (2x)',
      '  FAILED field 2 Text9: timeout',
    ])
  })
})
