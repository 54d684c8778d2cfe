import { describe, expect, it } from 'vitest'
import { CREATE_ONLY_NOTE, buildDecisionMessage } from '../../../src/lib/llm/prompts'
import type { OracleRequest } from '../../../src/types'

const base: OracleRequest = {
  fieldContext: 'Name of spouse',
  rawName: 'P1_SpouseName_FLD[0]',
  fieldKind: 'text',
  rawNameDescriptive: false,
  candidateLabels: ['spouse_name', 'spouse_first_name'],
  createOnly: false,
}

describe('buildDecisionMessage', () => {
  it('lists the field and its candidates', () => {
    expect(buildDecisionMessage(base).split('\n')).toEqual([
      'Standardize this field:',
      '',
      'Field Name: P1_SpouseName_FLD[0]',
      'Field Type: text',
      'Context: Name of spouse',
      'Field name looks descriptive: no',
      '',
      'Candidate labels (best first):',
      '- spouse_name',
      '- spouse_first_name',
    ])
  })

  it('appends the conflict note', () => {
    const message = buildDecisionMessage({ ...base, conflictNote: 'spouse_name is taken' })
    expect(message.endsWith('\n\nIMPORTANT: spouse_name is taken')).toBe(true)
  })

  it('asks for a new label when the corpus is empty', () => {
    const message = buildDecisionMessage({ ...base, candidateLabels: [], createOnly: true })
    expect(message).toContain(CREATE_ONLY_NOTE)
    expect(message).not.toContain('Candidate labels')
  })

  it('says so when nothing matched', () => {
    const message = buildDecisionMessage({ ...base, candidateLabels: [] })
    expect(message.split('\n').at(-1)).toBe('No candidate labels matched this field.')
  })
})
