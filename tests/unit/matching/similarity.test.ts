import { describe, expect, it } from 'vitest'
import { LabelCorpus } from '../../../src/lib/corpus/corpus'
import { SimilarityIndex, scoreLabel } from '../../../src/lib/matching/similarity'
import { EmptyCorpusError } from '../../../src/lib/utils/errors'

function corpusOf(...labels: string[]): LabelCorpus {
  return new LabelCorpus(labels.map(label => ({ label, examples: [] })))
}

describe('SimilarityIndex', () => {
  const corpus = corpusOf('spouse_name', 'spouse_first_name', 'first_name', 'date_of_birth', 'spouse_date_of_birth')
  const index = new SimilarityIndex(corpus)

  it('ranks by shared tokens, then coverage, then insertion order', () => {
    expect(index.rank('Spouse first name')).toEqual([
      { label: 'spouse_first_name', score: 4 },
      { label: 'spouse_name', score: 3 },
      { label: 'first_name', score: 3 },
      { label: 'spouse_date_of_birth', score: 1.25 },
    ])
  })

  it('is deterministic for the same corpus and context', () => {
    expect(index.rank('Date of birth of spouse')).toEqual(index.rank('Date of birth of spouse'))
  })

  it('honours topK', () => {
    expect(index.rank('Spouse first name', 2).map(r => r.label)).toEqual(['spouse_first_name', 'spouse_name'])
  })

  it('returns nothing for a context of stop words', () => {
    expect(index.rank('the of and')).toEqual([])
  })

  it('fails on an empty corpus', () => {
    expect(() => new SimilarityIndex(new LabelCorpus()).rank('anything')).toThrow(EmptyCorpusError)
  })
})

describe('scoreLabel', () => {
  it('grows with every additional shared token', () => {
    const one = scoreLabel(new Set(['spouse']), 'spouse_first_name')
    const two = scoreLabel(new Set(['spouse', 'first']), 'spouse_first_name')
    expect(two).toBeGreaterThan(one)
  })

  it('prefers the label the context covers more of', () => {
    const context = new Set(['employer', 'name'])
    expect(scoreLabel(context, 'employer_name')).toBeGreaterThan(scoreLabel(context, 'employer_name_and_address'))
  })

  it('is zero without overlap', () => {
    expect(scoreLabel(new Set(['city']), 'zip_code')).toBe(0)
  })
})
