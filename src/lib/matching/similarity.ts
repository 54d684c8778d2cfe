import { labelTokens, tokenize } from '../labels/tokens'
import { EmptyCorpusError } from '../utils/errors'
import type { LabelCorpus } from '../corpus/corpus'
import type { RankedLabel } from '../../types'

export const DEFAULT_TOP_K = 8

/**
 * `shared + shared / labelTokenCount`. The coverage term stays in [0, 1], so
 * any label sharing more context tokens scores strictly higher.
 */
export function scoreLabel(contextTokens: Set<string>, label: string): number {
  const tokens = labelTokens(label)
  if (!tokens.length) return 0
  const distinct = new Set(tokens)
  let shared = 0
  for (const token of contextTokens) {
    if (distinct.has(token)) shared++
  }
  if (shared === 0) return 0
  return shared + shared / tokens.length
}

export class SimilarityIndex {
  constructor(private readonly corpus: LabelCorpus) {}

  /**
   * Labels sharing at least one token with `context`, best first. Equal
   * scores keep corpus insertion order.
   */
  rank(context: string, topK = DEFAULT_TOP_K): RankedLabel[] {
    if (this.corpus.size === 0) throw new EmptyCorpusError()

    const contextTokens = new Set(tokenize(context))
    if (!contextTokens.size || topK <= 0) return []

    const ranked: RankedLabel[] = []
    for (const label of this.corpus.labels()) {
      const score = scoreLabel(contextTokens, label)
      if (score > 0) ranked.push({ label, score })
    }

    // Array.prototype.sort is stable, so insertion order breaks ties
    return ranked.sort((a, b) => b.score - a.score).slice(0, topK)
  }
}
