import { containsAllTokens, isPositiveIntegerToken, labelTokens, sameTokens } from '../labels/tokens'
import type { LabelCorpus } from '../corpus/corpus'
import type { LabelVariation, ProposedVariation, VariationLookup } from '../../types'

function integerPositions(tokens: string[]): number[] {
  const positions: number[] = []
  tokens.forEach((token, i) => {
    if (isPositiveIntegerToken(token)) positions.push(i)
  })
  return positions
}

function conceptTokens(label: string): string[] {
  return labelTokens(label).filter(token => !isPositiveIntegerToken(token))
}

function withIndex(tokens: string[], position: number, index: number): string {
  const copy = [...tokens]
  copy[position] = String(index)
  return copy.join('_')
}

function parseVariation(label: string, baseTokens: string[]): LabelVariation | null {
  const tokens = labelTokens(label)
  const positions = integerPositions(tokens)
  if (positions.length !== 1) return null

  const position = positions[0]
  const rest = tokens.filter((_, i) => i !== position)
  if (!containsAllTokens(rest, baseTokens)) return null

  return {
    label,
    index: Number(tokens[position]),
    position,
    stripped: rest.join('_'),
    exact: sameTokens(rest, baseTokens),
  }
}

/** Lowest-index exact variation, else the one with the fewest tokens. */
function chooseTemplate(variations: LabelVariation[]): LabelVariation {
  const exact = variations.find(v => v.exact)
  if (exact) return exact
  return variations.reduce((best, v) =>
    labelTokens(v.label).length < labelTokens(best.label).length ? v : best
  )
}

export class VariationResolver {
  constructor(private readonly corpus: LabelCorpus) {}

  /**
   * Corpus labels that are the base concept plus one positive integer, e.g.
   * `previous_marriage_2_when` for `previous_marriage_when`. With
   * `requestedIndex`, also proposes the label for that occurrence, taken from
   * the corpus or synthesized from the template variation. Never mutates the
   * corpus.
   */
  findVariations(baseLabel: string, requestedIndex?: number): VariationLookup {
    const baseTokens = conceptTokens(baseLabel)
    const base = baseTokens.join('_')
    if (!baseTokens.length) return { base, variations: [], labels: new Set() }

    const variations = this.corpus
      .labels()
      .map(label => parseVariation(label, baseTokens))
      .filter((v): v is LabelVariation => v !== null)
      .sort((a, b) => a.index - b.index)

    const lookup: VariationLookup = {
      base,
      variations,
      labels: new Set(variations.map(v => v.label)),
    }
    if (requestedIndex === undefined || requestedIndex < 1 || !variations.length) return lookup

    const template = chooseTemplate(variations)
    const existing = variations.find(
      v => v.index === requestedIndex && v.stripped === template.stripped && v.position === template.position
    )
    const proposed: ProposedVariation = existing
      ? { label: existing.label, index: requestedIndex, synthesized: false }
      : {
          label: withIndex(labelTokens(template.label), template.position, requestedIndex),
          index: requestedIndex,
          synthesized: true,
        }
    return { ...lookup, proposed }
  }

  /**
   * The first numbered form of `label` not yet in use. Indexed labels
   * search from 1; an unindexed label counts as occurrence 1, so from 2.
   */
  nextFreeLabel(label: string, isUsed: (candidate: string) => boolean): string {
    const tokens = labelTokens(label)
    const positions = integerPositions(tokens)

    let template: string[]
    let position: number
    let start: number

    if (positions.length === 1) {
      template = tokens
      position = positions[0]
      start = 1
    } else {
      const exact = positions.length === 0
        ? this.findVariations(label).variations.find(v => v.exact)
        : undefined
      if (exact) {
        template = labelTokens(exact.label)
        position = exact.position
      } else {
        template = [...tokens, '']
        position = tokens.length
      }
      start = 2
    }

    for (let n = start; ; n++) {
      const candidate = withIndex(template, position, n)
      if (candidate !== label && !isUsed(candidate)) return candidate
    }
  }
}
