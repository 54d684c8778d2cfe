import { tokenize } from '../labels/tokens'
import type { FormField, RepeatingCue } from '../../types'

const MAX_CUE_INDEX = 50
const MAX_BASE_TOKENS = 8

const FILLER_WORDS = new Set(['number', 'no', 'num', 'nr'])

// "Page 2", "Line 12" number the document, not a repeated record
const STRUCTURE_WORDS = new Set([
  'page', 'part', 'section', 'line', 'item', 'question', 'step', 'box', 'form', 'schedule', 'block',
])

const ORDINAL_WORDS: Record<string, number> = {
  first: 1, second: 2, third: 3, fourth: 4, fifth: 5,
  sixth: 6, seventh: 7, eighth: 8, ninth: 9, tenth: 10,
}

const ORDINAL_SUFFIX = /^([0-9]+)(st|nd|rd|th)$/
const INTEGER = /^[0-9]+$/

// "first name", "first initial"
const ORDINAL_BLOCKERS = new Set(['name', 'initial'])

function ordinalValue(token: string): number | null {
  if (Object.hasOwn(ORDINAL_WORDS, token)) return ORDINAL_WORDS[token]
  const match = ORDINAL_SUFFIX.exec(token)
  return match ? Number(match[1]) : null
}

function findNumbered(tokens: string[]): { position: number; index: number } | null {
  for (let i = 0; i < tokens.length; i++) {
    if (!INTEGER.test(tokens[i])) continue
    const index = Number(tokens[i])
    if (index < 1 || index > MAX_CUE_INDEX) continue

    let j = i - 1
    while (j >= 0 && FILLER_WORDS.has(tokens[j])) j--
    if (j < 0) continue
    const concept = tokens[j]
    if (STRUCTURE_WORDS.has(concept) || INTEGER.test(concept)) continue

    return { position: i, index }
  }
  return null
}

function findOrdinal(tokens: string[]): { position: number; index: number } | null {
  for (let i = 0; i < tokens.length; i++) {
    const index = ordinalValue(tokens[i])
    if (index === null || index < 1 || index > MAX_CUE_INDEX) continue
    const next = tokens[i + 1]
    if (next !== undefined && ORDINAL_BLOCKERS.has(next)) continue
    return { position: i, index }
  }
  return null
}

function baseConcept(tokens: string[], position: number): string {
  const seen = new Set<string>()
  for (const [i, token] of tokens.entries()) {
    if (i === position) continue
    if (FILLER_WORDS.has(token) || STRUCTURE_WORDS.has(token)) continue
    if (INTEGER.test(token) || ordinalValue(token) !== null) continue
    seen.add(token)
    if (seen.size === MAX_BASE_TOKENS) break
  }
  return [...seen].join('_')
}

/**
 * Best-effort detection of a repeated record ("PREVIOUS MARRIAGE number 2
 * WHEN", or "second" under a section heading). Misses are tolerated: the
 * field then resolves like any other.
 */
export function detectRepeatingCue(
  field: Pick<FormField, 'context' | 'sectionHeading'>
): RepeatingCue | null {
  const heading = field.sectionHeading?.trim() ?? ''
  const tokens = tokenize(`${heading} ${field.context}`)
  if (!tokens.length) return null

  const numbered = findNumbered(tokens)
  const ordinal = numbered || !heading ? null : findOrdinal(tokens)
  const hit = numbered ?? ordinal
  if (!hit) return null

  const base = baseConcept(tokens, hit.position)
  if (!base) return null
  return { base, index: hit.index, source: numbered ? 'numbered' : 'ordinal' }
}
