export const STOP_WORDS = new Set([
  'a', 'an', 'the', 'of', 'for', 'to', 'and', 'or', 'in', 'on', 'at', 'is', 'are',
  'my', 'your', 'their', 'this', 'that', 'with', 'from', 'by', 'as', 'be',
  'if', 'any', 'please', 'enter',
])

const INTEGER_TOKEN = /^[0-9]+$/

/** Lower-cased free-text tokens without stop words, in order of appearance. */
export function tokenize(input: string): string[] {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .filter(token => !STOP_WORDS.has(token))
}

export function labelTokens(label: string): string[] {
  return label.split('_').filter(Boolean)
}

export function isPositiveIntegerToken(token: string): boolean {
  return INTEGER_TOKEN.test(token) && Number(token) > 0
}

/** True when every token of `subset` occurs in `superset` at least as often. */
export function containsAllTokens(superset: string[], subset: string[]): boolean {
  const counts = new Map<string, number>()
  for (const token of superset) counts.set(token, (counts.get(token) ?? 0) + 1)
  for (const token of subset) {
    const left = counts.get(token) ?? 0
    if (left === 0) return false
    counts.set(token, left - 1)
  }
  return true
}

export function sameTokens(a: string[], b: string[]): boolean {
  return a.length === b.length && containsAllTokens(a, b)
}
