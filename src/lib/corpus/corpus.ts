import pLimit from 'p-limit'
import { validateLabelFormat } from '../labels/format'
import { LabelNormalizerError } from '../utils/errors'
import type { LabelEntry } from '../../types'

const MAX_EXAMPLES = 5

export type AppendOutcome = 'appended' | 'exists'

/**
 * Cross-document label vocabulary. Keys keep their insertion order, which is
 * the tie-break order for ranking. Appends go through a single-writer queue
 * shared with persistence, so concurrent documents never race on a key.
 */
export class LabelCorpus {
  private readonly entries = new Map<string, LabelEntry>()
  private readonly appended: string[] = []
  private readonly writer = pLimit(1)

  constructor(entries: Iterable<LabelEntry> = []) {
    for (const entry of entries) {
      if (this.entries.has(entry.label)) continue
      this.insert(entry)
    }
  }

  get size(): number {
    return this.entries.size
  }

  has(label: string): boolean {
    return this.entries.has(label)
  }

  get(label: string): Readonly<LabelEntry> | undefined {
    return this.entries.get(label)
  }

  labels(): string[] {
    return [...this.entries.keys()]
  }

  toEntries(): LabelEntry[] {
    return [...this.entries.values()].map(entry => ({ ...entry, examples: [...entry.examples] }))
  }

  /** Labels appended through `append` since this corpus was constructed. */
  appendedLabels(): string[] {
    return [...this.appended]
  }

  append(entry: LabelEntry): Promise<AppendOutcome> {
    return this.writer(async () => {
      if (this.entries.has(entry.label)) {
        for (const example of entry.examples) this.addExample(entry.label, example)
        return 'exists'
      }
      this.insert(entry)
      this.appended.push(entry.label)
      return 'appended'
    })
  }

  addExample(label: string, context: string): void {
    const entry = this.entries.get(label)
    const example = context.trim()
    if (!entry || !example) return
    if (entry.examples.includes(example) || entry.examples.length >= MAX_EXAMPLES) return
    entry.examples.push(example)
  }

  /** Runs `task` in the writer queue, after every pending append. */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.writer(task)
  }

  private insert(entry: LabelEntry): void {
    const check = validateLabelFormat(entry.label)
    if (!check.valid) {
      throw new LabelNormalizerError(`Invalid corpus label "${entry.label}": ${check.reason}`)
    }
    const stored: LabelEntry = { label: entry.label, examples: [] }
    if (entry.description) stored.description = entry.description
    this.entries.set(entry.label, stored)
    for (const example of entry.examples) this.addExample(entry.label, example)
  }
}
