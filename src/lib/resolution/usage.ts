export interface LabelUsage {
  used: boolean
  count: number
}

export interface LabelAssignment {
  fieldIndex?: number
  label: string
}

/**
 * Ledger of labels assigned within one document run. It records whatever it
 * is given; keeping counts at 1 is the resolver's job.
 */
export class UsageTracker {
  private readonly counts = new Map<string, number>()
  private readonly sequence: LabelAssignment[] = []

  isUsed(label: string): LabelUsage {
    const count = this.counts.get(label) ?? 0
    return { used: count > 0, count }
  }

  record(label: string, fieldIndex?: number): void {
    this.counts.set(label, (this.counts.get(label) ?? 0) + 1)
    this.sequence.push(fieldIndex === undefined ? { label } : { fieldIndex, label })
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counts)
  }

  entries(): Array<[string, number]> {
    return [...this.counts]
  }

  assignments(): readonly LabelAssignment[] {
    return [...this.sequence]
  }

  get size(): number {
    return this.counts.size
  }
}
