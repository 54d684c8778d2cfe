import { autoFixLabel, humanizeRawName, isDescriptiveName, validateLabelFormat } from '../labels/format'
import { detectRepeatingCue } from '../matching/cues'
import { DEFAULT_TOP_K, SimilarityIndex } from '../matching/similarity'
import { VariationResolver } from '../matching/variations'
import { createLogger } from '../utils/logger'
import {
  EmptyCorpusError,
  FieldResolutionFailedError,
  OracleMalformedResponseError,
  OracleTimeoutError,
  UniquenessConflictError,
  toErrorMessage,
} from '../utils/errors'
import { summarizeResolutions } from './report'
import { UsageTracker } from './usage'
import type { LabelCorpus } from '../corpus/corpus'
import type {
  Decision,
  DecisionAction,
  DecisionOracle,
  DocumentResolution,
  FieldDocument,
  FieldResolution,
  FormField,
  OracleRequest,
  OracleResponse,
  RepeatingCue,
  ResolutionState,
} from '../../types'

export const DEFAULT_MAX_RETRIES = 2
const MIN_TOP_K = 5

const log = createLogger('resolver')

export interface ResolverOptions {
  /** Oracle re-queries after the first attempt. Finite by construction. */
  maxRetries?: number
  topK?: number
  /** Per-call deadline for the oracle; unset means no deadline. */
  oracleTimeoutMs?: number
}

interface RunState {
  tracker: UsageTracker
  /** Set when the corpus had nothing to match against */
  createOnly: boolean
}

interface Conflict {
  label: string
  count: number
  suggestion: string
}

function conflictNote(conflict: Conflict): string {
  return (
    `The label "${conflict.label}" is already assigned to another field in this document ` +
    `(${conflict.count}x) and must not be reused. Choose a different existing label or create ` +
    `a new one; "${conflict.suggestion}" is still free.`
  )
}

/**
 * Resolves each field of a document to a label that no other field of the
 * same document has, whatever the oracle proposes.
 */
export class LabelResolver {
  private readonly similarity: SimilarityIndex
  private readonly variations: VariationResolver
  private readonly maxRetries: number
  private readonly topK: number
  private readonly oracleTimeoutMs?: number

  constructor(
    private readonly corpus: LabelCorpus,
    private readonly oracle: DecisionOracle,
    options: ResolverOptions = {}
  ) {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`)
    }
    this.maxRetries = maxRetries
    this.topK = Math.max(MIN_TOP_K, options.topK ?? DEFAULT_TOP_K)
    this.oracleTimeoutMs = options.oracleTimeoutMs
    this.similarity = new SimilarityIndex(corpus)
    this.variations = new VariationResolver(corpus)
  }

  /** Fields are resolved one at a time in extraction order. */
  async resolveDocument(document: FieldDocument): Promise<DocumentResolution> {
    const run: RunState = { tracker: new UsageTracker(), createOnly: this.corpus.size === 0 }
    if (run.createOnly) {
      log.warn('Label corpus is empty; every field will create a new label', { fileName: document.fileName })
    }

    const fields = [...document.fields].sort((a, b) => a.index - b.index)
    const results: FieldResolution[] = []
    for (const field of fields) {
      try {
        results.push(await this.resolveWithin(field, run))
      } catch (err) {
        log.error('Unexpected error while resolving field', { field: field.index, error: toErrorMessage(err) })
        results.push({
          status: 'failed',
          fieldIndex: field.index,
          rawName: field.rawName,
          error: toErrorMessage(err),
          candidates: [],
          attempts: 0,
        })
      }
    }

    return {
      fileName: document.fileName,
      results,
      summary: summarizeResolutions(document.fileName, results, run.tracker),
    }
  }

  resolveField(field: FormField, tracker: UsageTracker = new UsageTracker()): Promise<FieldResolution> {
    return this.resolveWithin(field, { tracker, createOnly: this.corpus.size === 0 })
  }

  private async resolveWithin(field: FormField, run: RunState): Promise<FieldResolution> {
    const attemptsAllowed = this.maxRetries + 1
    const context = field.context.trim() || humanizeRawName(field.rawName)

    let state: ResolutionState = 'analyzing'
    const transition = (next: ResolutionState) => {
      log.debug(`Field ${field.index}: ${state} → ${next}`)
      state = next
    }

    const cue = detectRepeatingCue(field)
    if (cue) log.debug('Repeating-structure cue', { field: field.index, ...cue })

    const excluded = new Set<string>()
    const synthesized = new Set<string>()
    let conflict: Conflict | undefined
    let candidates: string[] = []
    let lastError: unknown

    for (let attempt = 1; attempt <= attemptsAllowed; attempt++) {
      candidates = this.gatherCandidates(context, cue, excluded, synthesized, run, conflict?.suggestion)
      transition('candidates_gathered')

      const request: OracleRequest = {
        fieldContext: context,
        rawName: field.rawName,
        fieldKind: field.kind,
        rawNameDescriptive: isDescriptiveName(field.rawName),
        candidateLabels: candidates,
        createOnly: run.createOnly,
      }
      if (conflict) request.conflictNote = conflictNote(conflict)

      transition('oracle_queried')
      let decision: Decision
      try {
        decision = this.normalize(await this.queryOracle(request), field, run)
      } catch (err) {
        lastError = err
        log.warn('Oracle attempt rejected', { field: field.index, attempt, error: toErrorMessage(err) })
        continue
      }

      const usage = run.tracker.isUsed(decision.label)
      if (usage.used) {
        excluded.add(decision.label)
        const suggestion = this.suggestAfterConflict(decision, field, run.tracker)
        if (!this.corpus.has(suggestion)) synthesized.add(suggestion)
        conflict = { label: decision.label, count: usage.count, suggestion }
        lastError = new UniquenessConflictError(decision.label, usage.count)
        log.warn('Uniqueness conflict, re-querying', {
          field: field.index,
          attempt,
          label: decision.label,
          suggestion,
        })
        continue
      }

      transition('validated')
      const committed = await this.commit(field, decision, context, run)
      transition('committed')
      log.info('Field resolved', {
        field: field.index,
        rawName: field.rawName,
        action: committed.action,
        label: committed.label,
        attempts: attempt,
      })

      return {
        status: 'resolved',
        fieldIndex: field.index,
        rawName: field.rawName,
        label: committed.label,
        action: committed.action,
        description: committed.action === 'create_new' ? committed.description : undefined,
        candidates,
        attempts: attempt,
        synthesized: synthesized.has(committed.label),
      }
    }

    const failure = new FieldResolutionFailedError(field.index, attemptsAllowed, { cause: lastError })
    log.error(failure.message, { rawName: field.rawName })
    return {
      status: 'failed',
      fieldIndex: field.index,
      rawName: field.rawName,
      error: failure.message,
      candidates,
      attempts: attemptsAllowed,
    }
  }

  /**
   * A kept raw name may be an XFA path, so its suggestion is derived from
   * the humanized name instead.
   */
  private suggestAfterConflict(decision: Decision, field: FormField, tracker: UsageTracker): string {
    const isUsed = (label: string) => tracker.isUsed(label).used
    if (decision.action !== 'keep') return this.variations.nextFreeLabel(decision.label, isUsed)

    const base = autoFixLabel(humanizeRawName(field.rawName), { checkbox: field.kind === 'checkbox' })
    if (!validateLabelFormat(base).valid) return this.variations.nextFreeLabel(decision.label, isUsed)
    return isUsed(base) ? this.variations.nextFreeLabel(base, isUsed) : base
  }

  /**
   * Conflict suggestion first, then numbered variations when a cue fired,
   * then similarity ranking. Excluded labels never reappear.
   */
  private gatherCandidates(
    context: string,
    cue: RepeatingCue | null,
    excluded: Set<string>,
    synthesized: Set<string>,
    run: RunState,
    suggestion?: string
  ): string[] {
    const ordered: string[] = []
    const push = (label: string) => {
      if (!excluded.has(label) && !ordered.includes(label)) ordered.push(label)
    }

    if (suggestion) push(suggestion)
    if (run.createOnly) return ordered

    if (cue) {
      const lookup = this.variations.findVariations(cue.base, cue.index)
      if (lookup.proposed) {
        push(lookup.proposed.label)
        if (lookup.proposed.synthesized) synthesized.add(lookup.proposed.label)
      }
      for (const variation of lookup.variations.slice(0, this.topK)) push(variation.label)
    }

    try {
      for (const ranked of this.similarity.rank(context, this.topK)) push(ranked.label)
    } catch (err) {
      if (!(err instanceof EmptyCorpusError)) throw err
      log.warn('Label corpus is empty; switching to create-only')
      run.createOnly = true
    }
    return ordered
  }

  private async queryOracle(request: OracleRequest): Promise<OracleResponse> {
    const timeoutMs = this.oracleTimeoutMs
    if (!timeoutMs) return this.oracle.decide(request)

    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle before aborting so the race reports the timeout, not the abort
        reject(new OracleTimeoutError(timeoutMs))
        controller.abort()
      }, timeoutMs)
    })

    try {
      return await Promise.race([this.oracle.decide(request, controller.signal), deadline])
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Maps an oracle response onto a committable decision. KEEP keeps the raw
   * name; other labels are snake-cased and must pass format validation. A
   * CREATE_NEW of a known label degrades to MATCH_EXISTING and vice versa.
   */
  private normalize(response: OracleResponse, field: FormField, run: RunState): Decision {
    if (response.action === 'keep' && !run.createOnly) {
      const label = field.rawName.trim()
      if (!label) throw new OracleMalformedResponseError('KEEP proposed for a field without a name')
      return { action: 'keep', label }
    }

    const source = response.action === 'keep' ? field.rawName : response.label
    const label = autoFixLabel(source, { checkbox: field.kind === 'checkbox' })
    const check = validateLabelFormat(label)
    if (!check.valid) {
      throw new OracleMalformedResponseError(`Unusable label "${source}": ${check.reason}`)
    }

    let action: DecisionAction = run.createOnly ? 'create_new' : response.action
    if (action === 'match_existing' && !this.corpus.has(label)) action = 'create_new'
    if (action === 'create_new' && this.corpus.has(label)) action = 'match_existing'

    return action === 'create_new'
      ? { action, label, description: response.description }
      : { action: 'match_existing', label }
  }

  private async commit(field: FormField, decision: Decision, context: string, run: RunState): Promise<Decision> {
    run.tracker.record(decision.label, field.index)

    if (decision.action === 'create_new') {
      const outcome = await this.corpus.append({
        label: decision.label,
        description: decision.description,
        examples: [context],
      })
      // Another document appended the same key first
      if (outcome === 'exists') return { action: 'match_existing', label: decision.label }
    } else if (decision.action === 'match_existing') {
      this.corpus.addExample(decision.label, context)
    }
    return decision
  }
}
