import { z } from 'zod'
import { callLLM } from './index'
import { LABEL_DECISION_PROMPT, buildDecisionMessage } from './prompts'
import { OracleMalformedResponseError } from '../utils/errors'
import { createLogger } from '../utils/logger'
import type { DecisionAction, DecisionOracle, LLMConfig, OracleResponse } from '../../types'

const log = createLogger('oracle')

const ACTION_ALIASES: Record<string, DecisionAction> = {
  keep: 'keep',
  keep_original: 'keep',
  match_existing: 'match_existing',
  use_existing: 'match_existing',
  match: 'match_existing',
  create_new: 'create_new',
  add_new: 'create_new',
  create: 'create_new',
}

const CONFIDENCE_WORDS: Record<string, number> = {
  'very high': 95,
  high: 90,
  medium: 70,
  low: 50,
  'very low': 30,
}
const DEFAULT_CONFIDENCE = 90

const rawDecisionSchema = z.object({
  action: z.string(),
  label: z.string().nullish(),
  standardized_label: z.string().nullish(),
  description: z.string().nullish(),
  confidence: z.union([z.number(), z.string()]).nullish(),
  reasoning: z.string().nullish(),
})

/** Maps "high", "0.85" or 85 onto 0..100. */
export function normalizeConfidence(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined

  let numeric: number
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase()
    if (Object.hasOwn(CONFIDENCE_WORDS, word)) return CONFIDENCE_WORDS[word]
    numeric = Number.parseFloat(word)
    if (Number.isNaN(numeric)) return DEFAULT_CONFIDENCE
  } else {
    numeric = value
  }

  if (!Number.isFinite(numeric)) return DEFAULT_CONFIDENCE
  if (numeric > 0 && numeric < 1) numeric *= 100
  return Math.min(100, Math.max(0, Math.round(numeric)))
}

function parseJsonObject(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    // Models emit regex-like escapes such as "\." inside strings
    const repaired = text.replace(/\\(?!["\\/bfnrtu])/g, '\\\\')
    return JSON.parse(repaired)
  }
}

/**
 * Turns raw model output into an `OracleResponse`. Tolerates code fences,
 * prose around the JSON object and the older key/action spellings.
 */
export function parseOracleResponse(raw: string): OracleResponse {
  const cleaned = raw.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '').trim()
  const match = /\{[\s\S]*\}/.exec(cleaned)
  if (!match) throw new OracleMalformedResponseError('No JSON object in oracle response', raw)

  let json: unknown
  try {
    json = parseJsonObject(match[0])
  } catch (err) {
    throw new OracleMalformedResponseError(
      `Oracle response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      raw
    )
  }

  const parsed = rawDecisionSchema.safeParse(json)
  if (!parsed.success) {
    throw new OracleMalformedResponseError('Oracle response is missing an action', raw)
  }
  const decision = parsed.data

  const actionKey = decision.action.trim().toLowerCase().replace(/[\s-]+/g, '_')
  const action = Object.hasOwn(ACTION_ALIASES, actionKey) ? ACTION_ALIASES[actionKey] : undefined
  if (!action) {
    throw new OracleMalformedResponseError(`Unknown oracle action "${decision.action}"`, raw)
  }

  const label = (decision.label ?? decision.standardized_label ?? '').trim()
  if (!label && action !== 'keep') {
    throw new OracleMalformedResponseError(`Oracle chose ${action} without a label`, raw)
  }

  return {
    action,
    label,
    description: decision.description?.trim() || undefined,
    confidence: normalizeConfidence(decision.confidence),
    reasoning: decision.reasoning ?? undefined,
  }
}

export function createLLMOracle(config: LLMConfig): DecisionOracle {
  return {
    async decide(request, signal) {
      const raw = await callLLM(LABEL_DECISION_PROMPT, buildDecisionMessage(request), config, { signal })
      log.debug('Oracle response', { rawName: request.rawName, snippet: raw.slice(0, 200) })
      return parseOracleResponse(raw)
    },
  }
}
