import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigError } from '../utils/errors'
import type { LLMConfig, LLMProvider } from '../../types'

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  gemini: 'gemini-2.5-flash',
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4o-mini',
}

const PROVIDER_KEY_VARS: Record<LLMProvider, string> = {
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
}

const envSchema = z.object({
  LLM_PROVIDER: z.enum(['gemini', 'anthropic', 'openai']).default('gemini'),
  LLM_MODEL: z.string().trim().min(1).optional(),
  LLM_API_KEY: z.string().trim().min(1).optional(),
  GEMINI_API_KEY: z.string().trim().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().trim().min(1).optional(),
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RESOLVER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  SIMILARITY_TOP_K: z.coerce.number().int().min(5).default(8),
  DOCUMENT_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  LABEL_CORPUS_PATH: z.string().default('3_matching_labels/label_list.json'),
  FIELDS_DIR: z.string().default('2_fields_json'),
  OUTPUT_DIR: z.string().default('4_standardized_output'),
})

export interface AppConfig {
  llm: {
    provider: LLMProvider
    model: string
    apiKey?: string
    timeoutMs: number
  }
  resolver: {
    maxRetries: number
    topK: number
  }
  concurrency: number
  paths: {
    corpus: string
    fieldsDir: string
    outputDir: string
  }
}

/**
 * Parses configuration from the given environment (defaults to `process.env`
 * after loading `.env`). Empty strings count as unset.
 */
export function loadConfig(source?: NodeJS.ProcessEnv): AppConfig {
  if (!source) dotenv.config()
  const raw = source ?? process.env

  const cleaned: Record<string, string> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value
  }

  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${detail}`)
  }

  const env = parsed.data
  const provider = env.LLM_PROVIDER
  const providerKey = {
    gemini: env.GEMINI_API_KEY,
    anthropic: env.ANTHROPIC_API_KEY,
    openai: env.OPENAI_API_KEY,
  }[provider]

  return {
    llm: {
      provider,
      model: env.LLM_MODEL ?? DEFAULT_MODELS[provider],
      apiKey: env.LLM_API_KEY ?? providerKey,
      timeoutMs: env.ORACLE_TIMEOUT_MS,
    },
    resolver: {
      maxRetries: env.RESOLVER_MAX_RETRIES,
      topK: env.SIMILARITY_TOP_K,
    },
    concurrency: env.DOCUMENT_CONCURRENCY,
    paths: {
      corpus: env.LABEL_CORPUS_PATH,
      fieldsDir: env.FIELDS_DIR,
      outputDir: env.OUTPUT_DIR,
    },
  }
}

/** The provider settings, failing when no API key is configured. */
export function requireLLMConfig(config: AppConfig): LLMConfig {
  const { provider, model, apiKey } = config.llm
  if (!apiKey) {
    throw new ConfigError(
      `Missing API key for ${provider}. Set LLM_API_KEY or ${PROVIDER_KEY_VARS[provider]} in .env`
    )
  }
  return { provider, model, apiKey }
}
