import type { LLMConfig } from '../../types'
import { callClaude } from './claude'
import { callGemini } from './gemini'
import { callOpenAI } from './openai'

export interface CallOptions {
  signal?: AbortSignal
}

export async function callLLM(
  systemPrompt: string,
  userMessage: string,
  config: LLMConfig,
  options: CallOptions = {}
): Promise<string> {
  if (config.provider === 'anthropic') {
    return callClaude(systemPrompt, userMessage, config, options)
  }
  if (config.provider === 'openai') {
    return callOpenAI(systemPrompt, userMessage, config, options)
  }
  return callGemini(systemPrompt, userMessage, config, options)
}
