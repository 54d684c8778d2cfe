import Anthropic from '@anthropic-ai/sdk'
import { OracleError } from '../utils/errors'
import type { LLMConfig } from '../../types'
import type { CallOptions } from './index'

export async function callClaude(
  systemPrompt: string,
  userMessage: string,
  config: LLMConfig,
  options: CallOptions = {}
): Promise<string> {
  const client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 })

  try {
    const response = await client.messages.create(
      {
        model: config.model,
        max_tokens: 1024,
        temperature: 0.1,
        system: systemPrompt,
        messages: [{ role: 'user', content: userMessage }],
      },
      { signal: options.signal }
    )

    const block = response.content[0]
    if (!block || block.type !== 'text') throw new OracleError('Unexpected response type from Claude')
    return block.text
  } catch (err) {
    if (err instanceof Anthropic.APIError) {
      throw new OracleError(`[Claude ${config.model}] HTTP ${err.status} - ${err.message}`, { cause: err })
    }
    throw err
  }
}
