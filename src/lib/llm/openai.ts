import OpenAI from 'openai'
import { OracleError } from '../utils/errors'
import type { LLMConfig } from '../../types'
import type { CallOptions } from './index'

export async function callOpenAI(
  systemPrompt: string,
  userMessage: string,
  config: LLMConfig,
  options: CallOptions = {}
): Promise<string> {
  const client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 })

  try {
    const response = await client.chat.completions.create(
      {
        model: config.model,
        temperature: 0.1,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
      },
      { signal: options.signal }
    )

    const text = response.choices[0]?.message?.content
    if (!text) throw new OracleError('Empty response from OpenAI')
    return text
  } catch (err) {
    if (err instanceof OpenAI.APIError) {
      throw new OracleError(`[OpenAI ${config.model}] HTTP ${err.status} - ${err.message}`, { cause: err })
    }
    throw err
  }
}
