import { z } from 'zod'
import { OracleError } from '../utils/errors'
import type { LLMConfig } from '../../types'
import type { CallOptions } from './index'

const GeminiGenerateResponse = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      })
    )
    .optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      status: z.string().optional(),
    })
    .optional(),
})

export async function callGemini(
  systemPrompt: string,
  userMessage: string,
  config: LLMConfig,
  options: CallOptions = {}
): Promise<string> {
  const endpoint =
    `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(config.model)}:generateContent` +
    `?key=${encodeURIComponent(config.apiKey)}`

  const response = await fetch(endpoint, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    signal: options.signal,
    body: JSON.stringify({
      system_instruction: {
        parts: [{ text: systemPrompt }],
      },
      contents: [
        {
          role: 'user',
          parts: [{ text: userMessage }],
        },
      ],
      generationConfig: {
        temperature: 0.1,
      },
    }),
  })

  // Error pages are not always JSON
  const body: unknown = await response.json().catch(() => null)
  const parsed = GeminiGenerateResponse.safeParse(body)
  const data = parsed.success ? parsed.data : {}

  if (!response.ok) {
    const apiMsg = data.error?.message ?? response.statusText
    throw new OracleError(`[Gemini ${config.model}] HTTP ${response.status} - ${apiMsg}`)
  }

  const text = data.candidates?.[0]?.content?.parts?.map(p => p.text ?? '').join('').trim()
  if (!text) throw new OracleError(`[Gemini ${config.model}] Empty response`)
  return text
}
