import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { callGemini } from '../../../src/lib/llm/gemini'
import { OracleError } from '../../../src/lib/utils/errors'

const config = { provider: 'gemini' as const, apiKey: 'test-secret', model: 'gemini-2.5-flash' }

function makeFetchResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

describe('callGemini', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns text from candidates[0].content.parts', async () => {
    fetchMock.mockResolvedValueOnce(
      makeFetchResponse({
        candidates: [{ content: { parts: [{ text: 'Hello world' }] } }],
      })
    )
    await expect(callGemini('sys', 'user msg', config)).resolves.toBe('Hello world')
  })

  it('joins multiple parts into a single string', async () => {
    fetchMock.mockResolvedValueOnce(
      makeFetchResponse({
        candidates: [{ content: { parts: [{ text: 'Part one ' }, { text: 'part two' }] } }],
      })
    )
    await expect(callGemini('sys', 'user msg', config)).resolves.toBe('Part one part two')
  })

  it('throws the API message on a non-ok response', async () => {
    fetchMock.mockResolvedValueOnce(makeFetchResponse({ error: { code: 400, message: 'API key not valid' } }, 400))
    await expect(callGemini('sys', 'user msg', config)).rejects.toThrow(
      '[Gemini gemini-2.5-flash] HTTP 400 - API key not valid'
    )
  })

  it('throws OracleError on a non-JSON error page', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>Bad gateway</html>', { status: 502 }))
    await expect(callGemini('sys', 'user msg', config)).rejects.toBeInstanceOf(OracleError)
  })

  it('throws when candidates are empty or blank', async () => {
    fetchMock.mockResolvedValueOnce(makeFetchResponse({ candidates: [] }))
    await expect(callGemini('sys', 'user msg', config)).rejects.toThrow('[Gemini gemini-2.5-flash] Empty response')

    fetchMock.mockResolvedValueOnce(makeFetchResponse({ candidates: [{ content: { parts: [{ text: '   ' }] } }] }))
    await expect(callGemini('sys', 'user msg', config)).rejects.toThrow('[Gemini gemini-2.5-flash] Empty response')
  })

  it('sends model, key, prompts and signal', async () => {
    fetchMock.mockResolvedValueOnce(
      makeFetchResponse({
        candidates: [{ content: { parts: [{ text: 'ok' }] } }],
      })
    )
    const signal = new AbortController().signal
    await callGemini('Be precise', 'Standardize this field', config, { signal })

    const [url, init] = fetchMock.mock.calls[0]
    expect(String(url)).toContain('models/gemini-2.5-flash:generateContent')
    expect(String(url)).toContain('key=test-secret')
    expect(init?.signal).toBe(signal)
    const body = JSON.parse(String(init?.body))
    expect(body.system_instruction.parts[0].text).toBe('Be precise')
    expect(body.contents[0].parts[0].text).toBe('Standardize this field')
  })
})
