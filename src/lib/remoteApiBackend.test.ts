import { describe, it, expect, vi, beforeEach } from 'vitest'
import {
  buildChatRequest,
  DEFAULT_API_ENDPOINT,
  extractCompletionText,
  RemoteApiBackend,
  SYSTEM_PROMPT,
} from './remoteApiBackend'
import { ConfigurationError } from './errors'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function completion(content: string): unknown {
  return { choices: [{ index: 0, message: { role: 'assistant', content } }] }
}

describe('remoteApiBackend', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('rejects a missing credential before any request', () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(completion('x')))
    expect(() => new RemoteApiBackend({ apiKey: undefined, fetch: fetchMock })).toThrow(ConfigurationError)
    expect(() => new RemoteApiBackend({ apiKey: '   ', fetch: fetchMock })).toThrow(
      'A summary API key is required for the remote backend.'
    )
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('posts a chat completion request with fixed generation parameters', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(completion('### Overview\n- 100 rows')))
    const backend = new RemoteApiBackend({ apiKey: 'test-secret', model: 'test-model', fetch: fetchMock })

    const result = await backend.summarize('Dataset Overview:\n- 100 rows')

    expect(result).toEqual({ text: '### Overview\n- 100 rows', source: 'api' })
    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(DEFAULT_API_ENDPOINT)
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' })
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'Dataset Overview:\n- 100 rows' },
      ],
      max_tokens: 512,
      temperature: 0.7,
      top_p: 0.9,
      frequency_penalty: 0,
      presence_penalty: 0,
      stream: false,
    })
  })

  it('falls back on a non-2xx status after a single attempt', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ error: { message: 'Rate limit reached' } }, 429)
    )
    const backend = new RemoteApiBackend({ apiKey: 'test-secret', fetch: fetchMock })

    const result = await backend.summarize('Data Health:\n- ok')

    expect(result).toEqual({ text: 'Data Health:\n- ok', source: 'fallback' })
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(console.error).toHaveBeenCalledWith('[RemoteApi] Request failed: Rate limit reached')
  })

  it('falls back on a network error', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed')
    })
    const backend = new RemoteApiBackend({ apiKey: 'test-secret', fetch: fetchMock })

    await expect(backend.summarize('')).resolves.toEqual({ text: '', source: 'fallback' })
    expect(console.error).toHaveBeenCalledWith('[RemoteApi] Request failed: fetch failed')
  })

  it('falls back when the response has no summary text', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ choices: [] }))
    const backend = new RemoteApiBackend({ apiKey: 'test-secret', fetch: fetchMock })

    await expect(backend.summarize('  ')).resolves.toEqual({ text: '  ', source: 'fallback' })
  })

  it('extractCompletionText reads choices[0].message.content', () => {
    expect(extractCompletionText(completion('hello'))).toBe('hello')
    expect(extractCompletionText({ choices: [{ message: { content: 42 } }] })).toBeNull()
    expect(extractCompletionText(null)).toBeNull()
    expect(extractCompletionText('text')).toBeNull()
  })

  it('buildChatRequest never streams', () => {
    expect(buildChatRequest('m', 'n').stream).toBe(false)
  })
})
