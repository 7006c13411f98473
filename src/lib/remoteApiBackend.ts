/**
 * Remote API backend: sends the narrative to an OpenAI-compatible chat-completions endpoint.
 *
 * The credential is checked in the constructor, so a missing key is a ConfigurationError
 * before any request is made. One attempt per call; HTTP or network failures degrade to
 * the fallback narrative.
 */

import type { BackendResult } from '../types'
import { ConfigurationError } from './errors'
import {
  fallbackResult,
  toNarrativeText,
  type NarrativeInput,
  type SummarizationBackend,
} from './summarizationBackend'

// ─────────────────────────────────────────────
// REQUEST
// ─────────────────────────────────────────────

export const DEFAULT_API_ENDPOINT = 'https://api.openai.com/v1/chat/completions'
export const DEFAULT_API_MODEL = 'gpt-4o-mini'

/** Heading marker the model is asked to open each section with */
export const API_HEADING_MARKER = '###'

export const SYSTEM_PROMPT = `You summarize dataset statistics in a human-readable, structured format.
Start every section with a "${API_HEADING_MARKER} " heading on its own line, followed by short bullet points.
Only use the numbers given to you; never invent values.`

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface ChatCompletionRequest {
  model: string
  messages: ChatMessage[]
  max_tokens: number
  temperature: number
  top_p: number
  frequency_penalty: number
  presence_penalty: number
  stream: false
}

export const GENERATION_PARAMETERS = {
  max_tokens: 512,
  temperature: 0.7,
  top_p: 0.9,
  frequency_penalty: 0,
  presence_penalty: 0,
  stream: false,
} as const

export function buildChatRequest(model: string, narrativeText: string): ChatCompletionRequest {
  return {
    model,
    messages: [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: narrativeText },
    ],
    ...GENERATION_PARAMETERS,
  }
}

// ─────────────────────────────────────────────
// RESPONSE
// ─────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/** choices[0].message.content, or null when the body does not have it */
export function extractCompletionText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null
  const first: unknown = body.choices[0]
  if (!isRecord(first) || !isRecord(first.message)) return null
  const content = first.message.content
  return typeof content === 'string' ? content : null
}

function errorMessage(body: unknown): string | null {
  if (!isRecord(body) || !isRecord(body.error)) return null
  return typeof body.error.message === 'string' ? body.error.message : null
}

// ─────────────────────────────────────────────
// BACKEND
// ─────────────────────────────────────────────

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface RemoteApiBackendOptions {
  apiKey: string | undefined
  endpoint?: string
  model?: string
  fetch?: FetchLike
}

export class RemoteApiBackend implements SummarizationBackend {
  readonly name = 'remote-api'
  private readonly apiKey: string
  private readonly endpoint: string
  private readonly model: string
  private readonly fetchFn: FetchLike

  constructor(options: RemoteApiBackendOptions) {
    const apiKey = options.apiKey?.trim()
    if (!apiKey) throw new ConfigurationError('A summary API key is required for the remote backend.')
    this.apiKey = apiKey
    this.endpoint = options.endpoint ?? DEFAULT_API_ENDPOINT
    this.model = options.model ?? DEFAULT_API_MODEL
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
  }

  async summarize(narrative: NarrativeInput): Promise<BackendResult> {
    const text = toNarrativeText(narrative)
    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(buildChatRequest(this.model, text)),
      })

      if (!response.ok) {
        const err: unknown = await response.json().catch(() => ({}))
        console.error(`[RemoteApi] Request failed: ${errorMessage(err) ?? `HTTP ${response.status}`}`)
        return fallbackResult(text)
      }

      const content = extractCompletionText(await response.json())
      if (content === null || content.trim() === '') {
        console.error('[RemoteApi] Response did not contain a summary')
        return fallbackResult(text)
      }
      return { text: content, source: 'api' }
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e)
      console.error(`[RemoteApi] Request failed: ${msg}`)
      return fallbackResult(text)
    }
  }
}
