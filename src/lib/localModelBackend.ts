/**
 * Local model backend: a sequence-to-sequence summarization model loaded once per process.
 *
 * The model handle is created by initLocalModel() at startup. A failed load is recorded in
 * the handle and every summarize() call then short-circuits to the fallback narrative.
 * Inference is retried up to three times; calls are serialised unless the model is re-entrant.
 */

import path from 'path'
import type { BackendResult } from '../types'
import {
  fallbackResult,
  toNarrativeText,
  type NarrativeInput,
  type SummarizationBackend,
} from './summarizationBackend'

// ─────────────────────────────────────────────
// MODEL CONTRACT
// ─────────────────────────────────────────────

export interface SummarizeOptions {
  minLength: number
  maxLength: number
  /** false = deterministic decoding */
  doSample: boolean
}

export interface SummarizationModel {
  summarize(text: string, options: SummarizeOptions): Promise<string>
  /** Set when concurrent summarize() calls are safe */
  reentrant?: boolean
}

export type LocalModelHandle =
  | { status: 'ready'; model: SummarizationModel }
  | { status: 'failed'; error: string }

export const LOCAL_SUMMARY_OPTIONS: SummarizeOptions = { minLength: 80, maxLength: 160, doSample: false }
export const LOCAL_MAX_ATTEMPTS = 3
const MAX_RETRY_DELAY_MS = 5_000

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function isSummarizationModel(value: unknown): value is SummarizationModel {
  return (
    typeof value === 'object' &&
    value !== null &&
    'summarize' in value &&
    typeof value.summarize === 'function'
  )
}

/** Load the model once. Never rejects; a failure is kept in the handle. */
export async function initLocalModel(
  load: () => unknown
): Promise<LocalModelHandle> {
  try {
    const model = await load()
    if (!isSummarizationModel(model)) throw new Error('Loaded object has no summarize() method')
    return { status: 'ready', model }
  } catch (e) {
    const error = e instanceof Error ? e.message : String(e)
    console.error(`[LocalModel] Error loading the summarization model: ${error}`)
    return { status: 'failed', error }
  }
}

/**
 * Import a module that provides the model, as its default export, a `model` export,
 * or a factory function under either name.
 */
export async function loadModelModule(modulePath: string): Promise<SummarizationModel> {
  const loaded: unknown = await import(path.resolve(modulePath))
  const candidates: unknown[] = [loaded]
  if (typeof loaded === 'object' && loaded !== null) {
    if ('default' in loaded) candidates.unshift(loaded.default)
    if ('model' in loaded) candidates.unshift(loaded.model)
  }
  for (const candidate of candidates) {
    const model: unknown = typeof candidate === 'function' ? await candidate() : candidate
    if (isSummarizationModel(model)) return model
  }
  throw new Error(`${modulePath} does not export a summarization model`)
}

// ─────────────────────────────────────────────
// BACKEND
// ─────────────────────────────────────────────

export interface LocalModelBackendOptions {
  maxAttempts?: number
  /** Delay before the n-th retry is n × retryDelayMs, capped at 5 s. 0 retries immediately. */
  retryDelayMs?: number
}

export class LocalModelBackend implements SummarizationBackend {
  readonly name = 'local-model'
  private readonly maxAttempts: number
  private readonly retryDelayMs: number
  private tail: Promise<unknown> = Promise.resolve()

  constructor(
    private readonly handle: LocalModelHandle,
    options: LocalModelBackendOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? LOCAL_MAX_ATTEMPTS)
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 0)
  }

  async summarize(narrative: NarrativeInput): Promise<BackendResult> {
    const text = toNarrativeText(narrative)
    const handle = this.handle
    if (handle.status === 'failed') {
      console.info('[LocalModel] Model not available, using the standard narrative')
      return fallbackResult(text)
    }
    const model = handle.model
    const task = () => this.invoke(model, text)
    return model.reentrant ? task() : this.serialize(task)
  }

  /** Single critical section: each call starts after the previous one settles */
  private serialize(task: () => Promise<BackendResult>): Promise<BackendResult> {
    const run = this.tail.then(task)
    this.tail = run
    return run
  }

  private async invoke(model: SummarizationModel, text: string): Promise<BackendResult> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const output = await model.summarize(text, LOCAL_SUMMARY_OPTIONS)
        if (typeof output === 'string' && output.trim() !== '') return { text: output, source: 'model' }
        console.warn(`[LocalModel] Attempt ${attempt}/${this.maxAttempts} returned no text`)
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e)
        console.warn(`[LocalModel] Attempt ${attempt}/${this.maxAttempts} failed: ${msg}`)
      }
      if (attempt < this.maxAttempts && this.retryDelayMs > 0) {
        await delay(Math.min(this.retryDelayMs * attempt, MAX_RETRY_DELAY_MS))
      }
    }
    console.warn('[LocalModel] AI summarization failed, falling back to the standard narrative')
    return fallbackResult(text)
  }
}
