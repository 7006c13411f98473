/**
 * Summarization backend contract. Implementations enhance (or pass through) the narrative
 * and never reject: every failure resolves to a fallback result carrying the narrative text.
 */

import type { BackendResult, Narrative } from '../types'
import { narrativeToText } from './narrativeComposer'

/** A composed narrative, or narrative text already serialised */
export type NarrativeInput = Narrative | string

export interface SummarizationBackend {
  /** Short name used in logs */
  readonly name: string
  summarize(narrative: NarrativeInput): Promise<BackendResult>
}

export function toNarrativeText(input: NarrativeInput): string {
  return typeof input === 'string' ? input : narrativeToText(input)
}

export function fallbackResult(text: string): BackendResult {
  return { text, source: 'fallback' }
}

/** Backend for runs without enhancement: always returns the narrative unchanged */
export class PassthroughBackend implements SummarizationBackend {
  readonly name = 'passthrough'

  async summarize(narrative: NarrativeInput): Promise<BackendResult> {
    return fallbackResult(toNarrativeText(narrative))
  }
}
