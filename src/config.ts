/**
 * Process configuration. The only module that reads environment variables; the pipeline
 * receives the resulting values (credential included) as plain arguments.
 */

import { ConfigurationError } from './lib/errors'
import { DEFAULT_API_ENDPOINT, DEFAULT_API_MODEL } from './lib/remoteApiBackend'

export type BackendKind = 'none' | 'local' | 'remote'

export type BackendConfig =
  | { kind: 'none' }
  | { kind: 'local'; modelModule?: string; retryDelayMs: number }
  | { kind: 'remote'; apiKey?: string; endpoint: string; model: string }

export interface AppConfig {
  backend: BackendConfig
}

const BACKEND_KINDS: readonly BackendKind[] = ['none', 'local', 'remote']

function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value)
}

function readNonNegativeInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 0) throw new ConfigurationError(`${key} must be a non-negative integer, got "${raw}".`)
  return n
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: { backend?: string } = {}): AppConfig {
  const kind = (overrides.backend ?? env.SUMMARY_BACKEND ?? 'none').trim().toLowerCase()
  if (!isBackendKind(kind)) {
    throw new ConfigurationError(`Unknown summary backend "${kind}". Use one of: ${BACKEND_KINDS.join(', ')}.`)
  }

  switch (kind) {
    case 'local':
      return {
        backend: {
          kind,
          modelModule: env.SUMMARY_LOCAL_MODEL?.trim() || undefined,
          retryDelayMs: readNonNegativeInt(env, 'SUMMARY_RETRY_DELAY_MS', 0),
        },
      }
    case 'remote':
      return {
        backend: {
          kind,
          apiKey: env.SUMMARY_API_KEY,
          endpoint: env.SUMMARY_API_URL?.trim() || DEFAULT_API_ENDPOINT,
          model: env.SUMMARY_API_MODEL?.trim() || DEFAULT_API_MODEL,
        },
      }
    default:
      return { backend: { kind: 'none' } }
  }
}
