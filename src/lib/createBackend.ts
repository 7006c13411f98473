import type { BackendConfig } from '../config'
import { initLocalModel, loadModelModule, LocalModelBackend, type SummarizationModel } from './localModelBackend'
import { RemoteApiBackend, type FetchLike } from './remoteApiBackend'
import { PassthroughBackend, type SummarizationBackend } from './summarizationBackend'

export interface BackendDependencies {
  /** Overrides how the local model is loaded (default: import config.modelModule) */
  loadModel?: () => SummarizationModel | Promise<SummarizationModel>
  fetch?: FetchLike
}

/**
 * Build the configured backend once, at startup. The local model is loaded here; a load
 * failure is kept in the handle. A remote backend without a key throws ConfigurationError.
 */
export async function createBackend(config: BackendConfig, deps: BackendDependencies = {}): Promise<SummarizationBackend> {
  switch (config.kind) {
    case 'local': {
      const { modelModule } = config
      const load =
        deps.loadModel ??
        (() => {
          if (!modelModule) throw new Error('No local model configured (set SUMMARY_LOCAL_MODEL)')
          return loadModelModule(modelModule)
        })
      const handle = await initLocalModel(load)
      return new LocalModelBackend(handle, { retryDelayMs: config.retryDelayMs })
    }
    case 'remote':
      return new RemoteApiBackend({
        apiKey: config.apiKey,
        endpoint: config.endpoint,
        model: config.model,
        fetch: deps.fetch,
      })
    case 'none':
      return new PassthroughBackend()
  }
}
