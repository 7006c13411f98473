/** Raised when the pipeline is set up wrongly (missing credential, unknown backend). Never retried. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
