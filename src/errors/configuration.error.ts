/**
 * Raised at startup when limiter, module or environment settings are invalid.
 * Never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
