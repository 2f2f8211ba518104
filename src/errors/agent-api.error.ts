export interface AgentApiErrorOptions {
  /**
   * HTTP status of the final upstream response, when there was one
   */
  status?: number;

  /**
   * Decoded response body
   */
  detail?: unknown;

  cause?: unknown;
}

/**
 * Raised when the agent API returns an error or an unusable payload.
 */
export class AgentApiError extends Error {
  readonly status?: number;
  readonly detail?: unknown;

  constructor(message: string, options: AgentApiErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AgentApiError';
    this.status = options.status;
    this.detail = options.detail;
  }
}
