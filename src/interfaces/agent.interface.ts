/**
 * Container for a response from the agent
 */
export interface AgentResponse {
  message: string;
  raw: Record<string, unknown>;
}

export interface AgentRequestOptions {
  /**
   * Cancels the rate-limit wait, the backoff sleep and the HTTP call
   */
  signal?: AbortSignal;
}
