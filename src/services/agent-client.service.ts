import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import axios, {
  AxiosHeaders,
  AxiosInstance,
  AxiosRequestConfig,
  AxiosResponse,
} from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { AgentClientOptions } from '../interfaces/config.interface';
import {
  AgentRequestOptions,
  AgentResponse,
} from '../interfaces/agent.interface';
import { AgentApiError } from '../errors/agent-api.error';
import { RateLimiterService } from './rate-limiter.service';
import {
  decodeBody,
  extractEndpointReplyText,
  extractReplyText,
  extractSessionId,
} from '../utils/agent-payload';
import {
  extractRetryAfterFromBody,
  parseRetryAfterHeader,
} from '../utils/retry-after';
import { DEFAULT_AGENT_API_BASE_URL } from '../utils/constants';
import { sleep } from '../utils/sleep';

const JITTER_RATIO = 0.1;

/**
 * Async client for the hosted agent API.
 *
 * Every attempt waits on the shared RateLimiterService first. A 429 response
 * feeds the limiter's cooldown and is retried with exponential backoff.
 */
@Injectable()
export class AgentClientService {
  private readonly logger = new Logger(AgentClientService.name);
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly agentEndpoint?: string;
  private readonly useEndpoint: boolean;
  private readonly maxRetries: number;
  private readonly baseBackoffSeconds: number;
  private readonly maxBackoffSeconds: number;

  constructor(
    private readonly options: AgentClientOptions,
    private readonly rateLimiter: RateLimiterService,
    http?: AxiosInstance,
  ) {
    this.http =
      http ?? axios.create({ timeout: (options.timeoutSeconds ?? 30) * 1000 });
    this.baseUrl = (options.baseUrl ?? DEFAULT_AGENT_API_BASE_URL).replace(
      /\/+$/,
      '',
    );
    this.agentEndpoint = options.agentEndpoint?.replace(/\/+$/, '');
    this.useEndpoint = Boolean(this.agentEndpoint && options.agentAccessKey);
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.baseBackoffSeconds = options.baseBackoffSeconds ?? 0.5;
    this.maxBackoffSeconds = options.maxBackoffSeconds ?? 60;
  }

  /**
   * Whether messages go straight to the agent endpoint instead of the sessions API
   */
  get endpointMode(): boolean {
    return this.useEndpoint;
  }

  /**
   * Create a fresh conversation session for the configured agent.
   * Endpoint mode needs no session, so a synthetic id is returned instead.
   */
  async createSession(options: AgentRequestOptions = {}): Promise<string> {
    if (this.useEndpoint) {
      const sessionId = `endpoint-${uuidv4()}`;
      this.logger.debug(
        `Using agent endpoint mode, generated session id ${sessionId}`,
      );
      return sessionId;
    }

    const url = `${this.baseUrl}/agents/${this.options.agentId}/sessions`;
    this.logger.debug(`Creating new agent session at ${url}`);
    const response = await this.requestWithRetries(
      { method: 'POST', url, headers: this.headers(this.options.apiKey) },
      options.signal,
    );
    const data = this.handleResponse(response);

    const sessionId = extractSessionId(data);
    if (!sessionId) {
      throw new AgentApiError(
        'Agent API response did not include a session identifier',
        { status: response.status, detail: data },
      );
    }
    return sessionId;
  }

  /**
   * Send a user message to the agent and return the assistant reply
   */
  async sendMessage(
    sessionId: string,
    message: string,
    options: AgentRequestOptions = {},
  ): Promise<AgentResponse> {
    if (this.useEndpoint) {
      const url = `${this.agentEndpoint}/api/v1/chat/completions`;
      this.logger.debug(`Sending message to agent endpoint ${url}: ${message}`);
      const response = await this.requestWithRetries(
        {
          method: 'POST',
          url,
          headers: this.headers(this.options.agentAccessKey),
          data: {
            messages: [{ role: 'user', content: message }],
            stream: false,
            include_retrieval_info: false,
            include_functions_info: false,
            include_guardrails_info: false,
          },
        },
        options.signal,
      );
      const data = this.handleResponse(response);
      return {
        message: this.replyOrFallback(extractEndpointReplyText(data), data),
        raw: data,
      };
    }

    const url = `${this.baseUrl}/sessions/${sessionId}/messages`;
    this.logger.debug(
      `Sending message to session ${sessionId} via ${url}: ${message}`,
    );
    const response = await this.requestWithRetries(
      {
        method: 'POST',
        url,
        headers: this.headers(this.options.apiKey),
        data: { role: 'user', content: message },
      },
      options.signal,
    );
    const data = this.handleResponse(response);
    return {
      message: this.replyOrFallback(extractReplyText(data), data),
      raw: data,
    };
  }

  /**
   * Validate the HTTP response and return the decoded JSON body
   */
  private handleResponse(
    response: AxiosResponse<unknown>,
  ): Record<string, unknown> {
    const data = decodeBody(response.data);
    if (response.status < 200 || response.status >= 300) {
      const detail = JSON.stringify(data);
      this.logger.error(
        `Agent API returned status ${response.status}: ${detail}`,
      );
      throw new AgentApiError(
        `Agent API returned ${response.status}: ${detail}`,
        { status: response.status, detail: data },
      );
    }
    return data;
  }

  private replyOrFallback(
    reply: string | undefined,
    data: Record<string, unknown>,
  ): string {
    if (reply !== undefined) {
      return reply;
    }
    const raw = JSON.stringify(data);
    this.logger.warn(`Falling back to raw response for reply text: ${raw}`);
    return raw;
  }

  /**
   * Perform an HTTP request, retrying 429 responses and transport errors.
   * The final 429 is returned to the caller; the final transport error is
   * raised as AgentApiError.
   */
  private async requestWithRetries(
    config: AxiosRequestConfig,
    signal?: AbortSignal,
  ): Promise<AxiosResponse<unknown>> {
    for (let attempt = 0; ; attempt++) {
      await this.rateLimiter.acquire({ signal });

      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.request<unknown>({
          ...config,
          signal,
          validateStatus: () => true,
        });
      } catch (error) {
        signal?.throwIfAborted();
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `HTTP error during request to ${config.url}: ${reason}`,
        );
        if (attempt >= this.maxRetries) {
          throw new AgentApiError(`Request to ${config.url} failed: ${reason}`, {
            cause: error,
          });
        }
        await this.sleepBackoff(attempt + 1, undefined, signal);
        continue;
      }

      if (response.status !== HttpStatus.TOO_MANY_REQUESTS) {
        return response;
      }

      const detail = decodeBody(response.data);
      const retryAfter =
        parseRetryAfterHeader(this.getHeader(response, 'retry-after')) ??
        extractRetryAfterFromBody(detail);
      this.rateLimiter.reportOverload(retryAfter);
      this.logger.warn(
        `Received 429 from agent API (attempt ${attempt + 1}/${this.maxRetries + 1}): ${JSON.stringify(detail)}`,
      );
      if (attempt >= this.maxRetries) {
        return response;
      }
      await this.sleepBackoff(attempt + 1, retryAfter, signal);
    }
  }

  /**
   * Backoff with up to 10% jitter; a positive server hint replaces the
   * exponential term
   */
  private async sleepBackoff(
    attempt: number,
    retryAfter: number | undefined,
    signal?: AbortSignal,
  ): Promise<void> {
    let seconds =
      retryAfter !== undefined && retryAfter > 0
        ? Math.min(retryAfter, this.maxBackoffSeconds)
        : Math.min(
            this.baseBackoffSeconds * 2 ** attempt,
            this.maxBackoffSeconds,
          );
    seconds += seconds * JITTER_RATIO * Math.random();
    this.logger.warn(
      `Backing off for ${seconds.toFixed(2)}s before retrying (attempt ${attempt})`,
    );
    await sleep(seconds * 1000, signal);
  }

  private getHeader(response: AxiosResponse<unknown>, name: string): unknown {
    const { headers } = response;
    return headers instanceof AxiosHeaders ? headers.get(name) : headers[name];
  }

  private headers(token?: string): Record<string, string> {
    return {
      Authorization: `Bearer ${token ?? ''}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }
}
