import axios, { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { AgentClientService } from '../agent-client.service';
import { RateLimiterService } from '../rate-limiter.service';
import { AgentApiError } from '../../errors/agent-api.error';
import { AgentClientOptions } from '../../interfaces/config.interface';

type FakeReply =
  | { status: number; data?: unknown; headers?: Record<string, string> }
  | Error;

function createHttp(replies: FakeReply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const next = replies.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${config.url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return {
      status: next.status,
      statusText: '',
      data: next.data ?? {},
      headers: next.headers ?? {},
      config,
    };
  };
  return { http: axios.create({ adapter }), requests };
}

function bodyOf(request: InternalAxiosRequestConfig): unknown {
  return typeof request.data === 'string' ? JSON.parse(request.data) : request.data;
}

describe('AgentClientService', () => {
  let rateLimiter: {
    acquire: jest.Mock;
    reportOverload: jest.Mock;
  };

  const sessionsOptions: AgentClientOptions = {
    apiKey: 'test-key',
    agentId: 'agent-1',
    baseUrl: 'https://agents.test/v2/ai/',
    maxRetries: 2,
    baseBackoffSeconds: 0,
    maxBackoffSeconds: 0,
  };

  function createClient(options: AgentClientOptions, replies: FakeReply[]) {
    const { http, requests } = createHttp(replies);
    const client = new AgentClientService(
      options,
      rateLimiter as unknown as RateLimiterService,
      http,
    );
    return { client, requests };
  }

  beforeEach(() => {
    rateLimiter = {
      acquire: jest.fn().mockResolvedValue(undefined),
      reportOverload: jest.fn(),
    };
    jest.spyOn(Math, 'random').mockReturnValue(0);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  describe('sessions mode', () => {
    it('should create a session for the configured agent', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        { status: 200, data: { session: { id: 'session-1' } } },
      ]);

      await expect(client.createSession()).resolves.toBe('session-1');

      expect(client.endpointMode).toBe(false);
      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('post');
      expect(requests[0].url).toBe(
        'https://agents.test/v2/ai/agents/agent-1/sessions',
      );
      expect(requests[0].headers.get('Authorization')).toBe('Bearer test-key');
      expect(rateLimiter.acquire).toHaveBeenCalledTimes(1);
    });

    it.each([
      [{ id: 42 }, '42'],
      [{ session_id: 'session-2' }, 'session-2'],
    ])('should read the session id from %p', async (data, expected) => {
      const { client } = createClient(sessionsOptions, [{ status: 201, data }]);

      await expect(client.createSession()).resolves.toBe(expected);
    });

    it('should fail when the response carries no session id', async () => {
      const { client } = createClient(sessionsOptions, [
        { status: 200, data: { session: {} } },
      ]);

      await expect(client.createSession()).rejects.toThrow(
        'Agent API response did not include a session identifier',
      );
    });

    it('should post the user message and return the reply text', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        { status: 200, data: { message: { content: 'Hello back' } } },
      ]);

      const response = await client.sendMessage('session-1', 'Hello');

      expect(response).toEqual({
        message: 'Hello back',
        raw: { message: { content: 'Hello back' } },
      });
      expect(requests[0].url).toBe(
        'https://agents.test/v2/ai/sessions/session-1/messages',
      );
      expect(bodyOf(requests[0])).toEqual({ role: 'user', content: 'Hello' });
    });

    it('should read the reply from response.output', async () => {
      const { client } = createClient(sessionsOptions, [
        { status: 200, data: { response: { output: 'From output' } } },
      ]);

      const response = await client.sendMessage('session-1', 'Hi');
      expect(response.message).toBe('From output');
    });

    it('should fall back to the serialized payload when no reply text is found', async () => {
      const { client } = createClient(sessionsOptions, [
        { status: 200, data: { foo: 'bar' } },
      ]);

      const response = await client.sendMessage('session-1', 'Hi');
      expect(response.message).toBe('{"foo":"bar"}');
    });

    it('should wrap a non-JSON body as raw_text', async () => {
      const { client } = createClient(sessionsOptions, [
        { status: 200, data: 'plain text' },
      ]);

      const response = await client.sendMessage('session-1', 'Hi');
      expect(response.raw).toEqual({ raw_text: 'plain text' });
      expect(response.message).toBe('{"raw_text":"plain text"}');
    });
  });

  describe('endpoint mode', () => {
    const endpointOptions: AgentClientOptions = {
      agentEndpoint: 'https://agent.test/',
      agentAccessKey: 'test-access-key',
      maxRetries: 0,
    };

    it('should generate a session id without calling the API', async () => {
      const { client, requests } = createClient(endpointOptions, []);

      const sessionId = await client.createSession();

      expect(client.endpointMode).toBe(true);
      expect(sessionId).toMatch(/^endpoint-[0-9a-f-]{36}$/);
      expect(requests).toHaveLength(0);
      expect(rateLimiter.acquire).not.toHaveBeenCalled();
    });

    it('should post a chat completion and read the first choice', async () => {
      const { client, requests } = createClient(endpointOptions, [
        {
          status: 200,
          data: { choices: [{ message: { content: 'Endpoint reply' } }] },
        },
      ]);

      const response = await client.sendMessage('endpoint-x', 'Question');

      expect(response.message).toBe('Endpoint reply');
      expect(requests[0].url).toBe(
        'https://agent.test/api/v1/chat/completions',
      );
      expect(requests[0].headers.get('Authorization')).toBe(
        'Bearer test-access-key',
      );
      expect(bodyOf(requests[0])).toEqual({
        messages: [{ role: 'user', content: 'Question' }],
        stream: false,
        include_retrieval_info: false,
        include_functions_info: false,
        include_guardrails_info: false,
      });
    });

    it('should fall back to choices[0].text', async () => {
      const { client } = createClient(endpointOptions, [
        { status: 200, data: { choices: [{ text: 'Plain completion' }] } },
      ]);

      const response = await client.sendMessage('endpoint-x', 'Question');
      expect(response.message).toBe('Plain completion');
    });
  });

  describe('retries', () => {
    it('should report the Retry-After header hint and retry a 429', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        { status: 429, headers: { 'retry-after': '2' } },
        { status: 200, data: { message: { content: 'ok' } } },
      ]);

      const response = await client.sendMessage('session-1', 'Hi');

      expect(response.message).toBe('ok');
      expect(requests).toHaveLength(2);
      expect(rateLimiter.reportOverload).toHaveBeenCalledWith(2);
      expect(rateLimiter.acquire).toHaveBeenCalledTimes(2);
    });

    it('should read the retry hint from the body when the header is missing', async () => {
      const { client } = createClient(sessionsOptions, [
        { status: 429, data: { error: { retry_after: 4 } } },
        { status: 200, data: { message: { content: 'ok' } } },
      ]);

      await client.sendMessage('session-1', 'Hi');
      expect(rateLimiter.reportOverload).toHaveBeenCalledWith(4);
    });

    it('should report an overload without a hint', async () => {
      const { client } = createClient(sessionsOptions, [
        { status: 429, data: { detail: 'slow down' } },
        { status: 200, data: { message: { content: 'ok' } } },
      ]);

      await client.sendMessage('session-1', 'Hi');
      expect(rateLimiter.reportOverload).toHaveBeenCalledWith(undefined);
    });

    it('should raise the final 429 once attempts are exhausted', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        { status: 429, data: { detail: 'slow down' } },
        { status: 429, data: { detail: 'slow down' } },
        { status: 429, data: { detail: 'slow down' } },
      ]);

      const error: unknown = await client
        .sendMessage('session-1', 'Hi')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AgentApiError);
      expect(error).toMatchObject({
        status: 429,
        detail: { detail: 'slow down' },
        message: 'Agent API returned 429: {"detail":"slow down"}',
      });
      expect(requests).toHaveLength(3);
      expect(rateLimiter.reportOverload).toHaveBeenCalledTimes(3);
    });

    it('should not retry other error statuses', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        { status: 500, data: { error: 'boom' } },
      ]);

      await expect(client.sendMessage('session-1', 'Hi')).rejects.toMatchObject(
        { name: 'AgentApiError', status: 500 },
      );
      expect(requests).toHaveLength(1);
      expect(rateLimiter.reportOverload).not.toHaveBeenCalled();
    });

    it('should retry transport errors', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        new Error('socket hang up'),
        { status: 200, data: { message: { content: 'recovered' } } },
      ]);

      const response = await client.sendMessage('session-1', 'Hi');

      expect(response.message).toBe('recovered');
      expect(requests).toHaveLength(2);
      expect(rateLimiter.reportOverload).not.toHaveBeenCalled();
    });

    it('should wrap the last transport error in AgentApiError', async () => {
      const cause = new Error('connect ECONNREFUSED');
      const { client } = createClient({ ...sessionsOptions, maxRetries: 0 }, [
        cause,
      ]);

      const error: unknown = await client.createSession().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AgentApiError);
      expect(error).toMatchObject({
        message:
          'Request to https://agents.test/v2/ai/agents/agent-1/sessions failed: connect ECONNREFUSED',
        cause,
        status: undefined,
      });
    });

    it('should back off exponentially between attempts', async () => {
      jest.useFakeTimers();
      const { client, requests } = createClient(
        { ...sessionsOptions, baseBackoffSeconds: 0.5, maxBackoffSeconds: 60 },
        [
          { status: 429 },
          { status: 200, data: { message: { content: 'ok' } } },
        ],
      );

      const pending = client.sendMessage('session-1', 'Hi');

      await jest.advanceTimersByTimeAsync(999);
      expect(requests).toHaveLength(1);

      await jest.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toMatchObject({ message: 'ok' });
      expect(requests).toHaveLength(2);
    });

    it('should wait for the server hint, capped at maxBackoff', async () => {
      jest.useFakeTimers();
      const { client, requests } = createClient(
        { ...sessionsOptions, baseBackoffSeconds: 0.5, maxBackoffSeconds: 3 },
        [
          { status: 429, headers: { 'retry-after': '30' } },
          { status: 200, data: { message: { content: 'ok' } } },
        ],
      );

      const pending = client.sendMessage('session-1', 'Hi');

      await jest.advanceTimersByTimeAsync(2999);
      expect(requests).toHaveLength(1);

      await jest.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toMatchObject({ message: 'ok' });
      expect(rateLimiter.reportOverload).toHaveBeenCalledWith(30);
    });

    it('should stop with the abort reason when the signal is aborted', async () => {
      const { client, requests } = createClient(sessionsOptions, [
        { status: 200, data: { message: { content: 'never' } } },
      ]);

      await expect(
        client.sendMessage('session-1', 'Hi', {
          signal: AbortSignal.abort(new Error('stopped')),
        }),
      ).rejects.toThrow('stopped');
      expect(requests).toHaveLength(0);
    });
  });
});
