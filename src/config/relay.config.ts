import { registerAs } from '@nestjs/config';
import { AgentRelayConfig } from '../interfaces/config.interface';
import { parseRelayEnv, RelayEnv } from './relay-env.schema';

/**
 * Map validated environment variables onto the module configuration
 */
export function createRelayConfig(env: RelayEnv): AgentRelayConfig {
  return {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      transport: env.TELEGRAM_TRANSPORT,
      webhookUrl: env.TELEGRAM_WEBHOOK_URL,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    },
    agent: {
      apiKey: env.AGENT_API_KEY,
      agentId: env.AGENT_ID,
      baseUrl: env.AGENT_API_BASE_URL,
      agentEndpoint: env.AGENT_ENDPOINT,
      agentAccessKey: env.AGENT_ACCESS_KEY,
      timeoutSeconds: env.AGENT_API_TIMEOUT,
      maxRetries: env.AGENT_API_MAX_RETRIES,
      baseBackoffSeconds: env.AGENT_API_BASE_BACKOFF,
      maxBackoffSeconds: env.AGENT_API_MAX_BACKOFF,
    },
    rateLimiter: {
      steadyRate: env.AGENT_RATE_LIMIT_QPS,
      burstCapacity: env.AGENT_RATE_LIMIT_BURST,
      defaultCooldownSeconds: env.AGENT_RATE_LIMIT_COOLDOWN,
    },
    sessionStore: env.SESSION_STORE,
    sessionStoreOptions:
      env.SESSION_STORE === 'redis'
        ? { redis: { url: env.REDIS_URL } }
        : undefined,
  };
}

export interface HttpConfig {
  port: number;
}

export const relayConfig = registerAs('relay', () =>
  createRelayConfig(parseRelayEnv(process.env)),
);

export const httpConfig = registerAs(
  'http',
  (): HttpConfig => ({ port: parseRelayEnv(process.env).PORT }),
);
