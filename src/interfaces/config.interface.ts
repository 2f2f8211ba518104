import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { SessionStoreType } from '../adapters/types';
import { ISessionStore } from './session-store.interface';

/**
 * Token-bucket options for outbound calls to the agent API
 */
export interface RateLimiterOptions {
  /**
   * Tokens added per second. May be fractional (0.2 = one call every 5s).
   * Leave unset to disable the token gate entirely.
   */
  steadyRate?: number;

  /**
   * Maximum number of calls issued back-to-back before throttling kicks in
   * @default 1
   */
  burstCapacity?: number;

  /**
   * Pause applied after an overload response that carries no retry hint.
   * Zero disables the cooldown gate for unhinted overloads.
   * @default 5
   */
  defaultCooldownSeconds?: number;

  /**
   * Millisecond clock the bucket runs on. Must never move backwards.
   * @default performance.now
   */
  clock?: () => number;
}

/**
 * Connection and retry options for the agent API
 */
export interface AgentClientOptions {
  /**
   * Bearer key for the sessions API
   */
  apiKey?: string;

  /**
   * Agent identifier used when creating sessions
   */
  agentId?: string;

  /**
   * @default 'https://api.digitalocean.com/v2/ai'
   */
  baseUrl?: string;

  /**
   * Direct agent endpoint. When set together with agentAccessKey, messages are
   * posted to `{agentEndpoint}/api/v1/chat/completions` and no session call is made.
   */
  agentEndpoint?: string;

  agentAccessKey?: string;

  /**
   * @default 30
   */
  timeoutSeconds?: number;

  /**
   * Retries after a 429 or a transport error
   * @default 3
   */
  maxRetries?: number;

  /**
   * @default 0.5
   */
  baseBackoffSeconds?: number;

  /**
   * @default 60
   */
  maxBackoffSeconds?: number;
}

export type TelegramTransportMode = 'webhook' | 'polling';

/**
 * Telegram bot options
 */
export interface TelegramOptions {
  botToken: string;

  /**
   * @default 'polling'
   */
  transport?: TelegramTransportMode;

  /**
   * Public URL registered with Telegram on startup in webhook mode
   */
  webhookUrl?: string;

  /**
   * Expected value of the X-Telegram-Bot-Api-Secret-Token header
   */
  webhookSecret?: string;
}

/**
 * Configuration for the AgentRelay module
 */
export interface AgentRelayConfig {
  telegram: TelegramOptions;

  agent: AgentClientOptions;

  rateLimiter?: RateLimiterOptions;

  /**
   * Name of the session store to use ('memory', 'redis' or 'custom')
   * @default 'memory'
   */
  sessionStore?: SessionStoreType;

  /**
   * Session store specific options
   */
  sessionStoreOptions?: {
    redis?: {
      host?: string;
      port?: number;
      password?: string;
      url?: string;
      keyPrefix?: string;
      /**
       * Expire stored sessions after this many seconds of inactivity
       */
      ttlSeconds?: number;
    };
  };

  /**
   * An instance of ISessionStore to use when sessionStore is 'custom'.
   */
  customSessionStoreInstance?: ISessionStore;
}

/**
 * Interface for async config factory
 */
export interface AgentRelayConfigFactory {
  createAgentRelayConfig(): Promise<AgentRelayConfig> | AgentRelayConfig;
}

/**
 * Options for async module configuration
 */
export interface AgentRelayAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  useExisting?: Type<AgentRelayConfigFactory>;

  useClass?: Type<AgentRelayConfigFactory>;

  useFactory?: (
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    ...args: any[]
  ) => Promise<AgentRelayConfig> | AgentRelayConfig;

  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}
