import { Provider } from '@nestjs/common';
import { AGENT_RELAY_CONFIG, AGENT_RELAY_SESSION_STORE } from './constants';
import { AgentRelayConfig } from '../interfaces/config.interface';
import { ISessionStore } from '../interfaces/session-store.interface';
import { MemorySessionStoreAdapter } from '../adapters/memory-session-store.adapter';
import { RedisSessionStoreAdapter } from '../adapters/redis-session-store.adapter';
import {
  CUSTOM_SESSION_STORE,
  MEMORY_SESSION_STORE,
  REDIS_SESSION_STORE,
} from '../adapters/types';
import { ConfigurationError } from '../errors/configuration.error';

/**
 * Build the session store selected by the configuration
 */
export function createSessionStore(config: AgentRelayConfig): ISessionStore {
  const {
    sessionStore = MEMORY_SESSION_STORE,
    sessionStoreOptions,
    customSessionStoreInstance,
  } = config;

  switch (sessionStore) {
    case MEMORY_SESSION_STORE:
      return new MemorySessionStoreAdapter();
    case REDIS_SESSION_STORE:
      return new RedisSessionStoreAdapter({ ...sessionStoreOptions?.redis });
    case CUSTOM_SESSION_STORE:
      if (!customSessionStoreInstance) {
        throw new ConfigurationError(
          'Session store type is "custom" but no customSessionStoreInstance was provided in AgentRelayConfig.',
        );
      }
      return customSessionStoreInstance;
    default:
      throw new ConfigurationError(
        `Unsupported session store: ${String(sessionStore)}`,
      );
  }
}

/**
 * Creates the session store provider based on the configuration
 *
 * @returns Provider for the session store
 */
export function createSessionStoreProvider(): Provider {
  return {
    provide: AGENT_RELAY_SESSION_STORE,
    useFactory: async (config: AgentRelayConfig): Promise<ISessionStore> => {
      const store = createSessionStore(config);
      await store.initialize();
      return store;
    },
    inject: [AGENT_RELAY_CONFIG],
  };
}
