import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import {
  AgentRelayAsyncConfig,
  AgentRelayConfig,
  AgentRelayConfigFactory,
} from './interfaces/config.interface';
import { AGENT_RELAY_CONFIG } from './utils/constants';
import { createSessionStoreProvider } from './utils/session-store.factory';
import { RateLimiterService } from './services/rate-limiter.service';
import { AgentClientService } from './services/agent-client.service';
import { SessionService } from './services/session.service';
import { RelayService } from './services/relay.service';
import { TelegramTransportService } from './services/telegram-transport.service';
import { RelayCommandsHandler } from './handlers/relay-commands.handler';
import { TelegramWebhookController } from './controllers/telegram-webhook.controller';
import {
  CUSTOM_SESSION_STORE,
  REDIS_SESSION_STORE,
} from './adapters/types';
import { ConfigurationError } from './errors/configuration.error';

export function validateConfig(config: AgentRelayConfig): void {
  if (!config.telegram?.botToken) {
    throw new ConfigurationError(
      'AgentRelay config must include telegram.botToken',
    );
  }

  if (!config.agent) {
    throw new ConfigurationError('AgentRelay config must include agent options');
  }

  const { agent } = config;
  const endpointMode = Boolean(agent.agentEndpoint && agent.agentAccessKey);
  if (!endpointMode && (!agent.apiKey || !agent.agentId)) {
    throw new ConfigurationError(
      'Agent client requires apiKey and agentId, or agentEndpoint and agentAccessKey',
    );
  }

  if (
    config.telegram.transport === 'webhook' &&
    config.telegram.webhookUrl &&
    !/^https:\/\//.test(config.telegram.webhookUrl)
  ) {
    throw new ConfigurationError('Telegram webhookUrl must use https');
  }

  if (
    config.sessionStore === REDIS_SESSION_STORE &&
    !config.sessionStoreOptions?.redis?.url &&
    !config.sessionStoreOptions?.redis?.host
  ) {
    throw new ConfigurationError(
      'Redis session store requires either url or host in sessionStoreOptions.redis',
    );
  }

  if (
    config.sessionStore === CUSTOM_SESSION_STORE &&
    !config.customSessionStoreInstance
  ) {
    throw new ConfigurationError(
      'Session store type is "custom" but no customSessionStoreInstance was provided',
    );
  }
}

function createRelayProviders(): Provider[] {
  return [
    {
      provide: RateLimiterService,
      useFactory: (config: AgentRelayConfig) =>
        new RateLimiterService(config.rateLimiter),
      inject: [AGENT_RELAY_CONFIG],
    },
    {
      provide: AgentClientService,
      useFactory: (
        config: AgentRelayConfig,
        rateLimiterService: RateLimiterService,
      ) => new AgentClientService(config.agent, rateLimiterService),
      inject: [AGENT_RELAY_CONFIG, RateLimiterService],
    },
    createSessionStoreProvider(),
    SessionService,
    RelayService,
    RelayCommandsHandler,
    {
      provide: TelegramTransportService,
      useFactory: (config: AgentRelayConfig, relayService: RelayService) =>
        new TelegramTransportService(config.telegram, relayService),
      inject: [AGENT_RELAY_CONFIG, RelayService],
    },
  ];
}

const EXPORTED_PROVIDERS = [
  RateLimiterService,
  AgentClientService,
  SessionService,
  RelayService,
  TelegramTransportService,
];

/**
 * Main module for AgentRelay. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class AgentRelayModule {
  /**
   * Register the AgentRelay module with static configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     AgentRelayModule.forRoot({
   *       telegram: { botToken: 'bot-token', transport: 'polling' },
   *       agent: { apiKey: 'api-key', agentId: 'agent-id' },
   *       rateLimiter: { steadyRate: 0.2, burstCapacity: 2, defaultCooldownSeconds: 10 },
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: AgentRelayConfig): DynamicModule {
    validateConfig(config);

    return {
      module: AgentRelayModule,
      global: true,
      imports: [DiscoveryModule],
      controllers: [TelegramWebhookController],
      providers: [
        { provide: AGENT_RELAY_CONFIG, useValue: config },
        ...createRelayProviders(),
      ],
      exports: EXPORTED_PROVIDERS,
    };
  }

  /**
   * Register the AgentRelay module with async configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot({ load: [relayConfig] }),
   *     AgentRelayModule.forRootAsync({
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) =>
   *         configService.getOrThrow<AgentRelayConfig>('relay'),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: AgentRelayAsyncConfig): DynamicModule {
    return {
      module: AgentRelayModule,
      global: true,
      imports: [DiscoveryModule, ...(asyncConfig.imports || [])],
      controllers: [TelegramWebhookController],
      providers: [
        AgentRelayModule.createAsyncConfigProvider(asyncConfig),
        ...(asyncConfig.useClass ? [asyncConfig.useClass] : []),
        ...createRelayProviders(),
      ],
      exports: EXPORTED_PROVIDERS,
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: AgentRelayAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: AGENT_RELAY_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateConfig(config);
          return config;
        },
        inject: options.inject || [],
      };
    }

    const factoryClass = options.useClass ?? options.useExisting;
    if (factoryClass) {
      return {
        provide: AGENT_RELAY_CONFIG,
        useFactory: async (configFactory: AgentRelayConfigFactory) => {
          const config = await configFactory.createAgentRelayConfig();
          validateConfig(config);
          return config;
        },
        inject: [factoryClass],
      };
    }

    throw new ConfigurationError(
      'Invalid AgentRelayAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}
