// Module
export { AgentRelayModule, validateConfig } from './agent-relay.module';

// Services
export { RateLimiterService } from './services/rate-limiter.service';
export { AgentClientService } from './services/agent-client.service';
export { SessionService } from './services/session.service';
export { RelayService } from './services/relay.service';
export {
  TelegramTransportService,
  isTelegramUpdate,
} from './services/telegram-transport.service';

// Handlers
export {
  RelayCommandsHandler,
  AGENT_FAILURE_REPLY,
  EMPTY_MESSAGE_REPLY,
  HELP_REPLY,
  NEW_SESSION_REPLY,
} from './handlers/relay-commands.handler';

// Configuration
export {
  AgentRelayConfig,
  AgentRelayAsyncConfig,
  AgentRelayConfigFactory,
  AgentClientOptions,
  RateLimiterOptions,
  TelegramOptions,
  TelegramTransportMode,
} from './interfaces/config.interface';
export {
  relayEnvSchema,
  parseRelayEnv,
  RelayEnv,
} from './config/relay-env.schema';
export {
  createRelayConfig,
  relayConfig,
  httpConfig,
  HttpConfig,
} from './config/relay.config';

// Interfaces
export {
  AcquireOptions,
  ITokenBucket,
  RateLimiterState,
} from './interfaces/rate-limiter.interface';
export { ISessionStore } from './interfaces/session-store.interface';
export {
  AgentRequestOptions,
  AgentResponse,
} from './interfaces/agent.interface';

// Models
export {
  ChatMessage,
  ChatMessageData,
  ChatCommandInvocation,
} from './models/chat-message.model';

// Decorators
export { ChatHandler } from './decorators/chat-handler.decorator';
export { ChatCommand, OnChatText } from './decorators/chat-command.decorator';

// Errors
export { AgentApiError, ConfigurationError } from './errors';

// Session stores (for extending)
export { MemorySessionStoreAdapter } from './adapters/memory-session-store.adapter';
export {
  RedisSessionStoreAdapter,
  RedisSessionStoreOptions,
} from './adapters/redis-session-store.adapter';
export { SessionStoreType } from './adapters/types';
