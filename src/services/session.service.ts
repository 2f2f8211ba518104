import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { AGENT_RELAY_SESSION_STORE } from '../utils/constants';
import { ISessionStore } from '../interfaces/session-store.interface';
import { AgentClientService } from './agent-client.service';

/**
 * Keeps one agent session per chat, creating it lazily on first use
 */
@Injectable()
export class SessionService implements OnApplicationShutdown {
  private readonly logger = new Logger(SessionService.name);
  // Chats with a session creation in flight share the same request
  private readonly pending: Map<string, Promise<string>> = new Map();

  constructor(
    @Inject(AGENT_RELAY_SESSION_STORE)
    private readonly store: ISessionStore,
    private readonly agentClient: AgentClientService,
  ) {}

  /**
   * Return the chat's session, creating and storing one if needed
   */
  async ensureSession(chatId: string): Promise<string> {
    const existing = await this.store.getSession(chatId);
    if (existing) {
      return existing;
    }
    return this.pending.get(chatId) ?? this.createAndStore(chatId);
  }

  /**
   * Replace the chat's session with a new one. The old mapping is dropped
   * first, so a failed creation leaves the chat without a session.
   */
  async resetSession(chatId: string): Promise<string> {
    await this.store.deleteSession(chatId);
    return this.createAndStore(chatId);
  }

  async onApplicationShutdown(): Promise<void> {
    await this.store.close?.();
  }

  private createAndStore(chatId: string): Promise<string> {
    const creation = this.agentClient
      .createSession()
      .then(async (sessionId) => {
        await this.store.saveSession(chatId, sessionId);
        this.logger.log(`Started session ${sessionId} for chat ${chatId}`);
        return sessionId;
      })
      .finally(() => {
        if (this.pending.get(chatId) === creation) {
          this.pending.delete(chatId);
        }
      });
    this.pending.set(chatId, creation);
    return creation;
  }
}
