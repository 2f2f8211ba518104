import { Injectable, Logger } from '@nestjs/common';
import { Redis } from 'ioredis';
import { ISessionStore } from '../interfaces/session-store.interface';

export interface RedisSessionStoreOptions {
  host?: string;
  port?: number;
  password?: string;
  url?: string;
  keyPrefix?: string;
  ttlSeconds?: number;
  client?: Redis;
}

/**
 * Redis session store, for relays that should keep conversations across restarts
 */
@Injectable()
export class RedisSessionStoreAdapter implements ISessionStore {
  private readonly logger = new Logger(RedisSessionStoreAdapter.name);
  private readonly keyPrefix: string;
  private readonly ttlSeconds?: number;
  private readonly client: Redis;

  constructor(options: RedisSessionStoreOptions) {
    this.keyPrefix = options.keyPrefix || 'agent-relay:';
    this.ttlSeconds = options.ttlSeconds;

    if (options.client) {
      this.client = options.client;
    } else if (options.url) {
      this.client = new Redis(options.url);
    } else {
      this.client = new Redis({
        host: options.host || 'localhost',
        port: options.port || 6379,
        password: options.password,
      });
    }
  }

  /**
   * Generate a Redis key for a chat session
   */
  private getSessionKey(chatId: string): string {
    return `${this.keyPrefix}session:${chatId}`;
  }

  async initialize(): Promise<void> {
    this.logger.log(
      `Initialized RedisSessionStoreAdapter with prefix: ${this.keyPrefix}`,
    );

    // Test connection
    await this.client.ping();
  }

  async getSession(chatId: string): Promise<string | null> {
    const key = this.getSessionKey(chatId);
    const sessionId = await this.client.get(key);
    if (sessionId && this.ttlSeconds) {
      await this.client.expire(key, this.ttlSeconds);
    }
    return sessionId;
  }

  async saveSession(chatId: string, sessionId: string): Promise<void> {
    const key = this.getSessionKey(chatId);
    if (this.ttlSeconds) {
      await this.client.set(key, sessionId, 'EX', this.ttlSeconds);
    } else {
      await this.client.set(key, sessionId);
    }
  }

  async deleteSession(chatId: string): Promise<void> {
    await this.client.del(this.getSessionKey(chatId));
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
