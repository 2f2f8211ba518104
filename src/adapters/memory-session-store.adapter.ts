import { Injectable } from '@nestjs/common';
import { ISessionStore } from '../interfaces/session-store.interface';

/**
 * In-memory session store.
 * Sessions are lost on restart; suitable for a single relay process.
 */
@Injectable()
export class MemorySessionStoreAdapter implements ISessionStore {
  private readonly sessions: Map<string, string> = new Map();

  async initialize(): Promise<void> {
    // Nothing to do for memory store
  }

  async getSession(chatId: string): Promise<string | null> {
    return this.sessions.get(chatId) ?? null;
  }

  async saveSession(chatId: string, sessionId: string): Promise<void> {
    this.sessions.set(chatId, sessionId);
  }

  async deleteSession(chatId: string): Promise<void> {
    this.sessions.delete(chatId);
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }
}
