/**
 * Interface for stores that map a chat to its agent session
 */
export interface ISessionStore {
  /**
   * Initialize the store
   */
  initialize(): Promise<void>;

  /**
   * Get the session id stored for a chat
   * @param chatId Chat identifier
   */
  getSession(chatId: string): Promise<string | null>;

  /**
   * Store the session id for a chat, replacing any previous one
   */
  saveSession(chatId: string, sessionId: string): Promise<void>;

  deleteSession(chatId: string): Promise<void>;

  /**
   * Release connections held by the store
   */
  close?(): Promise<void>;
}
