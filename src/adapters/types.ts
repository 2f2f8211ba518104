export const MEMORY_SESSION_STORE = 'memory';
export const REDIS_SESSION_STORE = 'redis';
export const CUSTOM_SESSION_STORE = 'custom';

export type SessionStoreType =
  | typeof MEMORY_SESSION_STORE
  | typeof REDIS_SESSION_STORE
  | typeof CUSTOM_SESSION_STORE;
