/**
 * Injection token for AgentRelay configuration
 */
export const AGENT_RELAY_CONFIG = 'AGENT_RELAY_CONFIG';

/**
 * Injection token for the chat session store
 */
export const AGENT_RELAY_SESSION_STORE = 'AGENT_RELAY_SESSION_STORE';

export const DEFAULT_AGENT_API_BASE_URL = 'https://api.digitalocean.com/v2/ai';

export const TELEGRAM_SECRET_HEADER = 'x-telegram-bot-api-secret-token';
