export { ConfigurationError } from './configuration.error';
export { AgentApiError, AgentApiErrorOptions } from './agent-api.error';
