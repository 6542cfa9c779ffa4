/**
 * Classroom Finder Agent - public exports
 */

// Server
export {
  ClassroomAgentServer,
  ShutdownManager,
  SERVICE_VERSION,
  type ClassroomAgentServerOptions,
  type ShutdownManagerOptions,
} from './server.js';

// Configuration
export * from './config.js';

// Agent
export * from './agent/agent.js';
export * from './agent/llm-provider.js';
export { SYSTEM_PROMPT } from './agent/prompt.js';

// Tools
export * from './tools/classroom-client.js';
export * from './tools/classroom-tools.js';

// API
export * from './api/chat-handler.js';
export * from './api/errors.js';
export { createApiRouter } from './api/router.js';

// Transport
export * from './transport/http.js';

// Observability
export * from './observability/logger.js';
export * from './observability/health.js';
export * from './logging/levels.js';
