/**
 * MCS Best Practices - public API
 */

export { createApp, type AppRuntime, type AppRuntimeConfig } from './app';
export { createHttpApp, type HttpAppOptions } from './api/server';
export { createAppConfig, DEFAULT_CONFIG, type AppConfig, type LogLevel } from './config/app-config';
export { createLogger, type Logger } from './lib/logger';
export { ERROR_MESSAGES, extractErrorMessage } from './lib/errors';
export {
  createKnowledgeMcpServer,
  executeTool,
  formatErrorWithGuidance,
  type ServerOptions,
} from './mcp/mcp-server';
export { createMcpHttpHandler } from './mcp/http-transport';
export { KNOWLEDGE_RESOURCES, readKnowledgeResource } from './resources/knowledge-resources';
export { URI_SCHEMES, buildUri } from './resources/uri-schemes';
export { ALL_TOOLS, TOOL_NAME, type ToolName } from './tools';
export * from './knowledge';
export * from './types';
