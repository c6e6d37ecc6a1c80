/**
 * MCP Context - Tool execution environment
 *
 * Tools read the knowledge snapshot and log through the context they are
 * handed, so tests can run a tool against any snapshot without a server.
 */

import type { Logger } from 'pino';
import type { KnowledgeStore } from '@/knowledge';

export interface ToolContext {
  /** Read-only knowledge snapshot */
  store: KnowledgeStore;
  /** Logger scoped to the current tool call */
  logger: Logger;
}

/**
 * Create a tool context for one invocation
 */
export function createToolContext(store: KnowledgeStore, logger: Logger, toolName?: string): ToolContext {
  return {
    store,
    logger: toolName ? logger.child({ tool: toolName }) : logger,
  };
}
