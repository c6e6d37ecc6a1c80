/**
 * Stateless Streamable HTTP handler.
 *
 * Each POST gets its own McpServer and transport; both are closed once the
 * response closes. No session id is issued.
 */

import type { Request, Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { extractErrorMessage } from '@/lib/errors';
import { createTimer, type Logger } from '@/lib/logger';
import type { KnowledgeStore } from '@/knowledge';
import { createKnowledgeMcpServer, type ServerOptions } from './mcp-server';

export type McpHttpOptions = Omit<ServerOptions, 'logger'> & { logger: Logger };

/**
 * Create an express handler serving MCP JSON-RPC over Streamable HTTP
 */
export function createMcpHttpHandler(
  store: KnowledgeStore,
  options: McpHttpOptions,
): (req: Request, res: Response) => Promise<void> {
  const logger = options.logger.child({ module: 'mcp-http' });

  return async (req, res) => {
    const server = createKnowledgeMcpServer(store, { ...options, logger });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        logger.warn({ error: extractErrorMessage(error) }, 'Failed to close MCP transport');
      });
      server.close().catch((error: unknown) => {
        logger.warn({ error: extractErrorMessage(error) }, 'Failed to close MCP server');
      });
    });

    const timer = createTimer(logger, 'mcp-request');

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
      timer.end();
    } catch (error) {
      timer.error(extractErrorMessage(error));
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: ErrorCode.InternalError, message: 'Internal server error' },
          id: null,
        });
      }
    }
  };
}
