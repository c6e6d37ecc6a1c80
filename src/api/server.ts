/**
 * HTTP application: health, REST API and the MCP endpoint on one express app.
 */

import express, { type Express } from 'express';
import type { AppConfig } from '@/config/app-config';
import type { Logger } from '@/lib/logger';
import type { KnowledgeStore } from '@/knowledge';
import { createMcpHttpHandler } from '@/mcp/http-transport';
import {
  HEALTH_PATH,
  MCP_PATH,
  cors,
  createAuthMiddleware,
  createErrorHandler,
  createRequestLogger,
  ensureMcpAcceptHeader,
  notFound,
} from './middleware';
import { API_PREFIX, createApiRoutes } from './routes';

export interface HttpAppOptions {
  store: KnowledgeStore;
  config: AppConfig;
  logger: Logger;
}

export function createHttpApp({ store, config, logger }: HttpAppOptions): Express {
  const log = logger.child({ module: 'http' });
  const app = express();

  app.disable('x-powered-by');

  app.use(createRequestLogger(log));
  app.use(cors);
  app.use(ensureMcpAcceptHeader);
  app.use(createAuthMiddleware(config.auth.apiKeys, log));

  app.get(HEALTH_PATH, (_req, res) => {
    res.json({ status: 'healthy', data_loaded: store.loaded });
  });

  app.use(API_PREFIX, createApiRoutes(store));

  const handleMcp = createMcpHttpHandler(store, {
    name: config.mcp.name,
    version: config.mcp.version,
    instructions: config.mcp.instructions,
    logger,
  });

  app.post(MCP_PATH, express.json(), (req, res, next) => {
    handleMcp(req, res).catch(next);
  });

  // Stateless: no SSE stream to resume and no session to end
  app.delete(MCP_PATH, (_req, res) => {
    res.status(405).set('Allow', 'GET, POST').json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });

  app.use(notFound);
  app.use(createErrorHandler(log));

  return app;
}
