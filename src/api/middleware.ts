/**
 * Express middleware: CORS, MCP content negotiation, API key check,
 * request logging and the terminal 404 / 500 handlers.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import type { Logger } from '@/lib/logger';

export const API_KEY_HEADER = 'x-api-key';
export const MCP_PATH = '/mcp';
export const HEALTH_PATH = '/health';

const MCP_ACCEPT = 'application/json, text/event-stream';

/** Body of the unauthenticated `GET /mcp` probe */
export const MCP_PROBE_BODY = {
  status: 'ok',
  server: 'MCS Best Practices MCP',
  protocol: 'mcp-streamable-1.0',
} as const;

const isMcpPath = (path: string): boolean => path === MCP_PATH || path.startsWith(`${MCP_PATH}/`);

/**
 * Allow every origin, method and request header; answer pre-flight directly
 */
export function cors(req: Request, res: Response, next: NextFunction): void {
  res.header('Access-Control-Allow-Origin', '*');
  res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  res.header('Access-Control-Allow-Headers', req.header('access-control-request-headers') ?? '*');

  if (req.method === 'OPTIONS') {
    res.sendStatus(204);
    return;
  }
  next();
}

/**
 * Streamable HTTP rejects POSTs that do not accept SSE. Clients that only
 * send `application/json` get the header rewritten so they can still talk
 * to the endpoint. The raw header list is patched as well since the
 * transport rebuilds its request from it.
 */
export function ensureMcpAcceptHeader(req: Request, _res: Response, next: NextFunction): void {
  if (req.method !== 'POST' || !isMcpPath(req.path)) {
    next();
    return;
  }

  const accept = req.headers.accept ?? '';
  if (!accept.includes('text/event-stream')) {
    req.headers.accept = MCP_ACCEPT;

    const index = req.rawHeaders.findIndex((name, i) => i % 2 === 0 && name.toLowerCase() === 'accept');
    if (index >= 0) {
      req.rawHeaders[index + 1] = MCP_ACCEPT;
    } else {
      req.rawHeaders.push('Accept', MCP_ACCEPT);
    }
  }
  next();
}

/**
 * Require a known `X-API-Key` on everything except health and the MCP probe.
 * An empty allow-list rejects every protected request.
 */
export function createAuthMiddleware(apiKeys: readonly string[], logger: Logger): RequestHandler {
  const allowed = new Set(apiKeys);

  return (req, res, next) => {
    if (req.path === HEALTH_PATH) {
      next();
      return;
    }

    if (req.method === 'GET' && isMcpPath(req.path)) {
      res.json(MCP_PROBE_BODY);
      return;
    }

    const key = req.header(API_KEY_HEADER);
    if (!key || !allowed.has(key)) {
      logger.warn({ method: req.method, path: req.path, keyPresent: Boolean(key) }, 'Rejected request');
      res.status(401).json({ detail: ERROR_MESSAGES.UNAUTHORIZED });
      return;
    }
    next();
  };
}

/**
 * Log one line per completed request
 */
export function createRequestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
        'Request completed',
      );
    });
    next();
  };
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ detail: ERROR_MESSAGES.NOT_FOUND });
}

const hasStatus = (error: unknown): error is { status: number } =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';

/**
 * Malformed bodies are reported as 400; anything else is logged and answered with 500
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      res.status(error.status).json({ detail: extractErrorMessage(error) });
      return;
    }

    logger.error({ error: extractErrorMessage(error), method: req.method, path: req.path }, 'Unhandled request error');
    res.status(500).json({ detail: ERROR_MESSAGES.INTERNAL });
  };
}
