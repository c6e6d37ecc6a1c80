/**
 * Startup and shutdown logging shared by the CLI entry point.
 */

import type { Logger } from 'pino';
import { extractErrorMessage } from './errors';

export interface StartupInfo {
  appName: string;
  version: string;
  host: string;
  port: number;
  dataDir: string;
  logLevel: string;
  toolCount: number;
  resourceCount: number;
  apiKeyCount: number;
}

export interface Stoppable {
  stop(): Promise<void>;
}

export function logStartup(info: StartupInfo, logger: Logger): void {
  logger.info(
    {
      version: info.version,
      host: info.host,
      port: info.port,
      dataDir: info.dataDir,
      logLevel: info.logLevel,
      tools: info.toolCount,
      resources: info.resourceCount,
    },
    `Starting ${info.appName}`,
  );

  if (info.apiKeyCount === 0) {
    logger.warn('No API keys configured (API_KEYS); every protected request will be rejected');
  }
}

export function logStartupSuccess(url: string, logger: Logger): void {
  logger.info({ url, mcp: `${url}/mcp`, health: `${url}/health` }, 'Server listening');
}

export function logStartupFailure(error: unknown, logger: Logger): void {
  logger.fatal({ error: extractErrorMessage(error) }, 'Failed to start server');
}

/**
 * Stop the runtime on SIGINT / SIGTERM and exit
 */
export function installShutdownHandlers(runtime: Stoppable, logger: Logger): void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: extractErrorMessage(error), signal }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
