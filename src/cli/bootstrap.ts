/**
 * Bootstrap helper: load the knowledge base, start the HTTP server and
 * install the shutdown handlers.
 */

import type { Logger } from 'pino';
import { createApp, type AppRuntime } from '@/app';
import type { AppConfig } from '@/config/app-config';
import { loadKnowledgeStore } from '@/knowledge';
import {
  installShutdownHandlers,
  logStartup,
  logStartupFailure,
  logStartupSuccess,
} from '@/lib/runtime-logging';
import { KNOWLEDGE_RESOURCES } from '@/resources/knowledge-resources';
import { ALL_TOOLS } from '@/tools';

export interface BootstrapConfig {
  config: AppConfig;
  logger: Logger;
}

export interface BootstrapResult {
  app: AppRuntime;
  url: string;
}

/**
 * @throws when the server cannot listen (e.g. the port is taken)
 */
export async function bootstrap({ config, logger }: BootstrapConfig): Promise<BootstrapResult> {
  try {
    logStartup(
      {
        appName: config.mcp.name,
        version: config.mcp.version,
        host: config.server.host,
        port: config.server.port,
        dataDir: config.data.dir,
        logLevel: config.server.logLevel,
        toolCount: ALL_TOOLS.length,
        resourceCount: KNOWLEDGE_RESOURCES.length,
        apiKeyCount: config.auth.apiKeys.length,
      },
      logger,
    );

    const store = await loadKnowledgeStore(config.data.dir, { logger: logger.child({ module: 'knowledge' }) });
    const app = createApp({ store, config, logger });
    const address = await app.listen(config.server.port, config.server.host);
    const url = `http://${config.server.host}:${address.port}`;

    logStartupSuccess(url, logger);
    installShutdownHandlers(app, logger);

    return { app, url };
  } catch (error) {
    logStartupFailure(error, logger);
    throw error;
  }
}
