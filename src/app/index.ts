/**
 * Application runtime: wires the HTTP app to a knowledge snapshot and owns
 * the listening server.
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { Express } from 'express';
import { createHttpApp } from '@/api/server';
import type { AppConfig } from '@/config/app-config';
import { createLogger, type Logger } from '@/lib/logger';
import type { KnowledgeStore } from '@/knowledge';

export interface AppRuntimeConfig {
  store: KnowledgeStore;
  config: AppConfig;
  logger?: Logger;
}

export interface AppRuntime {
  readonly app: Express;
  readonly store: KnowledgeStore;
  /** Start listening; port 0 picks a free port */
  listen(port: number, host: string): Promise<AddressInfo>;
  /** Close the listening server, dropping idle keep-alive connections */
  stop(): Promise<void>;
}

export function createApp({ store, config, logger }: AppRuntimeConfig): AppRuntime {
  const log = logger ?? createLogger({ name: config.mcp.name, level: config.server.logLevel });
  const app = createHttpApp({ store, config, logger: log });
  let server: Server | undefined;

  return {
    app,
    store,

    listen(port, host) {
      return new Promise((resolve, reject) => {
        const listening = app.listen(port, host);
        listening.once('error', reject);
        listening.once('listening', () => {
          const address = listening.address();
          if (address === null || typeof address === 'string') {
            reject(new Error(`Unexpected server address: ${String(address)}`));
            return;
          }
          server = listening;
          resolve(address);
        });
      });
    },

    stop() {
      const current = server;
      server = undefined;
      if (!current) {
        return Promise.resolve();
      }
      return new Promise((resolve, reject) => {
        current.close((error) => (error ? reject(error) : resolve()));
        current.closeAllConnections();
      });
    },
  };
}
