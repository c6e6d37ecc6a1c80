#!/usr/bin/env node
/**
 * MCS Best Practices server entry point
 */

import { config as loadEnv } from 'dotenv';
import { createAppConfig, type AppConfig } from '@/config/app-config';
import { extractErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { bootstrap } from './bootstrap';

function loadConfig(): AppConfig {
  try {
    return createAppConfig();
  } catch (error) {
    createLogger({ name: 'mcs-best-practices' }).fatal({ error: extractErrorMessage(error) }, 'Invalid configuration');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  loadEnv();

  const config = loadConfig();
  const logger = createLogger({ name: config.mcp.name, level: config.server.logLevel });

  try {
    await bootstrap({ config, logger });
  } catch {
    // bootstrap already logged the failure
    process.exit(1);
  }
}

void main();
