/**
 * Unified Application Configuration
 *
 * Single source of truth for runtime configuration with Zod validation.
 * Values come from the environment (after `.env` is loaded by the CLI entry point).
 */

import { z } from 'zod';
import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { parseList } from './env-utils';

/**
 * Flattened configuration defaults
 */
export const DEFAULT_CONFIG = {
  MCP_NAME: 'MCS Best Practices',
  MCP_INSTRUCTIONS:
    'Curated Copilot Studio best practices, code snippets, troubleshooting guides, ' +
    'tips, and governance zone information for the MCS Governance Bootcamp.',
  HOST: '0.0.0.0',
  PORT: 2011,
  DATA_DIR: 'data',
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('development');
const LogLevelSchema = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  )
  .default('info');

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
    port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_CONFIG.PORT),
    host: z.string().min(1).default(DEFAULT_CONFIG.HOST),
  }),
  auth: z.object({
    apiKeys: z.array(z.string().min(1)).default([]),
  }),
  data: z.object({
    dir: z.string().min(1),
  }),
  mcp: z.object({
    name: z.string().min(1).default(DEFAULT_CONFIG.MCP_NAME),
    version: z.string(),
    instructions: z.string().default(DEFAULT_CONFIG.MCP_INSTRUCTIONS),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = AppConfig['server']['logLevel'];

/**
 * Get package version from package.json (two levels up from both src/config and dist/config)
 */
export function getPackageVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(packageJson);
    return parsed.success ? parsed.data.version : '1.0.0';
  } catch {
    return '1.0.0';
  }
}

/**
 * Treat empty strings as unset so schema defaults apply
 */
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Create configuration from environment variables and validate it
 *
 * @throws Error when a value fails validation (for example a non-numeric PORT)
 */
export function createAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: envValue(env, 'NODE_ENV'),
      logLevel: envValue(env, 'LOG_LEVEL'),
      port: envValue(env, 'PORT'),
      host: envValue(env, 'HOST'),
    },
    auth: {
      apiKeys: parseList(env.API_KEYS),
    },
    data: {
      dir: resolve(envValue(env, 'DATA_DIR') ?? join(process.cwd(), DEFAULT_CONFIG.DATA_DIR)),
    },
    mcp: {
      name: envValue(env, 'MCP_SERVER_NAME'),
      version: getPackageVersion(),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  return result.data;
}
