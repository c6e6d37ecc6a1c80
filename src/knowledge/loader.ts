/**
 * Knowledge Loader
 * Reads the five JSON collections from the data directory into a frozen snapshot.
 *
 * A missing or unreadable source degrades to an empty collection with a warning;
 * loading never fails the process.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createLogger, createTimer, type Logger } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import {
  BestPracticeSchema,
  GovernanceRuleSchema,
  SnippetSchema,
  TipSchema,
  TroubleshootingGuideSchema,
} from './schemas';
import { createKnowledgeStore, countRecords, type KnowledgeStore } from './store';
import { COLLECTION, type CollectionName } from './types';

/**
 * Source file for each collection, relative to the data directory
 */
export const COLLECTION_FILES: Record<CollectionName, string> = {
  [COLLECTION.BEST_PRACTICES]: 'best_practices.json',
  [COLLECTION.SNIPPETS]: 'snippets.json',
  [COLLECTION.TROUBLESHOOTING]: 'troubleshooting.json',
  [COLLECTION.TIPS]: 'tips.json',
  [COLLECTION.GOVERNANCE]: 'governance.json',
};

export interface LoadOptions {
  logger?: Logger;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const describeEntry = (entry: unknown, index: number): string => {
  if (isObject(entry)) {
    const key = entry.id ?? entry.feature;
    if (typeof key === 'string') return key;
  }
  return `#${index}`;
};

/**
 * Read and parse one source file. Returns an empty list on any failure.
 */
async function readSource(filePath: string, logger: Logger): Promise<unknown[]> {
  if (!existsSync(filePath)) {
    logger.warn({ file: filePath }, 'Data file not found');
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    logger.warn({ file: filePath, error: extractErrorMessage(error) }, 'Failed to read data file');
    return [];
  }

  if (!Array.isArray(data)) {
    logger.warn({ file: filePath }, 'Data file does not contain a JSON array');
    return [];
  }

  return data;
}

/**
 * Validate entries one by one, dropping the ones that do not fit the schema
 */
function validateEntries<T>(
  file: string,
  entries: readonly unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger,
): T[] {
  const valid: T[] = [];

  entries.forEach((entry, index) => {
    const result = schema.safeParse(entry);
    if (result.success) {
      valid.push(result.data);
      return;
    }
    logger.warn(
      {
        file,
        entry: describeEntry(entry, index),
        errors: result.error.issues.slice(0, 5).map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
      'Entry validation failed',
    );
  });

  return valid;
}

async function loadCollection<T>(
  dataDir: string,
  name: CollectionName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger,
): Promise<T[]> {
  const file = COLLECTION_FILES[name];
  const entries = await readSource(path.join(dataDir, file), logger);
  return validateEntries(file, entries, schema, logger);
}

/**
 * Load every collection from `dataDir` and build the snapshot
 */
export async function loadKnowledgeStore(dataDir: string, options: LoadOptions = {}): Promise<KnowledgeStore> {
  const logger = (options.logger ?? createLogger()).child({ module: 'knowledge-loader' });
  const timer = createTimer(logger, 'load-knowledge');

  const [bestPractices, snippets, troubleshooting, tips, governance] = await Promise.all([
    loadCollection(dataDir, COLLECTION.BEST_PRACTICES, BestPracticeSchema, logger),
    loadCollection(dataDir, COLLECTION.SNIPPETS, SnippetSchema, logger),
    loadCollection(dataDir, COLLECTION.TROUBLESHOOTING, TroubleshootingGuideSchema, logger),
    loadCollection(dataDir, COLLECTION.TIPS, TipSchema, logger),
    loadCollection(dataDir, COLLECTION.GOVERNANCE, GovernanceRuleSchema, logger),
  ]);

  const store = createKnowledgeStore({
    best_practices: bestPractices,
    snippets,
    troubleshooting,
    tips,
    governance,
  });

  const counts = countRecords(store);
  timer.end(counts);
  logger.info({ dataDir, ...counts }, 'Knowledge base loaded');

  return store;
}
