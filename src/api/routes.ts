/**
 * REST routes under /api/v1.
 *
 * Thin adapters over the lookup engine: read query parameters, filter, rank,
 * and wrap the records in `{ results, total }`.
 */

import { Router, type Request, type Response } from 'express';
import { ERROR_MESSAGES } from '@/lib/errors';
import {
  BEST_PRACTICE_SEARCH_FIELDS,
  SEARCH_LIMIT,
  SNIPPET_SEARCH_FIELDS,
  TROUBLESHOOTING_SEARCH_FIELDS,
  filterRecords,
  findById,
  findGovernanceFeature,
  languageFilter,
  rankRecords,
  type KnowledgeStore,
  type RecordField,
} from '@/knowledge';

export const API_PREFIX = '/api/v1';

export interface SearchResponse<T> {
  results: readonly T[];
  total: number;
}

/**
 * Single non-empty string query parameter, otherwise undefined
 */
export function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Cap ranked results; `total` counts everything that matched
 */
function page<T>(ranked: readonly T[]): SearchResponse<T> {
  return { results: ranked.slice(0, SEARCH_LIMIT), total: ranked.length };
}

/**
 * Rank by the query when one is given; otherwise keep every record in stored order
 */
function match<T>(items: readonly T[], query: string | undefined, fields: readonly RecordField<T>[]): T[] {
  return query ? rankRecords(items, query, fields) : [...items];
}

function sendRecord<T>(res: Response, record: T | undefined): void {
  if (record === undefined) {
    res.status(404).json({ detail: ERROR_MESSAGES.NOT_FOUND });
    return;
  }
  res.json(record);
}

export function createApiRoutes(store: KnowledgeStore): Router {
  const router = Router();
  const { collections } = store;

  router.get('/best-practices', (req, res) => {
    const filtered = filterRecords(collections.best_practices, [
      { field: 'category', value: queryParam(req, 'category') },
      { field: 'difficulty', value: queryParam(req, 'difficulty') },
    ]);
    res.json(page(match(filtered, queryParam(req, 'q'), BEST_PRACTICE_SEARCH_FIELDS)));
  });

  router.get('/best-practices/:id', (req, res) => {
    sendRecord(res, findById(collections.best_practices, req.params.id));
  });

  router.get('/snippets', (req, res) => {
    const filtered = filterRecords(collections.snippets, [
      { field: 'language', value: languageFilter(queryParam(req, 'language')) },
    ]);
    res.json(page(match(filtered, queryParam(req, 'q'), SNIPPET_SEARCH_FIELDS)));
  });

  router.get('/snippets/:id', (req, res) => {
    sendRecord(res, findById(collections.snippets, req.params.id));
  });

  router.get('/troubleshooting', (req, res) => {
    const filtered = filterRecords(collections.troubleshooting, [
      { field: 'category', value: queryParam(req, 'category') },
    ]);
    res.json(page(match(filtered, queryParam(req, 'q'), TROUBLESHOOTING_SEARCH_FIELDS)));
  });

  router.get('/troubleshooting/:id', (req, res) => {
    sendRecord(res, findById(collections.troubleshooting, req.params.id));
  });

  router.get('/tips', (req, res) => {
    const results = filterRecords(collections.tips, [{ field: 'category', value: queryParam(req, 'category') }]);
    res.json({ results, total: results.length });
  });

  router.get('/tips/:id', (req, res) => {
    sendRecord(res, findById(collections.tips, req.params.id));
  });

  router.get('/governance', (_req, res) => {
    res.json({ results: collections.governance, total: collections.governance.length });
  });

  router.get('/governance/:feature', (req, res) => {
    const rule = findGovernanceFeature(collections.governance, req.params.feature);
    if (!rule) {
      res.status(404).json({ detail: ERROR_MESSAGES.GOVERNANCE_NOT_FOUND(req.params.feature) });
      return;
    }
    res.json(rule);
  });

  return router;
}
