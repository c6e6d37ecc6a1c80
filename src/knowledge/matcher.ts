/**
 * Knowledge Matcher
 *
 * Pure lookup functions over a collection: identifier lookup, exact-match
 * filters and substring search with additive scoring. Nothing here throws;
 * absence is reported as `undefined` or an empty list.
 */

import type { KnowledgeStore } from './store';
import type {
  BestPractice,
  GovernanceRule,
  KnowledgeEntry,
  KnowledgeKind,
  Snippet,
  Tip,
  TroubleshootingGuide,
} from './types';

/** Maximum number of records a search returns */
export const SEARCH_LIMIT = 10;

/** Snippet language value meaning "every language" */
export const ANY_LANGUAGE = 'any';

/** Field names of a record type that search and filters may read */
export type RecordField<T> = Extract<keyof T, string>;

/** Fields searched for each searchable collection */
export const BEST_PRACTICE_SEARCH_FIELDS: readonly RecordField<BestPractice>[] = [
  'title',
  'description',
  'tags',
  'rationale',
];
export const SNIPPET_SEARCH_FIELDS: readonly RecordField<Snippet>[] = ['title', 'description', 'tags', 'use_case'];
export const TROUBLESHOOTING_SEARCH_FIELDS: readonly RecordField<TroubleshootingGuide>[] = [
  'title',
  'symptoms',
  'causes',
  'tags',
];

export interface FieldFilter<T> {
  field: RecordField<T>;
  /** Exact value to match; `undefined` or empty disables the filter */
  value: string | undefined;
}

/**
 * First record whose `id` equals `id` exactly
 */
export function findById<T extends { id: string }>(items: readonly T[], id: string): T | undefined {
  return items.find((item) => item.id === id);
}

/**
 * Apply exact, case-sensitive equality filters as a conjunction.
 * A record without the filtered field never matches.
 */
export function filterRecords<T>(items: readonly T[], filters: readonly FieldFilter<T>[]): T[] {
  const active = filters.filter((filter) => filter.value !== undefined && filter.value !== '');
  if (active.length === 0) return [...items];

  return items.filter((item) =>
    active.every((filter) => {
      const actual: unknown = item[filter.field];
      return actual === filter.value;
    }),
  );
}

/**
 * Map the `language` query value to a filter value, treating `any` as no filter
 */
export function languageFilter(language: string | undefined): string | undefined {
  return language === ANY_LANGUAGE ? undefined : language;
}

/**
 * Relevance of one record: +1 per string field containing the query and
 * +1 per string element of an array field containing it.
 */
export function scoreRecord<T>(item: T, lowerQuery: string, fields: readonly RecordField<T>[]): number {
  let score = 0;

  for (const field of fields) {
    const value: unknown = item[field];
    if (typeof value === 'string') {
      if (value.toLowerCase().includes(lowerQuery)) score += 1;
    } else if (Array.isArray(value)) {
      const elements: readonly unknown[] = value;
      for (const element of elements) {
        if (typeof element === 'string' && element.toLowerCase().includes(lowerQuery)) {
          score += 1;
        }
      }
    }
  }

  return score;
}

/**
 * Every record matching `query`, highest score first. Ties keep stored order.
 */
export function rankRecords<T>(items: readonly T[], query: string, fields: readonly RecordField<T>[]): T[] {
  const lowerQuery = query.toLowerCase();

  return items
    .map((item) => ({ item, score: scoreRecord(item, lowerQuery, fields) }))
    .filter((match) => match.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((match) => match.item);
}

/**
 * Search a collection. An empty query returns the first records unranked.
 * At most {@link SEARCH_LIMIT} records are returned.
 */
export function searchRecords<T>(items: readonly T[], query: string, fields: readonly RecordField<T>[]): T[] {
  if (!query) {
    return items.slice(0, SEARCH_LIMIT);
  }
  return rankRecords(items, query, fields).slice(0, SEARCH_LIMIT);
}

/**
 * Normalize a feature name the way governance records are keyed:
 * lowercase with spaces and underscores turned into hyphens.
 */
export function normalizeFeatureName(feature: string): string {
  return feature.toLowerCase().replace(/[ _]/g, '-');
}

/**
 * Fuzzy governance lookup. Priority across the whole collection:
 * exact feature, then substring of feature, then substring of display name.
 */
export function findGovernanceFeature(
  items: readonly GovernanceRule[],
  feature: string,
): GovernanceRule | undefined {
  const normalized = normalizeFeatureName(feature);

  return (
    items.find((item) => item.feature === normalized) ??
    items.find((item) => item.feature.includes(normalized)) ??
    items.find((item) => (item.display_name ?? '').toLowerCase().includes(normalized))
  );
}

/**
 * Governance lookup by exact feature after normalization
 */
export function findGovernanceExact(
  items: readonly GovernanceRule[],
  feature: string,
): GovernanceRule | undefined {
  const normalized = normalizeFeatureName(feature);
  return items.find((item) => item.feature === normalized);
}

/**
 * Tips whose category, title or tags mention `feature` (case-insensitive)
 */
export function findTipsForFeature(items: readonly Tip[], feature: string): Tip[] {
  const lowerFeature = feature.toLowerCase();

  return items.filter(
    (item) =>
      (item.category ?? '').toLowerCase().includes(lowerFeature) ||
      (item.title ?? '').toLowerCase().includes(lowerFeature) ||
      (item.tags ?? []).join(' ').toLowerCase().includes(lowerFeature),
  );
}

/**
 * Look up one record of the given kind by its key and tag it with that kind
 */
export function findEntry(store: KnowledgeStore, kind: KnowledgeKind, key: string): KnowledgeEntry | undefined {
  const { collections } = store;

  switch (kind) {
    case 'best_practice': {
      const record = findById(collections.best_practices, key);
      return record && { kind: 'best_practice', record };
    }
    case 'snippet': {
      const record = findById(collections.snippets, key);
      return record && { kind: 'snippet', record };
    }
    case 'troubleshooting': {
      const record = findById(collections.troubleshooting, key);
      return record && { kind: 'troubleshooting', record };
    }
    case 'tip': {
      const record = findById(collections.tips, key);
      return record && { kind: 'tip', record };
    }
    case 'governance': {
      const record = findGovernanceExact(collections.governance, key);
      return record && { kind: 'governance', record };
    }
  }
}
