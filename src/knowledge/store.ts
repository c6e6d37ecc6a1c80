/**
 * Knowledge Store
 *
 * Read-only snapshot of the five collections. Built once by the composition
 * root (or per test) and passed by reference into every handler.
 */

import {
  COLLECTION,
  type CollectionName,
  type CollectionRecordMap,
  type KnowledgeCollections,
} from './types';

export interface KnowledgeStore {
  /** True once the snapshot was produced by a load or explicit construction */
  readonly loaded: boolean;
  readonly collections: KnowledgeCollections;
}

export type KnowledgeStoreInput = {
  [K in CollectionName]?: readonly CollectionRecordMap[K][];
};

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

/**
 * Build a frozen snapshot. Missing collections become empty.
 * The given records are frozen in place.
 */
export function createKnowledgeStore(input: KnowledgeStoreInput = {}, loaded = true): KnowledgeStore {
  const collections: KnowledgeCollections = {
    best_practices: deepFreeze([...(input.best_practices ?? [])]),
    snippets: deepFreeze([...(input.snippets ?? [])]),
    troubleshooting: deepFreeze([...(input.troubleshooting ?? [])]),
    tips: deepFreeze([...(input.tips ?? [])]),
    governance: deepFreeze([...(input.governance ?? [])]),
  };

  return Object.freeze({ loaded, collections: Object.freeze(collections) });
}

/**
 * Snapshot with no data, reported as not loaded
 */
export function createEmptyKnowledgeStore(): KnowledgeStore {
  return createKnowledgeStore({}, false);
}

/**
 * Record count per collection
 */
export function countRecords(store: KnowledgeStore): Record<CollectionName, number> {
  return {
    [COLLECTION.BEST_PRACTICES]: store.collections.best_practices.length,
    [COLLECTION.SNIPPETS]: store.collections.snippets.length,
    [COLLECTION.TROUBLESHOOTING]: store.collections.troubleshooting.length,
    [COLLECTION.TIPS]: store.collections.tips.length,
    [COLLECTION.GOVERNANCE]: store.collections.governance.length,
  };
}
