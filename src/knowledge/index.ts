/**
 * Knowledge Base – public API
 */
export type * from './types';
export { COLLECTION } from './types';
export {
  createKnowledgeStore,
  createEmptyKnowledgeStore,
  countRecords,
  type KnowledgeStore,
  type KnowledgeStoreInput,
} from './store';
export { loadKnowledgeStore, COLLECTION_FILES } from './loader';
export {
  SEARCH_LIMIT,
  ANY_LANGUAGE,
  BEST_PRACTICE_SEARCH_FIELDS,
  SNIPPET_SEARCH_FIELDS,
  TROUBLESHOOTING_SEARCH_FIELDS,
  findById,
  filterRecords,
  languageFilter,
  scoreRecord,
  rankRecords,
  searchRecords,
  normalizeFeatureName,
  findGovernanceFeature,
  findGovernanceExact,
  findTipsForFeature,
  findEntry,
  type FieldFilter,
  type RecordField,
} from './matcher';
export * from './formatters';
