/**
 * Knowledge resources: one URI template per collection, each resolving to the
 * full-detail rendering of a single record.
 *
 * Absence is answered with a plain sentence, never a protocol error.
 */

import { ERROR_MESSAGES } from '@/lib/errors';
import { findEntry, formatEntry, type KnowledgeKind, type KnowledgeStore } from '@/knowledge';
import { URI_SCHEMES, uriTemplate, type UriScheme } from './uri-schemes';

export interface KnowledgeResource {
  /** Registration name */
  name: string;
  scheme: UriScheme;
  kind: KnowledgeKind;
  /** Template variable carrying the record key */
  variable: 'id' | 'feature';
  description: string;
  notFound: (key: string) => string;
}

export const KNOWLEDGE_RESOURCES: readonly KnowledgeResource[] = [
  {
    name: 'best_practice',
    scheme: URI_SCHEMES.BEST_PRACTICE,
    kind: 'best_practice',
    variable: 'id',
    description:
      'Full best practice detail including description, rationale, examples, difficulty, and tags.',
    notFound: ERROR_MESSAGES.BEST_PRACTICE_NOT_FOUND,
  },
  {
    name: 'snippet',
    scheme: URI_SCHEMES.SNIPPET,
    kind: 'snippet',
    variable: 'id',
    description: 'Full code snippet with code block, explanation, and use case.',
    notFound: ERROR_MESSAGES.SNIPPET_NOT_FOUND,
  },
  {
    name: 'troubleshooting',
    scheme: URI_SCHEMES.TROUBLESHOOTING,
    kind: 'troubleshooting',
    variable: 'id',
    description: 'Full troubleshooting guide with symptoms, causes, and step-by-step resolution.',
    notFound: ERROR_MESSAGES.TROUBLESHOOTING_NOT_FOUND,
  },
  {
    name: 'tip',
    scheme: URI_SCHEMES.TIP,
    kind: 'tip',
    variable: 'id',
    description: 'Full tip with explanation and why it matters.',
    notFound: ERROR_MESSAGES.TIP_NOT_FOUND,
  },
  {
    name: 'governance',
    scheme: URI_SCHEMES.GOVERNANCE,
    kind: 'governance',
    variable: 'feature',
    description:
      'Full governance zone information including availability per zone and justification template.',
    notFound: ERROR_MESSAGES.GOVERNANCE_RESOURCE_NOT_FOUND,
  },
];

/**
 * Template string for a resource, e.g. `bestpractice://{id}`
 */
export const resourceTemplate = (resource: KnowledgeResource): string =>
  uriTemplate(resource.scheme, resource.variable);

/**
 * Render the record behind a resource key, or the not-found sentence
 */
export function readKnowledgeResource(
  store: KnowledgeStore,
  resource: KnowledgeResource,
  key: string,
): string {
  const entry = findEntry(store, resource.kind, key);
  return entry ? formatEntry(entry) : resource.notFound(key);
}
