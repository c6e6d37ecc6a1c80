/**
 * Get Code Snippet Tool
 *
 * Returns copy-paste ready snippets, each with its code block and explanation.
 */

import { ERROR_MESSAGES } from '@/lib/errors';
import {
  SNIPPET_SEARCH_FIELDS,
  filterRecords,
  formatSnippetHit,
  languageFilter,
  searchRecords,
} from '@/knowledge';
import { URI_SCHEMES, buildUri } from '@/resources/uri-schemes';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/mcp/context';
import { tool } from '@/types/tool';
import { getCodeSnippetSchema, type GetCodeSnippetParams } from './schema';

export const SNIPPET_DISPLAY_LIMIT = 3;

async function handleGetCodeSnippet(input: GetCodeSnippetParams, ctx: ToolContext): Promise<Result<string>> {
  const filtered = filterRecords(ctx.store.collections.snippets, [
    { field: 'language', value: languageFilter(input.language) },
  ]);
  const results = searchRecords(filtered, input.query, SNIPPET_SEARCH_FIELDS);

  ctx.logger.debug({ query: input.query, language: input.language, matches: results.length }, 'Snippet search');

  if (results.length === 0) {
    return Success(ERROR_MESSAGES.NO_SNIPPETS);
  }

  return Success(
    results
      .slice(0, SNIPPET_DISPLAY_LIMIT)
      .map((item) => formatSnippetHit(item, buildUri(URI_SCHEMES.SNIPPET, item.id)))
      .join('\n'),
  );
}

export default tool({
  name: 'get_code_snippet',
  description:
    'Get copy-paste ready code snippets for Copilot Studio. Supports power-fx, yaml, json, or any language.',
  schema: getCodeSnippetSchema,
  handler: handleGetCodeSnippet,
});
