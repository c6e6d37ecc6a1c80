/**
 * Search Best Practices Tool
 *
 * Filters by category and difficulty, searches the remainder and lists the
 * top hits with a locator for the full record.
 */

import { ERROR_MESSAGES } from '@/lib/errors';
import {
  BEST_PRACTICE_SEARCH_FIELDS,
  filterRecords,
  formatBestPracticeHit,
  searchRecords,
} from '@/knowledge';
import { URI_SCHEMES, buildUri } from '@/resources/uri-schemes';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/mcp/context';
import { tool } from '@/types/tool';
import { searchBestPracticesSchema, type SearchBestPracticesParams } from './schema';

/** Hits shown per call */
export const BEST_PRACTICE_DISPLAY_LIMIT = 5;

async function handleSearchBestPractices(
  input: SearchBestPracticesParams,
  ctx: ToolContext,
): Promise<Result<string>> {
  const filtered = filterRecords(ctx.store.collections.best_practices, [
    { field: 'category', value: input.category },
    { field: 'difficulty', value: input.difficulty },
  ]);
  const results = searchRecords(filtered, input.query, BEST_PRACTICE_SEARCH_FIELDS);

  ctx.logger.debug({ query: input.query, matches: results.length }, 'Best practice search');

  if (results.length === 0) {
    return Success(ERROR_MESSAGES.NO_BEST_PRACTICES);
  }

  return Success(
    results
      .slice(0, BEST_PRACTICE_DISPLAY_LIMIT)
      .map((item, index) =>
        formatBestPracticeHit(item, index + 1, buildUri(URI_SCHEMES.BEST_PRACTICE, item.id)),
      )
      .join('\n'),
  );
}

export default tool({
  name: 'search_best_practices',
  description:
    'Search curated Copilot Studio best practices. Returns matching practices with title and rationale.',
  schema: searchBestPracticesSchema,
  handler: handleSearchBestPractices,
});
