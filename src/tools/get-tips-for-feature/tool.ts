/**
 * Get Tips For Feature Tool
 */

import { ERROR_MESSAGES } from '@/lib/errors';
import { findTipsForFeature, formatTipHit } from '@/knowledge';
import { URI_SCHEMES, buildUri } from '@/resources/uri-schemes';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/mcp/context';
import { tool } from '@/types/tool';
import { getTipsForFeatureSchema, type GetTipsForFeatureParams } from './schema';

export const TIP_DISPLAY_LIMIT = 5;

async function handleGetTipsForFeature(
  input: GetTipsForFeatureParams,
  ctx: ToolContext,
): Promise<Result<string>> {
  const results = findTipsForFeature(ctx.store.collections.tips, input.feature);

  ctx.logger.debug({ feature: input.feature, matches: results.length }, 'Tip lookup');

  if (results.length === 0) {
    return Success(ERROR_MESSAGES.NO_TIPS(input.feature));
  }

  return Success(
    results
      .slice(0, TIP_DISPLAY_LIMIT)
      .map((item) => formatTipHit(item, buildUri(URI_SCHEMES.TIP, item.id)))
      .join('\n'),
  );
}

export default tool({
  name: 'get_tips_for_feature',
  description:
    'Get tips and tricks for a specific Copilot Studio feature like topics, testing, authoring, etc.',
  schema: getTipsForFeatureSchema,
  handler: handleGetTipsForFeature,
});
