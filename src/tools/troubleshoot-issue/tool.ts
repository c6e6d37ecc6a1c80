/**
 * Troubleshoot Issue Tool
 *
 * Renders the best matching guide in full and points at up to two others.
 */

import { ERROR_MESSAGES } from '@/lib/errors';
import { TROUBLESHOOTING_SEARCH_FIELDS, formatTroubleshooting, searchRecords } from '@/knowledge';
import { URI_SCHEMES, buildUri } from '@/resources/uri-schemes';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/mcp/context';
import { tool } from '@/types/tool';
import { troubleshootIssueSchema, type TroubleshootIssueParams } from './schema';

export const RELATED_GUIDE_LIMIT = 2;

async function handleTroubleshootIssue(
  input: TroubleshootIssueParams,
  ctx: ToolContext,
): Promise<Result<string>> {
  const results = searchRecords(ctx.store.collections.troubleshooting, input.issue, TROUBLESHOOTING_SEARCH_FIELDS);
  const [primary, ...related] = results;

  ctx.logger.debug({ issue: input.issue, matches: results.length }, 'Troubleshooting search');

  if (!primary) {
    return Success(ERROR_MESSAGES.NO_TROUBLESHOOTING);
  }

  const lines = [
    formatTroubleshooting(primary),
    `\nResource URI: ${buildUri(URI_SCHEMES.TROUBLESHOOTING, primary.id)}`,
  ];

  if (related.length > 0) {
    lines.push('\n**Other related guides**:');
    for (const other of related.slice(0, RELATED_GUIDE_LIMIT)) {
      lines.push(`- ${other.title ?? ''} (${buildUri(URI_SCHEMES.TROUBLESHOOTING, other.id)})`);
    }
  }

  return Success(lines.join('\n'));
}

export default tool({
  name: 'troubleshoot_issue',
  description:
    'Get step-by-step troubleshooting for Copilot Studio issues. Describe the problem or error message.',
  schema: troubleshootIssueSchema,
  handler: handleTroubleshootIssue,
});
