/**
 * Check Governance Zone Tool
 *
 * Resolves a loosely written feature name to its governance record and
 * renders the per-zone availability.
 */

import { ERROR_MESSAGES } from '@/lib/errors';
import { findGovernanceFeature, formatGovernance } from '@/knowledge';
import { URI_SCHEMES, buildUri } from '@/resources/uri-schemes';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/mcp/context';
import { tool } from '@/types/tool';
import { checkGovernanceZoneSchema, type CheckGovernanceZoneParams } from './schema';

async function handleCheckGovernanceZone(
  input: CheckGovernanceZoneParams,
  ctx: ToolContext,
): Promise<Result<string>> {
  const rule = findGovernanceFeature(ctx.store.collections.governance, input.feature);

  ctx.logger.debug({ feature: input.feature, match: rule?.feature }, 'Governance lookup');

  if (!rule) {
    return Success(ERROR_MESSAGES.NO_GOVERNANCE(input.feature));
  }

  return Success(
    `${formatGovernance(rule)}\n\nResource URI: ${buildUri(URI_SCHEMES.GOVERNANCE, rule.feature)}`,
  );
}

export default tool({
  name: 'check_governance_zone',
  description:
    'Check what governance zone is required for a Copilot Studio feature like http-connector, mcp-servers, etc.',
  schema: checkGovernanceZoneSchema,
  handler: handleCheckGovernanceZone,
});
