import { z } from 'zod';

export const checkGovernanceZoneSchema = z.object({
  feature: z
    .string()
    .describe('Feature name or display name, e.g. "http-connector", "MCP servers" or "code_interpreter"'),
});

export type CheckGovernanceZoneParams = z.infer<typeof checkGovernanceZoneSchema>;
