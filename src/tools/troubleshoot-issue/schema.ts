import { z } from 'zod';

export const troubleshootIssueSchema = z.object({
  issue: z.string().describe('The problem or error message, e.g. "403 from HTTP connector"'),
});

export type TroubleshootIssueParams = z.infer<typeof troubleshootIssueSchema>;
