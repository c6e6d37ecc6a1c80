import { z } from 'zod';

export const getTipsForFeatureSchema = z.object({
  feature: z.string().describe('Feature or area, e.g. "topics", "testing" or "authoring"'),
});

export type GetTipsForFeatureParams = z.infer<typeof getTipsForFeatureSchema>;
