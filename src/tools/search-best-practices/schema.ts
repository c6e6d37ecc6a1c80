/**
 * search_best_practices input schema
 */

import { z } from 'zod';

export const searchBestPracticesSchema = z.object({
  query: z.string().describe('Words to look for in the title, description, tags and rationale'),
  category: z
    .string()
    .optional()
    .describe('Only return practices in this exact category, e.g. "security" or "topics"'),
  difficulty: z
    .string()
    .optional()
    .describe('Only return practices of this exact difficulty: beginner, intermediate or advanced'),
});

export type SearchBestPracticesParams = z.infer<typeof searchBestPracticesSchema>;
