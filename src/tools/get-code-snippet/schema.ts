/**
 * get_code_snippet input schema
 */

import { z } from 'zod';

export const getCodeSnippetSchema = z.object({
  query: z.string().describe('What the snippet should do, e.g. "send email" or "parse json"'),
  language: z
    .string()
    .optional()
    .describe('Snippet language: power-fx, yaml, json, or "any" for every language'),
});

export type GetCodeSnippetParams = z.infer<typeof getCodeSnippetSchema>;
