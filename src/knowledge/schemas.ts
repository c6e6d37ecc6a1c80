/**
 * Zod schemas for the five knowledge collections.
 *
 * Schemas pass unknown keys through so the REST layer can return a record
 * exactly as stored. `null` or a wrongly typed value in an optional field is
 * read as "absent"; only a missing key rejects an entry.
 */

import { z } from 'zod';
import type {
  BestPractice,
  GovernanceRule,
  Snippet,
  Tip,
  TroubleshootingGuide,
} from './types';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)
  .catch(undefined);

const optionalList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? undefined)
  .catch(undefined);

export const BestPracticeSchema: z.ZodType<BestPractice, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    title: optionalText,
    description: optionalText,
    category: optionalText,
    difficulty: optionalText,
    rationale: optionalText,
    example_good: optionalText,
    example_bad: optionalText,
    tags: optionalList,
  })
  .passthrough();

export const SnippetSchema: z.ZodType<Snippet, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    title: optionalText,
    language: optionalText,
    use_case: optionalText,
    code: optionalText,
    explanation: optionalText,
    description: optionalText,
    tags: optionalList,
  })
  .passthrough();

const TroubleshootingStepSchema = z
  .object({
    step: z
      .union([z.number(), z.string()])
      .nullish()
      .transform((value) => value ?? undefined)
      .catch(undefined),
    action: optionalText,
    details: optionalText,
  })
  .passthrough();

export const TroubleshootingGuideSchema: z.ZodType<TroubleshootingGuide, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    title: optionalText,
    category: optionalText,
    symptoms: optionalList,
    causes: optionalList,
    steps: z
      .array(TroubleshootingStepSchema)
      .nullish()
      .transform((value) => value ?? undefined)
      .catch(undefined),
    tags: optionalList,
  })
  .passthrough();

export const TipSchema: z.ZodType<Tip, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    title: optionalText,
    tip: optionalText,
    why_it_matters: optionalText,
    category: optionalText,
    tags: optionalList,
  })
  .passthrough();

const ZoneAvailabilitySchema = z
  .object({
    available: z
      .boolean()
      .nullish()
      .transform((value) => value ?? false)
      .catch(false),
    reason: optionalText,
    requirements: optionalList,
  })
  .passthrough();

export const GovernanceRuleSchema: z.ZodType<GovernanceRule, z.ZodTypeDef, unknown> = z
  .object({
    feature: z.string().min(1),
    display_name: optionalText,
    minimum_zone: optionalText,
    zones: z
      .record(z.string(), ZoneAvailabilitySchema)
      .nullish()
      .transform((value) => value ?? undefined)
      .catch(undefined),
    justification_template: optionalText,
  })
  .passthrough();
