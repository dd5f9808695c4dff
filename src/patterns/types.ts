/**
 * Pattern records as persisted in the automation state.
 *
 * Keys are snake_case to stay compatible with state files written by
 * earlier versions of the updater.
 */

import { z } from 'zod';

/** Example quotes kept per pattern. */
export const MAX_EXAMPLES = 3;

export const PatternOriginSchema = z.enum(['static', 'dynamic']);

export const PatternExampleSchema = z.object({
  session_id: z.string().optional(),
  text: z.string(),
}).passthrough();

export const PatternRecordSchema = z.object({
  identifier: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  /** Lowercase phrases that mark a session as showing this pattern. */
  keywords: z.array(z.string()).default([]),
  /** Guidance lines; `{count}` is replaced with the occurrence count. */
  bullets: z.array(z.string()).default([]),
  examples: z.array(PatternExampleSchema).default([]),
  occurrence_count: z.number().int().min(0).default(0),
  /** 1-10, dynamic patterns only. */
  novelty_score: z.number().int().min(1).max(10).optional(),
  origin: PatternOriginSchema,
  discovered_at: z.string().optional(),
}).passthrough();

/** Static category definition from the catalog file. */
export const StaticCategorySchema = z.object({
  identifier: z.string().regex(/^[a-z0-9_-]+$/),
  title: z.string().min(1),
  description: z.string(),
  keywords: z.array(z.string().min(1)).min(1),
  bullets: z.array(z.string().min(1)).min(1),
});

export const StaticCatalogSchema = z.array(StaticCategorySchema).min(1);

export type PatternOrigin = z.infer<typeof PatternOriginSchema>;
export type PatternExample = z.infer<typeof PatternExampleSchema>;
export type PatternRecord = z.infer<typeof PatternRecordSchema>;
export type StaticCategory = z.infer<typeof StaticCategorySchema>;
