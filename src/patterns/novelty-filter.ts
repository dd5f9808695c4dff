/**
 * Turns discovery candidates into pattern records.
 *
 * Dynamic mode keeps candidates whose novelty reaches the threshold and
 * mints a `dynamic-<slug>` record for each. Static mode never creates
 * records: a candidate is folded into the catalog category it overlaps
 * most, or dropped when it overlaps none.
 */

import type { EffectiveMode, PatternCandidate } from '../discovery/types.js';
import type { PatternExample, PatternRecord, StaticCategory } from './types.js';
import { MAX_EXAMPLES } from './types.js';
import { jaccardSimilarity, keywordsOf, slugify, uniqueIdentifier } from './text-utils.js';

export interface NoveltyFilterOptions {
  mode: EffectiveMode;
  threshold: number;
  catalog: StaticCategory[];
  /** ISO timestamp stamped on new records as `discovered_at`. */
  discoveredAt: string;
}

export interface NoveltyFilterResult {
  /** New dynamic records, not yet in `patterns`. */
  added: PatternRecord[];
  /** Static identifiers that received folded examples. */
  folded: string[];
  /** Titles that were dropped, with the reason. */
  discarded: Array<{ title: string; reason: 'below-threshold' | 'no-category' }>;
}

/**
 * Seed or refresh one record per catalog category. Catalog text wins;
 * counts and examples already in state are kept.
 *
 * @returns Identifiers of categories that had no record yet
 */
export function syncStaticPatterns(
  patterns: Record<string, PatternRecord>,
  catalog: StaticCategory[],
): string[] {
  const seeded: string[] = [];
  for (const category of catalog) {
    const existing = patterns[category.identifier];
    if (!existing) seeded.push(category.identifier);
    patterns[category.identifier] = {
      ...existing,
      identifier: category.identifier,
      title: category.title,
      description: category.description,
      keywords: category.keywords,
      bullets: category.bullets,
      examples: existing?.examples ?? [],
      occurrence_count: existing?.occurrence_count ?? 0,
      origin: 'static',
    };
  }
  return seeded;
}

/** Prepend quotes to an example list, skipping repeats, capped. */
export function mergeExamples(current: PatternExample[], incoming: PatternExample[]): PatternExample[] {
  const merged: PatternExample[] = [];
  const seen = new Set<string>();
  for (const example of [...incoming, ...current]) {
    const key = example.session_id ?? example.text;
    if (seen.has(key) || seen.has(example.text)) continue;
    seen.add(key);
    seen.add(example.text);
    merged.push(example);
    if (merged.length === MAX_EXAMPLES) break;
  }
  return merged;
}

/**
 * Index of the category with the highest keyword overlap, or -1 when
 * every overlap is zero. Ties go to the earlier category.
 */
export function bestCategoryMatch(candidate: PatternCandidate, catalog: StaticCategory[]): number {
  const candidateWords = keywordsOf(candidate.title, candidate.description, ...candidate.keywords);
  let best = -1;
  let bestScore = 0;
  catalog.forEach((category, index) => {
    const score = jaccardSimilarity(candidateWords, keywordsOf(category.title, ...category.keywords));
    if (score > bestScore) {
      best = index;
      bestScore = score;
    }
  });
  return best;
}

function toRecord(candidate: PatternCandidate, identifier: string, discoveredAt: string): PatternRecord {
  return {
    identifier,
    title: candidate.title,
    description: candidate.description,
    keywords: candidate.keywords,
    bullets: candidate.guidance,
    examples: candidate.examples.slice(0, MAX_EXAMPLES).map((text) => ({ text })),
    occurrence_count: 0,
    novelty_score: candidate.novelty,
    origin: 'dynamic',
    discovered_at: discoveredAt,
  };
}

/**
 * Apply the novelty filter. Static folds mutate `patterns` in place;
 * dynamic additions are returned for the caller to insert.
 */
export function applyNoveltyFilter(
  candidates: PatternCandidate[],
  patterns: Record<string, PatternRecord>,
  options: NoveltyFilterOptions,
): NoveltyFilterResult {
  const result: NoveltyFilterResult = { added: [], folded: [], discarded: [] };

  if (options.mode === 'dynamic') {
    const taken = new Set(Object.keys(patterns));
    for (const candidate of candidates) {
      if ((candidate.novelty ?? 0) < options.threshold) {
        result.discarded.push({ title: candidate.title, reason: 'below-threshold' });
        continue;
      }
      const identifier = uniqueIdentifier(`dynamic-${slugify(candidate.title)}`, taken);
      taken.add(identifier);
      result.added.push(toRecord(candidate, identifier, options.discoveredAt));
    }
    return result;
  }

  for (const candidate of candidates) {
    const index = bestCategoryMatch(candidate, options.catalog);
    const category = options.catalog[index];
    const record = category ? patterns[category.identifier] : undefined;
    if (!category || !record) {
      result.discarded.push({ title: candidate.title, reason: 'no-category' });
      continue;
    }
    record.examples = mergeExamples(record.examples, candidate.examples.map((text) => ({ text })));
    if (!result.folded.includes(category.identifier)) result.folded.push(category.identifier);
  }
  return result;
}
