/**
 * Text helpers shared by the novelty filter and occurrence statistics.
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Common English stopwords to filter out when extracting keywords.
 * Includes articles, conjunctions, prepositions, and pronouns.
 */
const STOPWORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'when', 'use', 'for', 'with',
  'this', 'that', 'from', 'to', 'in', 'of', 'is', 'it', 'on',
  'me', 'my', 'i', 'we', 'our', 'you', 'your', 'be', 'are', 'as',
]);

// ============================================================================
// Keyword Extraction
// ============================================================================

/**
 * Extract lowercase word tokens from text, dropping stopwords and
 * punctuation.
 */
export function extractKeywords(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[^a-z0-9']+/)
    .map((w) => w.replace(/^'+|'+$/g, ''))
    .filter((w) => w.length > 0 && !STOPWORDS.has(w));
  return new Set(words);
}

/** Union of the keywords of several text fragments. */
export function keywordsOf(...fragments: string[]): Set<string> {
  const all = new Set<string>();
  for (const fragment of fragments) {
    for (const word of extractKeywords(fragment)) all.add(word);
  }
  return all;
}

// ============================================================================
// Similarity
// ============================================================================

/**
 * Jaccard similarity |A ∩ B| / |A ∪ B|, in [0, 1]. Two empty sets score 0.
 */
export function jaccardSimilarity(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }

  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Lowercase, collapse every run of non-alphanumerics to one hyphen, trim
 * hyphens. Falls back to `pattern` when nothing is left.
 */
export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'pattern';
}

/**
 * Return `base`, or `base-2`, `base-3`, ... for the first form not in
 * `taken`.
 */
export function uniqueIdentifier(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) return base;
  let suffix = 2;
  while (taken.has(`${base}-${suffix}`)) suffix++;
  return `${base}-${suffix}`;
}
