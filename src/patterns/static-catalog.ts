/**
 * Loader for the fixed category catalog (`data/static-patterns.json`).
 *
 * The catalog sits at the package root so the same relative URL works
 * from `src/patterns/` under Vitest and from `dist/patterns/` after a
 * build.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ConfigError, errorMessage } from '../errors.js';
import { StaticCatalogSchema } from './types.js';
import type { StaticCategory } from './types.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../data/static-patterns.json', import.meta.url),
);

/**
 * Read and validate a static catalog.
 *
 * @throws {ConfigError} when the file is missing, not JSON, fails the
 *   schema, or repeats an identifier
 */
export async function loadStaticCatalog(
  catalogPath: string = DEFAULT_CATALOG_PATH,
): Promise<StaticCategory[]> {
  let content: string;
  try {
    content = await readFile(catalogPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read pattern catalog ${catalogPath}: ${errorMessage(err)}`, 'catalog');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in pattern catalog: ${catalogPath}`, 'catalog');
  }

  const result = StaticCatalogSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Pattern catalog validation failed:\n${errors.join('\n')}`, 'catalog');
  }

  const seen = new Set<string>();
  for (const category of result.data) {
    if (seen.has(category.identifier)) {
      throw new ConfigError(`Duplicate pattern identifier in catalog: ${category.identifier}`, 'catalog');
    }
    seen.add(category.identifier);
  }

  return result.data.map((category) => ({
    ...category,
    keywords: category.keywords.map((keyword) => keyword.toLowerCase()),
  }));
}
