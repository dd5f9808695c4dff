/**
 * Minimal JSONL loading shared by the history readers.
 */

import { readFile } from 'node:fs/promises';

export interface JsonlContent {
  /** Parsed values of every non-blank, valid JSON line, in file order. */
  records: unknown[];
  /** Non-blank lines that were not valid JSON. */
  invalidLines: number;
}

/**
 * Read a JSONL file. I/O errors (ENOENT, EACCES, EISDIR) propagate to the
 * caller; corrupt lines are counted and skipped.
 */
export async function readJsonl(filePath: string): Promise<JsonlContent> {
  const raw = await readFile(filePath, 'utf-8');
  const records: unknown[] = [];
  let invalidLines = 0;

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '') continue;
    try {
      records.push(JSON.parse(trimmed));
    } catch {
      invalidLines++;
    }
  }

  return { records, invalidLines };
}
