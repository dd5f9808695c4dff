/**
 * Reads and atomically replaces guidance documents.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/** Current document text, or null when it does not exist yet. */
export async function readDocument(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Replace `path` with `content` unless it already holds exactly that.
 *
 * @returns Whether the file was written
 */
export async function writeDocumentIfChanged(
  path: string,
  content: string,
  previous: string | null,
): Promise<boolean> {
  if (previous === content) return false;

  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(path)}-${process.pid}-${Date.now()}.tmp`);

  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  } catch (err) {
    await unlink(tempPath).catch((cleanupErr: NodeJS.ErrnoException) => {
      if (cleanupErr.code !== 'ENOENT') throw cleanupErr;
    });
    throw err;
  }
  return true;
}
