/**
 * Reader for Claude Code history.
 *
 * Walks every `*.jsonl` transcript under the projects directory (sorted by
 * path so the corpus is deterministic) and, optionally, the flat
 * `history.jsonl` of quick prompts. Each transcript that cannot be read is
 * reported as a SessionReadError and skipped; the walk continues.
 */

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { SessionReadError, errorMessage } from '../errors.js';
import { readJsonl } from './jsonl.js';
import { normalizeTimestamp } from './timestamps.js';
import { SessionAccumulator } from './session-accumulator.js';
import { ClaudeHistoryLineSchema, ClaudeTranscriptLineSchema } from './types.js';
import type { SessionCorpus } from './types.js';

export interface ClaudeHistoryPaths {
  /** `~/.claude/projects` */
  projectsDir: string;
  /** `~/.claude/history.jsonl`; omitted or missing file is not an error. */
  historyFile?: string;
}

/** Fields a history line may carry text in. */
export interface TextBearingLine {
  type?: string;
  message?: {
    role?: string;
    content?: string | Array<{ type: string; text?: string }>;
  };
  summary?: string;
  display?: string;
  text?: string;
}

/**
 * Pull the message text out of a transcript line.
 *
 * String `message.content` wins; content arrays contribute their text
 * blocks for user turns only (assistant arrays are tool chatter). Lines
 * without a message fall back to `summary`, `display` or `text`.
 */
export function extractTranscriptText(line: TextBearingLine): string | null {
  if (line.message) {
    const content = line.message.content;
    if (typeof content === 'string') return content;
    if (Array.isArray(content) && (line.type === 'user' || line.message.role === 'user')) {
      const text = content
        .filter((block) => block.type === 'text' && typeof block.text === 'string')
        .map((block) => block.text ?? '')
        .join('\n');
      if (text.trim() !== '') return text;
    }
  }

  for (const value of [line.summary, line.display, line.text]) {
    if (typeof value === 'string' && value.trim() !== '') return value;
  }
  return null;
}

/** Recursively list `*.jsonl` files, sorted. A missing directory is empty. */
async function listTranscripts(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listTranscripts(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith('.jsonl')) {
      files.push(fullPath);
    }
  }
  return files.sort();
}

export async function readClaudeHistory(paths: ClaudeHistoryPaths): Promise<SessionCorpus> {
  const accumulator = new SessionAccumulator();
  const readErrors: SessionReadError[] = [];
  let skippedLines = 0;

  let transcripts: string[];
  try {
    transcripts = await listTranscripts(paths.projectsDir);
  } catch (err) {
    transcripts = [];
    readErrors.push(new SessionReadError(
      `Cannot list Claude projects in ${paths.projectsDir}: ${errorMessage(err)}`,
      paths.projectsDir,
      { cause: err },
    ));
  }

  for (const file of transcripts) {
    let content: Awaited<ReturnType<typeof readJsonl>>;
    try {
      content = await readJsonl(file);
    } catch (err) {
      readErrors.push(new SessionReadError(
        `Cannot read transcript ${file}: ${errorMessage(err)}`,
        file,
        { cause: err },
      ));
      continue;
    }

    skippedLines += content.invalidLines;
    for (const record of content.records) {
      const result = ClaudeTranscriptLineSchema.safeParse(record);
      if (!result.success) {
        skippedLines++;
        continue;
      }
      const line = result.data;
      const sessionId = line.sessionId ?? line.session_id ?? line.leafUuid;
      if (!sessionId) continue;
      const text = extractTranscriptText(line);
      if (text === null) continue;
      const timestamp = normalizeTimestamp(line.timestamp ?? line.ts ?? line.createdAt);
      accumulator.add(sessionId, timestamp, text, file);
    }
  }

  if (paths.historyFile) {
    try {
      const content = await readJsonl(paths.historyFile);
      skippedLines += content.invalidLines;
      for (const record of content.records) {
        const result = ClaudeHistoryLineSchema.safeParse(record);
        if (!result.success) {
          skippedLines++;
          continue;
        }
        const line = result.data;
        const text = extractTranscriptText({
          display: line.display,
          summary: line.summary,
          text: line.text,
        });
        if (text === null) continue;
        const sessionId = `${line.project ?? 'unknown'}:${line.timestamp ?? 0}`;
        accumulator.add(sessionId, normalizeTimestamp(line.timestamp), text, paths.historyFile);
      }
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        readErrors.push(new SessionReadError(
          `Cannot read Claude history ${paths.historyFile}: ${errorMessage(err)}`,
          paths.historyFile,
          { cause: err },
        ));
      }
    }
  }

  return { sessions: accumulator.build(), readErrors, skippedLines };
}
