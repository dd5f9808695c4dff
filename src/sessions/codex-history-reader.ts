/**
 * Reader for the Codex CLI's append-only `history.jsonl`.
 *
 * Every line is one message: `{ "session_id", "ts", "text" }`. Messages
 * are grouped by session id; the log itself is the only source, so a
 * missing log yields an empty corpus plus one SessionReadError.
 */

import { SessionReadError, errorMessage } from '../errors.js';
import { readJsonl } from './jsonl.js';
import { normalizeTimestamp } from './timestamps.js';
import { SessionAccumulator } from './session-accumulator.js';
import { CodexHistoryLineSchema } from './types.js';
import type { SessionCorpus } from './types.js';

export async function readCodexHistory(historyPath: string): Promise<SessionCorpus> {
  const accumulator = new SessionAccumulator();
  let skippedLines = 0;

  let content: Awaited<ReturnType<typeof readJsonl>>;
  try {
    content = await readJsonl(historyPath);
  } catch (err) {
    return {
      sessions: new Map(),
      readErrors: [
        new SessionReadError(
          `Cannot read Codex history ${historyPath}: ${errorMessage(err)}`,
          historyPath,
          { cause: err },
        ),
      ],
      skippedLines: 0,
    };
  }

  skippedLines += content.invalidLines;

  for (const record of content.records) {
    const result = CodexHistoryLineSchema.safeParse(record);
    if (!result.success) {
      skippedLines++;
      continue;
    }
    const line = result.data;
    const sessionId = String(line.session_id).trim();
    if (sessionId === '') {
      skippedLines++;
      continue;
    }
    accumulator.add(sessionId, normalizeTimestamp(line.ts), line.text ?? '', historyPath);
  }

  return { sessions: accumulator.build(), readErrors: [], skippedLines };
}
