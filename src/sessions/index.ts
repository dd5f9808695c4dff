/**
 * Sessions module barrel export.
 *
 * - Session model and history line schemas (types.ts)
 * - Text sanitizing and secret redaction (text-sanitizer.ts)
 * - Timestamp normalization (timestamps.ts)
 * - Codex and Claude history readers
 */

export * from './types.js';
export {
  sanitizeText,
  redactSecrets,
  collapseWhitespace,
  truncateText,
  SECRET_PATTERNS,
  type SecretPattern,
} from './text-sanitizer.js';
export { normalizeTimestamp } from './timestamps.js';
export { readJsonl, type JsonlContent } from './jsonl.js';
export { SessionAccumulator } from './session-accumulator.js';
export { readCodexHistory } from './codex-history-reader.js';
export {
  readClaudeHistory,
  extractTranscriptText,
  type ClaudeHistoryPaths,
  type TextBearingLine,
} from './claude-history-reader.js';
export { readSessions } from './session-reader.js';
