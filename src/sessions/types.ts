/**
 * Session model and the Zod schemas for the history formats we read.
 *
 * Line schemas use `.passthrough()` so new fields written by the agents
 * do not break parsing.
 */

import { z } from 'zod';
import type { SessionReadError } from '../errors.js';

// ============================================================================
// Session model
// ============================================================================

/** One message excerpt from a session. */
export interface SessionMessage {
  /** Unix seconds. 0 when the source carried no usable timestamp. */
  timestamp: number;
  text: string;
}

/** A session with its messages in ascending timestamp order. */
export interface Session {
  id: string;
  messages: SessionMessage[];
  /** Largest message timestamp, 0 for an empty session. */
  lastTimestamp: number;
  /** File the session was read from. */
  source: string;
}

/** Which reader a profile uses. */
export type HistorySourceKind = 'codex' | 'claude';

/** Result of reading one agent's history. */
export interface SessionCorpus {
  sessions: Map<string, Session>;
  /** Sources that could not be read; their sessions are excluded this run. */
  readErrors: SessionReadError[];
  /** JSONL lines that were not JSON or carried no session id. */
  skippedLines: number;
}

// ============================================================================
// Codex history.jsonl
// ============================================================================

/** `{ "session_id": "...", "ts": 1700000000, "text": "..." }` */
export const CodexHistoryLineSchema = z.object({
  session_id: z.union([z.string(), z.number()]),
  ts: z.union([z.number(), z.string()]).optional(),
  text: z.string().optional(),
}).passthrough();

// ============================================================================
// Claude transcripts and flat history
// ============================================================================

const TextBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
}).passthrough();

/** One line of a `~/.claude/projects/<slug>/<session>.jsonl` transcript. */
export const ClaudeTranscriptLineSchema = z.object({
  type: z.string().optional(),
  sessionId: z.string().optional(),
  session_id: z.string().optional(),
  leafUuid: z.string().optional(),
  timestamp: z.union([z.string(), z.number()]).optional(),
  ts: z.union([z.string(), z.number()]).optional(),
  createdAt: z.union([z.string(), z.number()]).optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.union([z.string(), z.array(TextBlockSchema)]).optional(),
  }).passthrough().optional(),
  summary: z.string().optional(),
  display: z.string().optional(),
  text: z.string().optional(),
}).passthrough();

/** One line of `~/.claude/history.jsonl`. */
export const ClaudeHistoryLineSchema = z.object({
  display: z.string().optional(),
  text: z.string().optional(),
  summary: z.string().optional(),
  project: z.string().optional(),
  timestamp: z.union([z.string(), z.number()]).optional(),
}).passthrough();

export type CodexHistoryLine = z.infer<typeof CodexHistoryLineSchema>;
export type ClaudeTranscriptLine = z.infer<typeof ClaudeTranscriptLineSchema>;
export type ClaudeHistoryLine = z.infer<typeof ClaudeHistoryLineSchema>;
