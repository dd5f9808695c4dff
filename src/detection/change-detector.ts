/**
 * Splits a session corpus into new, updated and unchanged sessions by
 * comparing each session's latest timestamp with the stored watermark.
 */

import type { Session } from '../sessions/types.js';

export interface ChangeSet {
  /** Sessions with no stored watermark. */
  newSessions: Session[];
  /** Sessions whose latest message is past the stored watermark. */
  updatedSessions: Session[];
  unchanged: string[];
  /**
   * Watermarks to persist: `max(stored, latest)` per corpus session, plus
   * stored entries of sessions missing from the corpus.
   */
  nextProgress: Record<string, number>;
  /** Legacy-processed ids that received a watermark this run. */
  backfilled: string[];
  /** Legacy-processed ids still absent from the corpus. */
  pendingLegacy: string[];
}

/** Latest timestamp descending, then id ascending. */
export function compareByRecency(a: Session, b: Session): number {
  if (a.lastTimestamp !== b.lastTimestamp) return b.lastTimestamp - a.lastTimestamp;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function detectChanges(
  sessions: ReadonlyMap<string, Session>,
  progress: Readonly<Record<string, number>>,
  legacyProcessed: readonly string[] = [],
): ChangeSet {
  const legacy = new Set(legacyProcessed);
  const nextProgress: Record<string, number> = { ...progress };
  const newSessions: Session[] = [];
  const updatedSessions: Session[] = [];
  const unchanged: string[] = [];
  const backfilled: string[] = [];

  for (const session of sessions.values()) {
    if (session.messages.length === 0) continue;

    const stored = progress[session.id];
    if (stored === undefined) {
      nextProgress[session.id] = session.lastTimestamp;
      if (legacy.has(session.id)) {
        backfilled.push(session.id);
        unchanged.push(session.id);
      } else {
        newSessions.push(session);
      }
      continue;
    }

    nextProgress[session.id] = Math.max(stored, session.lastTimestamp);
    if (session.lastTimestamp > stored) {
      updatedSessions.push(session);
    } else {
      unchanged.push(session.id);
    }
  }

  newSessions.sort(compareByRecency);
  updatedSessions.sort(compareByRecency);
  unchanged.sort();
  backfilled.sort();

  return {
    newSessions,
    updatedSessions,
    unchanged,
    nextProgress,
    backfilled,
    pendingLegacy: [...legacy].filter((id) => !(id in nextProgress)).sort(),
  };
}

/** Touched sessions (new and updated), newest first. */
export function touchedSessions(changes: ChangeSet): Session[] {
  return [...changes.newSessions, ...changes.updatedSessions].sort(compareByRecency);
}
