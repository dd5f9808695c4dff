import { describe, it, expect } from 'vitest';
import { detectChanges, touchedSessions } from './change-detector.js';
import type { Session } from '../sessions/types.js';

function session(id: string, ...timestamps: number[]): Session {
  return {
    id,
    messages: timestamps.map((timestamp) => ({ timestamp, text: `message at ${timestamp}` })),
    lastTimestamp: timestamps.length > 0 ? Math.max(...timestamps) : 0,
    source: '/history.jsonl',
  };
}

function corpus(...sessions: Session[]): Map<string, Session> {
  return new Map(sessions.map((s) => [s.id, s]));
}

describe('detectChanges', () => {
  it('should report only the new session when the known one is unchanged', () => {
    const changes = detectChanges(corpus(session('s1', 100), session('s2', 200)), { s1: 100 });

    expect(changes.newSessions.map((s) => s.id)).toEqual(['s2']);
    expect(changes.updatedSessions).toEqual([]);
    expect(changes.unchanged).toEqual(['s1']);
    expect(changes.nextProgress).toEqual({ s1: 100, s2: 200 });
  });

  it('should report a known session with a later message as updated', () => {
    const changes = detectChanges(corpus(session('s1', 100, 150)), { s1: 100 });

    expect(changes.newSessions).toEqual([]);
    expect(changes.updatedSessions.map((s) => s.id)).toEqual(['s1']);
    expect(changes.nextProgress).toEqual({ s1: 150 });
  });

  it('should never lower a stored watermark', () => {
    const changes = detectChanges(corpus(session('s1', 80)), { s1: 100 });

    expect(changes.updatedSessions).toEqual([]);
    expect(changes.nextProgress.s1).toBe(100);
  });

  it('should keep watermarks of sessions missing from the corpus', () => {
    const changes = detectChanges(corpus(session('s2', 5)), { gone: 42 });
    expect(changes.nextProgress).toEqual({ gone: 42, s2: 5 });
  });

  it('should skip sessions without messages', () => {
    const changes = detectChanges(corpus(session('empty')), {});

    expect(changes.newSessions).toEqual([]);
    expect(changes.unchanged).toEqual([]);
    expect(changes.nextProgress).toEqual({});
  });

  it('should back-fill legacy-processed sessions instead of reporting them', () => {
    const changes = detectChanges(
      corpus(session('old', 300), session('fresh', 400)),
      {},
      ['old', 'missing'],
    );

    expect(changes.newSessions.map((s) => s.id)).toEqual(['fresh']);
    expect(changes.backfilled).toEqual(['old']);
    expect(changes.pendingLegacy).toEqual(['missing']);
    expect(changes.nextProgress).toEqual({ old: 300, fresh: 400 });
  });

  it('should order sessions by latest timestamp, then id', () => {
    const changes = detectChanges(
      corpus(session('b', 10), session('a', 10), session('c', 30)),
      {},
    );
    expect(changes.newSessions.map((s) => s.id)).toEqual(['c', 'a', 'b']);
  });

  it('should keep new and updated sets disjoint', () => {
    const changes = detectChanges(corpus(session('s1', 5, 9), session('s2', 7)), { s1: 5 });
    const ids = touchedSessions(changes).map((s) => s.id);

    expect(ids).toEqual(['s1', 's2']);
    expect(new Set(ids).size).toBe(ids.length);
  });
});
