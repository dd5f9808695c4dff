import { describe, it, expect } from 'vitest';
import { countMatchingSessions, exampleFromSession, updatePatternStats } from './pattern-stats.js';
import type { PatternRecord } from './types.js';
import type { Session } from '../sessions/types.js';

function session(id: string, lastTimestamp: number, ...texts: string[]): Session {
  return {
    id,
    messages: texts.map((text, i) => ({ timestamp: lastTimestamp - texts.length + 1 + i, text })),
    lastTimestamp,
    source: '/history.jsonl',
  };
}

function pattern(identifier: string, keywords: string[], overrides: Partial<PatternRecord> = {}): PatternRecord {
  return {
    identifier,
    title: identifier,
    description: '',
    keywords,
    bullets: [],
    examples: [],
    occurrence_count: 0,
    origin: 'static',
    ...overrides,
  };
}

const SESSIONS = new Map<string, Session>([
  ['s1', session('s1', 100, 'Please add a test for the parser')],
  ['s2', session('s2', 200, 'hello', 'Can you ADD A TEST here?')],
  ['s3', session('s3', 300, 'update the readme')],
]);

describe('countMatchingSessions', () => {
  it('should count distinct sessions containing any keyword, case-insensitively', () => {
    expect(countMatchingSessions(['add a test', 'readme'], SESSIONS.values())).toBe(3);
    expect(countMatchingSessions(['add a test'], SESSIONS.values())).toBe(2);
    expect(countMatchingSessions([], SESSIONS.values())).toBe(0);
  });
});

describe('exampleFromSession', () => {
  it('should quote the first matching message', () => {
    const s2 = SESSIONS.get('s2');
    expect(s2 && exampleFromSession(s2, ['add a test'])).toEqual({
      session_id: 's2',
      text: 'Can you ADD A TEST here?',
    });
  });

  it('should truncate long quotes to 160 characters', () => {
    const long = session('long', 1, `add a test ${'x'.repeat(300)}`);
    const example = exampleFromSession(long, ['add a test']);
    expect(example?.text).toHaveLength(160);
    expect(example?.text.endsWith('...')).toBe(true);
  });
});

describe('updatePatternStats', () => {
  it('should raise counts to the corpus count and refresh examples newest first', () => {
    const patterns = { tests: pattern('tests', ['add a test']) };

    const changed = updatePatternStats(patterns, SESSIONS, { touched: ['s2', 's1'] });

    expect(changed).toEqual(['tests']);
    expect(patterns.tests.occurrence_count).toBe(2);
    expect(patterns.tests.examples).toEqual([
      { session_id: 's2', text: 'Can you ADD A TEST here?' },
      { session_id: 's1', text: 'Please add a test for the parser' },
    ]);
  });

  it('should never lower a stored count', () => {
    const patterns = { tests: pattern('tests', ['add a test'], { occurrence_count: 9 }) };
    updatePatternStats(patterns, SESSIONS, { touched: ['s1'] });
    expect(patterns.tests.occurrence_count).toBe(9);
  });

  it('should count a freshly discovered pattern at least once', () => {
    const patterns = { 'dynamic-x': pattern('dynamic-x', ['nowhere'], { origin: 'dynamic' }) };
    updatePatternStats(patterns, SESSIONS, { touched: ['s1'], discovered: new Set(['dynamic-x']) });
    expect(patterns['dynamic-x'].occurrence_count).toBe(1);
  });

  it('should change nothing when no session was touched', () => {
    const patterns = { tests: pattern('tests', ['add a test']) };
    expect(updatePatternStats(patterns, SESSIONS, { touched: [] })).toEqual([]);
    expect(patterns.tests.occurrence_count).toBe(0);
  });

  it('should recount the whole corpus on request without touching examples', () => {
    const patterns = {
      tests: pattern('tests', ['add a test'], { examples: [{ text: 'kept' }] }),
    };

    const changed = updatePatternStats(patterns, SESSIONS, { touched: [], recount: true });

    expect(changed).toEqual(['tests']);
    expect(patterns.tests.occurrence_count).toBe(2);
    expect(patterns.tests.examples).toEqual([{ text: 'kept' }]);
  });

  it('should report no change when counts and examples already match', () => {
    const patterns = {
      docs: pattern('docs', ['readme'], {
        occurrence_count: 1,
        examples: [{ session_id: 's3', text: 'update the readme' }],
      }),
    };
    expect(updatePatternStats(patterns, SESSIONS, { touched: ['s3'] })).toEqual([]);
  });
});
