/**
 * Occurrence counts and example quotes.
 *
 * A session "shows" a pattern when its lowercased text contains any of
 * the pattern's keywords. Counts only grow; examples are refreshed from
 * the sessions touched in this run. Without touched sessions nothing is
 * recomputed unless `recount` is set.
 */

import type { Session } from '../sessions/types.js';
import { collapseWhitespace, truncateText } from '../sessions/text-sanitizer.js';
import type { PatternExample, PatternRecord } from './types.js';
import { mergeExamples } from './novelty-filter.js';

export const EXAMPLE_CHAR_LIMIT = 160;

export interface PatternStatsOptions {
  /** Touched session ids, newest first. */
  touched: string[];
  /** Identifiers minted this run; each counts at least one session. */
  discovered?: ReadonlySet<string>;
  /** Recompute counts over the whole corpus even when nothing was touched. */
  recount?: boolean;
}

function sessionText(session: Session): string {
  return session.messages.map((message) => message.text).join(' ').toLowerCase();
}

function matchesAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => keyword.length > 0 && text.includes(keyword));
}

/** Number of distinct sessions whose text contains any keyword. */
export function countMatchingSessions(keywords: string[], sessions: Iterable<Session>): number {
  let count = 0;
  for (const session of sessions) {
    if (matchesAny(sessionText(session), keywords)) count++;
  }
  return count;
}

/** First message of the session containing a keyword, as an example. */
export function exampleFromSession(session: Session, keywords: string[]): PatternExample | null {
  for (const message of session.messages) {
    if (matchesAny(message.text.toLowerCase(), keywords)) {
      return {
        session_id: session.id,
        text: truncateText(collapseWhitespace(message.text), EXAMPLE_CHAR_LIMIT),
      };
    }
  }
  return null;
}

/**
 * Recompute counts and refresh examples in place.
 *
 * @returns Identifiers whose count or examples changed
 */
export function updatePatternStats(
  patterns: Record<string, PatternRecord>,
  sessions: Map<string, Session>,
  options: PatternStatsOptions,
): string[] {
  if (options.touched.length === 0 && !options.recount) return [];

  const touchedSessions = options.touched
    .map((id) => sessions.get(id))
    .filter((session): session is Session => session !== undefined);

  const changed: string[] = [];
  for (const pattern of Object.values(patterns)) {
    let count = Math.max(pattern.occurrence_count, countMatchingSessions(pattern.keywords, sessions.values()));
    if (options.discovered?.has(pattern.identifier)) count = Math.max(count, 1);

    const fresh = touchedSessions
      .map((session) => exampleFromSession(session, pattern.keywords))
      .filter((example): example is PatternExample => example !== null);
    const examples = fresh.length > 0 ? mergeExamples(pattern.examples, fresh) : pattern.examples;

    if (count !== pattern.occurrence_count || JSON.stringify(examples) !== JSON.stringify(pattern.examples)) {
      changed.push(pattern.identifier);
    }
    pattern.occurrence_count = count;
    pattern.examples = examples;
  }
  return changed;
}
