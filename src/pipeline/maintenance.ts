/**
 * Read-only status and manual pruning of dynamic patterns.
 */

import type { AgentProfile } from '../config/agent-profiles.js';
import type { PatternOrigin, StaticCategory } from '../patterns/types.js';
import { syncStaticPatterns } from '../patterns/novelty-filter.js';
import { writeDocumentIfChanged } from '../document/document-writer.js';
import { FileLock, acquireStateLocks, lockPathFor } from '../safety/file-lock.js';
import { AutomationStateStore } from '../state/automation-state-store.js';
import { renderProfileDocument } from './agent-run.js';

export interface PatternSummary {
  identifier: string;
  title: string;
  origin: PatternOrigin;
  occurrenceCount: number;
}

export interface AgentStatus {
  profile: AgentProfile;
  stateExists: boolean;
  trackedSessions: number;
  pendingLegacySessions: number;
  patterns: PatternSummary[];
  updatedAt?: string;
  locked: boolean;
}

export async function collectStatus(profile: AgentProfile): Promise<AgentStatus> {
  const { state, existed } = await new AutomationStateStore(profile.paths.state).load();
  const patterns = Object.values(state.patterns)
    .map((p) => ({ identifier: p.identifier, title: p.title, origin: p.origin, occurrenceCount: p.occurrence_count }))
    .sort((a, b) => b.occurrenceCount - a.occurrenceCount || (a.identifier < b.identifier ? -1 : 1));

  return {
    profile,
    stateExists: existed,
    trackedSessions: Object.keys(state.session_progress).length,
    pendingLegacySessions: state.legacy_processed_sessions?.length ?? 0,
    patterns,
    updatedAt: state.updated_at,
    locked: await new FileLock(lockPathFor(profile.paths.state)).isLocked(),
  };
}

export interface PruneResult {
  removed: string[];
  notFound: string[];
  /** Static identifiers, which come from the catalog and cannot be pruned. */
  refused: string[];
  documentWritten: boolean;
}

/**
 * Remove dynamic patterns by identifier, under the state lock, and
 * regenerate the document.
 */
export async function prunePatterns(
  profile: AgentProfile,
  identifiers: string[],
  catalog: StaticCategory[],
  quoteLength: number,
  now: () => Date = () => new Date(),
): Promise<PruneResult> {
  const release = await acquireStateLocks([profile.paths.state], 'prune');
  try {
    const store = new AutomationStateStore(profile.paths.state, now);
    const loaded = await store.load();
    const next = structuredClone(loaded.state);
    const result: PruneResult = { removed: [], notFound: [], refused: [], documentWritten: false };

    for (const id of identifiers) {
      const pattern = next.patterns[id];
      if (!pattern) {
        result.notFound.push(id);
      } else if (pattern.origin === 'static') {
        result.refused.push(id);
      } else {
        delete next.patterns[id];
        result.removed.push(id);
      }
    }

    if (result.removed.length === 0) return result;

    syncStaticPatterns(next.patterns, catalog);
    const { previous, content } = await renderProfileDocument(profile, next, catalog, quoteLength);
    result.documentWritten = await writeDocumentIfChanged(profile.paths.output, content, previous);
    await store.saveIfChanged(loaded.state, next, loaded.existed);
    return result;
  } finally {
    await release();
  }
}
