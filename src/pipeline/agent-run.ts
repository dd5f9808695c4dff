/**
 * One agent's update: read history, detect changes, discover, count,
 * render, persist.
 *
 * Everything up to rendering works on an in-memory copy of the state. A
 * discovery failure returns before any file is touched, so the prior
 * state and document stay exactly as they were.
 */

import type { AgentProfile } from '../config/agent-profiles.js';
import type { ResolvedSettings } from '../config/settings.js';
import type { DiscoveryError, SessionReadError } from '../errors.js';
import { detectChanges, touchedSessions } from '../detection/change-detector.js';
import { runDiscovery } from '../discovery/discovery-engine.js';
import type { DiscoveryOutcome } from '../discovery/discovery-engine.js';
import type { DiscoveryBackend } from '../discovery/types.js';
import { renderGuidanceDocument } from '../document/guidance-renderer.js';
import { resolveManualBody } from '../document/manual-section.js';
import { readDocument, writeDocumentIfChanged } from '../document/document-writer.js';
import { applyNoveltyFilter, syncStaticPatterns } from '../patterns/novelty-filter.js';
import { updatePatternStats } from '../patterns/pattern-stats.js';
import type { PatternRecord, StaticCategory } from '../patterns/types.js';
import { readSessions } from '../sessions/session-reader.js';
import { AutomationStateStore } from '../state/automation-state-store.js';
import type { AutomationState } from '../state/automation-state-store.js';

export interface AgentRunContext {
  profile: AgentProfile;
  resolved: ResolvedSettings;
  catalog: StaticCategory[];
  dryRun: boolean;
  getBackend: () => Promise<DiscoveryBackend>;
  now: () => Date;
}

interface AgentRunBase {
  profile: AgentProfile;
  readErrors: SessionReadError[];
  skippedLines: number;
  newSessions: string[];
  updatedSessions: string[];
}

export interface AgentRunSuccess extends AgentRunBase {
  status: 'ok';
  discovery: DiscoveryOutcome['status'];
  totalSessions: number;
  newPatterns: PatternRecord[];
  foldedInto: string[];
  discarded: number;
  patterns: PatternRecord[];
  migrated: boolean;
  document: string;
  documentWritten: boolean;
  stateWritten: boolean;
}

export interface AgentRunFailure extends AgentRunBase {
  status: 'failed';
  error: DiscoveryError;
}

export type AgentRunResult = AgentRunSuccess | AgentRunFailure;

/** Render the document for `state`, keeping the operator's manual block. */
export async function renderProfileDocument(
  profile: AgentProfile,
  state: AutomationState,
  catalog: StaticCategory[],
  quoteLength: number,
): Promise<{ previous: string | null; content: string }> {
  const previous = await readDocument(profile.paths.output);
  const content = renderGuidanceDocument({
    profile,
    patterns: Object.values(state.patterns),
    staticOrder: catalog.map((category) => category.identifier),
    manualBody: resolveManualBody(previous, profile.manualSection, profile.docTitle),
    quoteLength,
  });
  return { previous, content };
}

function agentLabel(profile: AgentProfile): string {
  return profile.key === 'codex' ? 'Codex' : 'Claude';
}

export async function runAgentUpdate(context: AgentRunContext): Promise<AgentRunResult> {
  const { profile, resolved, catalog } = context;
  const { settings } = resolved;

  const store = new AutomationStateStore(profile.paths.state, context.now);
  const loaded = await store.load();
  const corpus = await readSessions(profile);

  const changes = detectChanges(
    corpus.sessions,
    loaded.state.session_progress,
    loaded.state.legacy_processed_sessions ?? [],
  );
  const base: AgentRunBase = {
    profile,
    readErrors: corpus.readErrors,
    skippedLines: corpus.skippedLines,
    newSessions: changes.newSessions.map((s) => s.id),
    updatedSessions: changes.updatedSessions.map((s) => s.id),
  };

  const next: AutomationState = structuredClone(loaded.state);
  const seeded = syncStaticPatterns(next.patterns, catalog);

  const discovery = await runDiscovery({
    sessions: [...changes.newSessions, ...changes.updatedSessions],
    knownTitles: Object.values(next.patterns).map((p) => p.title),
    settings,
    agentLabel: agentLabel(profile),
    getBackend: context.getBackend,
  });
  if (discovery.status === 'failed') {
    return { ...base, status: 'failed', error: discovery.error };
  }

  let newPatterns: PatternRecord[] = [];
  let foldedInto: string[] = [];
  let discarded = 0;
  if (discovery.status === 'ok') {
    const filtered = applyNoveltyFilter(discovery.candidates, next.patterns, {
      mode: discovery.plan.mode,
      threshold: settings.novelty_threshold,
      catalog,
      discoveredAt: context.now().toISOString(),
    });
    for (const record of filtered.added) {
      next.patterns[record.identifier] = record;
    }
    newPatterns = filtered.added;
    foldedInto = filtered.folded;
    discarded = filtered.discarded.length;
  }

  updatePatternStats(next.patterns, corpus.sessions, {
    touched: touchedSessions(changes).map((s) => s.id),
    discovered: new Set(newPatterns.map((p) => p.identifier)),
    // Migrated and newly seeded records start at zero.
    recount: loaded.migrated || seeded.length > 0,
  });

  next.session_progress = changes.nextProgress;
  if (changes.pendingLegacy.length > 0) {
    next.legacy_processed_sessions = changes.pendingLegacy;
  } else {
    delete next.legacy_processed_sessions;
  }

  const { previous, content } = await renderProfileDocument(profile, next, catalog, settings.quote_length);

  let documentWritten = false;
  let stateWritten = false;
  if (!context.dryRun) {
    documentWritten = await writeDocumentIfChanged(profile.paths.output, content, previous);
    stateWritten = await store.saveIfChanged(loaded.state, next, loaded.existed && !loaded.migrated);
  }

  return {
    ...base,
    status: 'ok',
    discovery: discovery.status,
    totalSessions: corpus.sessions.size,
    newPatterns,
    foldedInto,
    discarded,
    patterns: Object.values(next.patterns),
    migrated: loaded.migrated,
    document: content,
    documentWritten,
    stateWritten,
  };
}
