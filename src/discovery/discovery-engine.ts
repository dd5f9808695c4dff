/**
 * Decides whether and how to ask a backend for new patterns, then asks.
 */

import type { DiscoveryError } from '../errors.js';
import type { UpdaterSettings } from '../config/settings.js';
import type { Session } from '../sessions/types.js';
import { buildDiscoveryPrompt } from './prompt-builder.js';
import type { DiscoveryBackend, EffectiveMode, PatternCandidate } from './types.js';

export interface DiscoveryPlan {
  mode: EffectiveMode;
  /** Most candidates to request. */
  capacity: number;
}

export type DiscoveryOutcome =
  | { status: 'skipped'; reason: 'no-sessions' | 'disabled' }
  | { status: 'ok'; plan: DiscoveryPlan; candidates: PatternCandidate[] }
  | { status: 'failed'; plan: DiscoveryPlan; error: DiscoveryError };

/**
 * Resolve `auto` against the pattern budget.
 *
 * `auto` is dynamic while `max_patterns` leaves room, capped to that room;
 * otherwise static. An explicit `dynamic` ignores the budget.
 */
export function planDiscovery(settings: UpdaterSettings, knownPatterns: number): DiscoveryPlan {
  const perRun = settings.max_candidates_per_run;
  switch (settings.discovery_mode) {
    case 'static':
      return { mode: 'static', capacity: perRun };
    case 'dynamic':
      return { mode: 'dynamic', capacity: perRun };
    case 'auto': {
      const slots = settings.max_patterns - knownPatterns;
      return slots > 0
        ? { mode: 'dynamic', capacity: Math.min(perRun, slots) }
        : { mode: 'static', capacity: perRun };
    }
  }
}

export interface DiscoveryRequest {
  /** Touched sessions, new before updated. */
  sessions: Session[];
  knownTitles: string[];
  settings: UpdaterSettings;
  agentLabel: string;
  /** Called only when a backend call is actually needed. */
  getBackend: () => Promise<DiscoveryBackend>;
}

export async function runDiscovery(request: DiscoveryRequest): Promise<DiscoveryOutcome> {
  if (request.sessions.length === 0) {
    return { status: 'skipped', reason: 'no-sessions' };
  }
  if (request.settings.disable_llm) {
    return { status: 'skipped', reason: 'disabled' };
  }

  const plan = planDiscovery(request.settings, request.knownTitles.length);
  const prompt = buildDiscoveryPrompt(request.sessions, {
    mode: plan.mode,
    capacity: plan.capacity,
    knownTitles: request.knownTitles,
    excerptChars: request.settings.excerpt_char_budget,
    maxSessions: request.settings.max_sessions_per_prompt,
    agentLabel: request.agentLabel,
  });

  const backend = await request.getBackend();
  const result = await backend.submit(prompt);
  return result.ok
    ? { status: 'ok', plan, candidates: result.candidates }
    : { status: 'failed', plan, error: result.error };
}
