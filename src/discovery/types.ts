/**
 * Types shared by the discovery prompt, parser and backends.
 */

import type { DiscoveryError } from '../errors.js';

/** Discovery mode after `auto` has been resolved. */
export type EffectiveMode = 'static' | 'dynamic';

/** A candidate pattern proposed by a backend, after validation. */
export interface PatternCandidate {
  title: string;
  description: string;
  guidance: string[];
  /** Lowercase detection phrases. */
  keywords: string[];
  /** Verbatim user quotes. */
  examples: string[];
  /** 1-10; always present in dynamic mode. */
  novelty?: number;
}

/** Everything a backend needs for one discovery call. */
export interface DiscoveryPrompt {
  text: string;
  mode: EffectiveMode;
  /** Titles of all known patterns; candidates repeating one are dropped. */
  knownTitles: string[];
  capacity: number;
}

export type DiscoveryResult =
  | { ok: true; candidates: PatternCandidate[] }
  | { ok: false; error: DiscoveryError };

/**
 * A language-model backend. Implementations never throw for backend or
 * parse failures: they return `{ ok: false }`.
 */
export interface DiscoveryBackend {
  readonly name: string;
  submit(prompt: DiscoveryPrompt): Promise<DiscoveryResult>;
}
