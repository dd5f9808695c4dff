/**
 * Persistent automation state: per-session progress watermarks and the
 * pattern records behind a guidance document.
 *
 * The state is loaded once per run, mutated only in memory, and written
 * back with write-tmp-then-rename in the same directory, so an interrupted
 * run never leaves a half-written file. Writes are skipped when nothing
 * but `updated_at` would change, which keeps repeated runs over the same
 * history byte-identical.
 *
 * Older state files (no `version`; `processed_sessions`, `dynamic_patterns`
 * and `trimmed_sessions` fields) are migrated on load.
 */

import { z } from 'zod';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { StateFileError } from '../errors.js';
import { PatternRecordSchema } from '../patterns/types.js';
import type { PatternRecord } from '../patterns/types.js';
import { slugify } from '../patterns/text-utils.js';

// ============================================================================
// Constants
// ============================================================================

export const AUTOMATION_STATE_VERSION = 2;

// ============================================================================
// Zod Schemas
// ============================================================================

export const AutomationStateSchema = z.object({
  version: z.literal(AUTOMATION_STATE_VERSION),
  /** Session id -> last processed message timestamp (unix seconds). */
  session_progress: z.record(z.string(), z.number().int().min(0)),
  /** Pattern identifier -> record. */
  patterns: z.record(z.string(), PatternRecordSchema),
  /** Ids processed by a pre-watermark version, awaiting back-fill. */
  legacy_processed_sessions: z.array(z.string()).optional(),
  updated_at: z.string().optional(),
}).passthrough();

/** Shape written before versioning. Every field is optional. */
const LegacyStateSchema = z.object({
  processed_sessions: z.array(z.string()).default([]),
  dynamic_patterns: z.array(z.unknown()).default([]),
  trimmed_sessions: z.number().optional(),
  session_progress: z.record(z.string(), z.number()).default({}),
  updated_at: z.string().optional(),
}).passthrough();

const LegacyPatternSchema = z.object({
  identifier: z.string().optional(),
  title: z.string().optional(),
  keywords: z.array(z.string()).default([]),
  bullets: z.array(z.string()).default([]),
}).passthrough();

export type AutomationState = z.infer<typeof AutomationStateSchema>;

export interface StateLoadResult {
  state: AutomationState;
  /** False on first run. */
  existed: boolean;
  /** True when the file was in the legacy shape. */
  migrated: boolean;
}

// ============================================================================
// Migration
// ============================================================================

/** Create empty default state for a first run. */
export function createEmptyState(): AutomationState {
  return {
    version: AUTOMATION_STATE_VERSION,
    session_progress: {},
    patterns: {},
  };
}

/**
 * Convert a legacy state document.
 *
 * - `session_progress` is kept (values truncated to whole seconds)
 * - processed ids without progress become `legacy_processed_sessions`
 * - `dynamic_patterns` become dynamic pattern records with zero counts;
 *   entries that cannot be read are dropped
 */
export function migrateLegacyState(raw: unknown): AutomationState | null {
  const result = LegacyStateSchema.safeParse(raw);
  if (!result.success) return null;
  const legacy = result.data;

  const state = createEmptyState();
  for (const [id, value] of Object.entries(legacy.session_progress)) {
    state.session_progress[id] = Math.max(0, Math.trunc(value));
  }

  const pending = legacy.processed_sessions.filter((id) => !(id in state.session_progress));
  if (pending.length > 0) {
    state.legacy_processed_sessions = [...new Set(pending)];
  }

  for (const entry of legacy.dynamic_patterns) {
    const parsed = LegacyPatternSchema.safeParse(entry);
    if (!parsed.success) continue;
    const title = parsed.data.title?.trim() || 'Dynamic Pattern';
    const identifier = parsed.data.identifier?.trim() || `dynamic-${slugify(title)}`;
    if (identifier in state.patterns) continue;
    state.patterns[identifier] = {
      identifier,
      title,
      description: '',
      keywords: parsed.data.keywords.map((k) => k.toLowerCase()),
      bullets: parsed.data.bullets,
      examples: [],
      occurrence_count: 0,
      origin: 'dynamic',
    };
  }

  if (legacy.updated_at) state.updated_at = legacy.updated_at;
  return state;
}

// ============================================================================
// Canonical serialization
// ============================================================================

function sortedRecord<T>(record: Record<string, T>, map: (value: T) => T): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = map(record[key]);
  }
  return sorted;
}

function canonicalPattern(pattern: PatternRecord): PatternRecord {
  const {
    identifier, title, description, keywords, bullets, examples,
    occurrence_count, novelty_score, origin, discovered_at, ...extra
  } = pattern;
  return {
    identifier,
    title,
    description,
    keywords,
    bullets,
    examples: examples.map((example) =>
      example.session_id === undefined
        ? { text: example.text }
        : { session_id: example.session_id, text: example.text }),
    occurrence_count,
    ...(novelty_score === undefined ? {} : { novelty_score }),
    origin,
    ...(discovered_at === undefined ? {} : { discovered_at }),
    ...extra,
  };
}

/** State with a fixed key order, so equal content serializes identically. */
export function canonicalizeState(state: AutomationState): AutomationState {
  const {
    version, session_progress, patterns, legacy_processed_sessions, updated_at, ...extra
  } = state;
  return {
    version,
    session_progress: sortedRecord(session_progress, (value) => value),
    patterns: sortedRecord(patterns, canonicalPattern),
    ...(legacy_processed_sessions && legacy_processed_sessions.length > 0
      ? { legacy_processed_sessions: [...legacy_processed_sessions].sort() }
      : {}),
    ...extra,
    ...(updated_at === undefined ? {} : { updated_at }),
  };
}

export function serializeState(state: AutomationState): string {
  return `${JSON.stringify(canonicalizeState(state), null, 2)}\n`;
}

/** True when two states differ in anything but `updated_at`. */
export function stateContentChanged(previous: AutomationState, next: AutomationState): boolean {
  return serializeState({ ...previous, updated_at: undefined })
    !== serializeState({ ...next, updated_at: undefined });
}

// ============================================================================
// AutomationStateStore
// ============================================================================

export class AutomationStateStore {
  constructor(
    readonly statePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Load state from disk.
   *
   * A missing file is a first run. Corrupt JSON or an unrecognized shape is
   * a StateFileError: resetting would silently discard occurrence counts.
   */
  async load(): Promise<StateLoadResult> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return { state: createEmptyState(), existed: false, migrated: false };
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new StateFileError(`State file is not valid JSON: ${this.statePath}`, this.statePath);
    }

    const versioned = z.object({ version: z.number() }).passthrough().safeParse(parsed);
    if (versioned.success && versioned.data.version >= AUTOMATION_STATE_VERSION) {
      if (versioned.data.version > AUTOMATION_STATE_VERSION) {
        throw new StateFileError(
          `State file ${this.statePath} has version ${versioned.data.version}; this updater understands up to ${AUTOMATION_STATE_VERSION}`,
          this.statePath,
        );
      }
      const result = AutomationStateSchema.safeParse(parsed);
      if (!result.success) {
        const issue = result.error.issues[0];
        throw new StateFileError(
          `State file ${this.statePath} failed validation at ${issue?.path.join('.') ?? '<root>'}: ${issue?.message ?? 'invalid'}`,
          this.statePath,
        );
      }
      return { state: result.data, existed: true, migrated: false };
    }

    const migrated = migrateLegacyState(parsed);
    if (!migrated) {
      throw new StateFileError(`State file ${this.statePath} has an unrecognized shape`, this.statePath);
    }
    return { state: migrated, existed: true, migrated: true };
  }

  /**
   * Write state atomically: temp file in the same directory, then rename.
   * Creates parent directories.
   */
  async save(state: AutomationState): Promise<void> {
    const dir = dirname(this.statePath);
    await mkdir(dir, { recursive: true });

    const tempPath = join(
      dir,
      `.${basename(this.statePath)}-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`,
    );

    try {
      await writeFile(tempPath, serializeState(state), 'utf-8');
      await rename(tempPath, this.statePath);
    } catch (err) {
      await unlink(tempPath).catch((cleanupErr: NodeJS.ErrnoException) => {
        if (cleanupErr.code !== 'ENOENT') throw cleanupErr;
      });
      throw err;
    }
  }

  /**
   * Persist `next` only when its content differs from `previous` or the
   * file does not exist yet; stamps `updated_at` on write.
   *
   * @returns Whether a write happened
   */
  async saveIfChanged(previous: AutomationState, next: AutomationState, existed: boolean): Promise<boolean> {
    if (existed && !stateContentChanged(previous, next)) {
      return false;
    }
    next.updated_at = this.now().toISOString();
    await this.save(next);
    return true;
  }
}
