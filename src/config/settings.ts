/**
 * Updater settings: Zod schema, settings-file reader and environment
 * overrides.
 *
 * Every field has a `.default()`, so `UpdaterSettingsSchema.parse({})` is a
 * complete configuration. Sources are applied in order: schema defaults,
 * the optional JSON settings file, then `PATTERN_UPDATER_*` environment
 * variables. Credentials are only ever read from the environment.
 *
 * All validation happens here, before the run touches the filesystem, so a
 * bad value surfaces as a ConfigError with no side effects.
 *
 * @module config/settings
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_SETTINGS_FILE = '.guidance-updater.json';
export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

const CodexBackendSchema = z.object({
  bin: z.string().min(1).default('codex'),
  sandbox: z.string().min(1).default('workspace-write'),
  approval: z.string().min(1).default('never'),
  /** Grant the sandbox network access so the CLI can reach its API. */
  enable_network: z.boolean().default(true),
});

export const UpdaterSettingsSchema = z.object({
  provider: z.enum(['anthropic', 'codex']).default('anthropic'),
  model: z.string().min(1).default(DEFAULT_MODEL),
  max_tokens: z.number().int().min(64).max(64000).default(1024),
  temperature: z.number().min(0).max(1).default(0),
  top_p: z.number().gt(0).max(1).optional(),
  base_url: z.string().url().optional(),
  timeout_ms: z.number().int().min(1000).default(120_000),
  max_retries: z.number().int().min(0).max(10).default(3),
  retry_base_delay_ms: z.number().int().min(0).default(1000),
  retry_max_delay_ms: z.number().int().min(0).default(30_000),
  disable_llm: z.boolean().default(false),
  discovery_mode: z.enum(['auto', 'static', 'dynamic']).default('auto'),
  novelty_threshold: z.number().int().min(1).max(10).default(3),
  excerpt_char_budget: z.number().int().min(100).default(1600),
  max_sessions_per_prompt: z.number().int().min(1).max(50).default(10),
  max_patterns: z.number().int().min(1).max(100).default(20),
  max_candidates_per_run: z.number().int().min(1).max(20).default(5),
  quote_length: z.number().int().min(20).max(400).default(80),
  codex: CodexBackendSchema.default(() => ({})),
});

export type UpdaterSettings = z.infer<typeof UpdaterSettingsSchema>;
export type DiscoveryMode = UpdaterSettings['discovery_mode'];
export type ProviderName = UpdaterSettings['provider'];

/** Settings plus values that never live in a file. */
export interface ResolvedSettings {
  settings: UpdaterSettings;
  /** `ANTHROPIC_API_KEY`, falling back to `CLAUDE_API_KEY`. */
  apiKey?: string;
}

// ============================================================================
// Environment overrides
// ============================================================================

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

/** Parse a boolean environment flag; unrecognized words are a ConfigError. */
export function parseBooleanEnv(name: string, value: string): boolean {
  const lowered = value.trim().toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  throw new ConfigError(`${name} must be one of 1/true/yes/on or 0/false/no/off, got "${value}"`, name);
}

function parseNumberEnv(name: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`, name);
  }
  return parsed;
}

export type Env = Record<string, string | undefined>;

/** Scalar setting fields settable from the environment. */
const NUMBER_ENV: Array<[string, keyof UpdaterSettings]> = [
  ['PATTERN_UPDATER_MAX_TOKENS', 'max_tokens'],
  ['PATTERN_UPDATER_TEMPERATURE', 'temperature'],
  ['PATTERN_UPDATER_TOP_P', 'top_p'],
  ['PATTERN_UPDATER_TIMEOUT_MS', 'timeout_ms'],
  ['PATTERN_UPDATER_MAX_RETRIES', 'max_retries'],
  ['PATTERN_UPDATER_NOVELTY_THRESHOLD', 'novelty_threshold'],
  ['PATTERN_UPDATER_EXCERPT_CHARS', 'excerpt_char_budget'],
  ['PATTERN_UPDATER_MAX_PATTERNS', 'max_patterns'],
];

/**
 * Fold environment variables over raw settings (before validation).
 * Returns a new object; `raw` is not modified.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  const provider = env.PATTERN_UPDATER_PROVIDER;
  if (provider !== undefined && provider.trim() !== '') {
    const lowered = provider.trim().toLowerCase();
    // "claude" is accepted as an alias of the API provider.
    merged.provider = lowered === 'claude' ? 'anthropic' : lowered;
  }

  const model = env.PATTERN_UPDATER_MODEL;
  if (model !== undefined && model.trim() !== '') merged.model = model.trim();

  const baseUrl = env.ANTHROPIC_BASE_URL;
  if (baseUrl !== undefined && baseUrl.trim() !== '') merged.base_url = baseUrl.trim();

  for (const [name, field] of NUMBER_ENV) {
    const value = env[name];
    if (value !== undefined) merged[field] = parseNumberEnv(name, value);
  }

  const disable = env.PATTERN_UPDATER_DISABLE_LLM;
  if (disable !== undefined) {
    merged.disable_llm = parseBooleanEnv('PATTERN_UPDATER_DISABLE_LLM', disable);
  }

  const forceDynamic = env.PATTERN_UPDATER_FORCE_DYNAMIC;
  if (forceDynamic !== undefined && parseBooleanEnv('PATTERN_UPDATER_FORCE_DYNAMIC', forceDynamic)) {
    merged.discovery_mode = 'dynamic';
  }

  const codexOverrides: Record<string, unknown> = {};
  if (env.PATTERN_UPDATER_CODEX_BIN) codexOverrides.bin = env.PATTERN_UPDATER_CODEX_BIN;
  if (env.PATTERN_UPDATER_CODEX_SANDBOX) codexOverrides.sandbox = env.PATTERN_UPDATER_CODEX_SANDBOX;
  if (env.PATTERN_UPDATER_CODEX_APPROVAL) codexOverrides.approval = env.PATTERN_UPDATER_CODEX_APPROVAL;
  if (Object.keys(codexOverrides).length > 0) {
    const fileCodex = typeof raw.codex === 'object' && raw.codex !== null ? raw.codex : {};
    merged.codex = { ...fileCodex, ...codexOverrides };
  }

  return merged;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate raw settings (no I/O).
 *
 * @throws {ConfigError} listing every failing field as `path: message`
 */
export function validateSettings(raw: unknown): UpdaterSettings {
  const result = UpdaterSettingsSchema.safeParse(raw);
  if (result.success) return result.data;

  const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigError(
    `Settings validation failed:\n${errors.join('\n')}`,
    result.error.issues[0]?.path.join('.'),
  );
}

async function readSettingsFile(path: string, explicit: boolean): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT' && !explicit) {
      return {};
    }
    throw new ConfigError(`Cannot read settings file ${path}: ${errorMessage(err)}`, 'config');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in settings file: ${path}`, 'config');
  }
  const object = z.record(z.string(), z.unknown()).safeParse(parsed);
  if (!object.success || Array.isArray(parsed)) {
    throw new ConfigError(`Settings file ${path} must contain a JSON object`, 'config');
  }
  return object.data;
}

export interface LoadSettingsOptions {
  /** Explicit `--config` path; a missing explicit file is an error. */
  configPath?: string;
  cwd: string;
  env: Env;
  /** Commands that never call a backend pass false. Defaults to true. */
  requireCredential?: boolean;
}

/**
 * Resolve settings from file and environment and check the credential.
 *
 * @throws {ConfigError} on unreadable/invalid files, bad env values, or a
 *   missing API key while the anthropic provider is active
 */
export async function loadSettings(options: LoadSettingsOptions): Promise<ResolvedSettings> {
  const explicit = options.configPath !== undefined;
  const path = resolve(options.cwd, options.configPath ?? DEFAULT_SETTINGS_FILE);
  const fileSettings = await readSettingsFile(path, explicit);
  const settings = validateSettings(applyEnvOverrides(fileSettings, options.env));

  const apiKey = options.env.ANTHROPIC_API_KEY?.trim() || options.env.CLAUDE_API_KEY?.trim() || undefined;

  const requireCredential = options.requireCredential ?? true;
  if (requireCredential && settings.provider === 'anthropic' && !settings.disable_llm && !apiKey) {
    throw new ConfigError(
      'ANTHROPIC_API_KEY (or CLAUDE_API_KEY) is not set. Export a key, choose PATTERN_UPDATER_PROVIDER=codex, or set PATTERN_UPDATER_DISABLE_LLM=1 for count-only updates.',
      'ANTHROPIC_API_KEY',
    );
  }

  return { settings, apiKey };
}
