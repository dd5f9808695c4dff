/**
 * Shared discovery backend behaviour and the provider factory.
 *
 * A backend only implements `complete(prompt) -> raw text`. Retrying,
 * wrapping failures as BackendUnavailable and parsing the response into
 * candidates happen here, so both providers behave identically.
 */

import { BackendUnavailableError, MalformedResponseError, errorMessage } from '../errors.js';
import type { ResolvedSettings } from '../config/settings.js';
import { parseCandidates } from './candidate-parser.js';
import { isTransientError, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type { DiscoveryBackend, DiscoveryPrompt, DiscoveryResult } from './types.js';

export interface BackendRuntime {
  retry: RetryPolicy;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export abstract class CompletionBackend implements DiscoveryBackend {
  abstract readonly name: string;

  constructor(protected readonly runtime: BackendRuntime) {}

  /** Send the prompt and return the raw model text. */
  protected abstract complete(prompt: string): Promise<string>;

  protected isRetryable(err: unknown): boolean {
    return isTransientError(err);
  }

  async submit(prompt: DiscoveryPrompt): Promise<DiscoveryResult> {
    let raw: string;
    try {
      const outcome = await withRetry(
        () => this.complete(prompt.text),
        this.runtime.retry,
        (err) => this.isRetryable(err),
        this.runtime.sleep,
      );
      raw = outcome.value;
    } catch (err) {
      if (err instanceof BackendUnavailableError) {
        return { ok: false, error: err };
      }
      return {
        ok: false,
        error: new BackendUnavailableError(`${this.name} backend failed: ${errorMessage(err)}`, this.name, { cause: err }),
      };
    }

    try {
      return { ok: true, candidates: parseCandidates(raw, prompt) };
    } catch (err) {
      if (err instanceof MalformedResponseError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }
}

/** Retry policy from settings. */
export function retryPolicyFrom(resolved: ResolvedSettings): RetryPolicy {
  return {
    maxRetries: resolved.settings.max_retries,
    baseDelayMs: resolved.settings.retry_base_delay_ms,
    maxDelayMs: resolved.settings.retry_max_delay_ms,
  };
}

/**
 * Construct the configured backend.
 *
 * @param cwd - Working directory for the codex CLI
 */
export async function createBackend(resolved: ResolvedSettings, cwd: string): Promise<DiscoveryBackend> {
  const runtime: BackendRuntime = { retry: retryPolicyFrom(resolved) };
  const { settings } = resolved;

  if (settings.provider === 'codex') {
    const { CodexBackend } = await import('./codex-backend.js');
    return new CodexBackend({
      bin: settings.codex.bin,
      sandbox: settings.codex.sandbox,
      approval: settings.codex.approval,
      enableNetwork: settings.codex.enable_network,
      timeoutMs: settings.timeout_ms,
      cwd,
    }, runtime);
  }

  const { AnthropicBackend } = await import('./anthropic-backend.js');
  return new AnthropicBackend({
    apiKey: resolved.apiKey,
    model: settings.model,
    maxTokens: settings.max_tokens,
    temperature: settings.temperature,
    topP: settings.top_p,
    baseURL: settings.base_url,
    timeoutMs: settings.timeout_ms,
  }, runtime);
}
