/**
 * Discovery through the Anthropic Messages API.
 *
 * The SDK is loaded lazily so runs with LLM calls disabled never import
 * it. SDK-level retries are off; CompletionBackend owns retrying.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { BackendUnavailableError } from '../errors.js';
import { CompletionBackend } from './backend.js';
import type { BackendRuntime } from './backend.js';

export interface AnthropicBackendOptions {
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP?: number;
  baseURL?: string;
  timeoutMs: number;
}

export class AnthropicBackend extends CompletionBackend {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(
    private readonly options: AnthropicBackendOptions,
    runtime: BackendRuntime,
  ) {
    super(runtime);
  }

  private async getClient(apiKey: string): Promise<Anthropic> {
    if (!this.client) {
      const { default: AnthropicClient } = await import('@anthropic-ai/sdk');
      this.client = new AnthropicClient({
        apiKey,
        baseURL: this.options.baseURL,
        maxRetries: 0,
        timeout: this.options.timeoutMs,
      });
    }
    return this.client;
  }

  protected async complete(prompt: string): Promise<string> {
    if (!this.options.apiKey) {
      throw new BackendUnavailableError(
        'No Anthropic credential configured (set ANTHROPIC_API_KEY or CLAUDE_API_KEY)',
        this.name,
      );
    }
    const client = await this.getClient(this.options.apiKey);

    const response = await client.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
      ...(this.options.topP === undefined ? {} : { top_p: this.options.topP }),
      messages: [{ role: 'user', content: prompt }],
    });

    return response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('');
  }
}
