import { ConfigurationError, ProviderError, errorMessage } from './errors.js';
import type { EventSink, Message, Provider, ProviderAdapter } from './types.js';

export const MAX_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 1000;

export interface CompletionEngineOptions {
  onEvent?: EventSink;
  /** Fixed wait between attempts */
  retryDelayMs?: number;
}

/**
 * Single-call completion with a bounded retry. Every attempt goes to the same
 * adapter; the delay between attempts is constant.
 */
export class CompletionEngine {
  private adapters: Partial<Record<Provider, ProviderAdapter>>;
  private emit: EventSink;
  private retryDelayMs: number;

  constructor(adapters: Partial<Record<Provider, ProviderAdapter>>, options?: CompletionEngineOptions) {
    this.adapters = adapters;
    this.emit = options?.onEvent ?? (() => {});
    this.retryDelayMs = options?.retryDelayMs ?? RETRY_DELAY_MS;
  }

  isAvailable(provider: Provider): boolean {
    return this.adapters[provider] !== undefined;
  }

  async getCompletion(
    provider: Provider,
    model: string,
    messages: readonly Message[],
    systemPrompt: string,
    temperature: number,
  ): Promise<string> {
    const adapter = this.adapterFor(provider);
    let lastError: unknown;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const text = await adapter.complete(model, messages, systemPrompt, temperature);
        if (text.trim().length > 0) return text;
        throw new ProviderError(`${provider}/${model} returned an empty response`);
      } catch (err) {
        lastError = err;
        this.emit('warn', {
          message: `Attempt ${attempt}/${MAX_ATTEMPTS} failed: ${errorMessage(err)}.${attempt < MAX_ATTEMPTS ? ' Retrying...' : ''}`,
          provider,
          model,
          attempt,
        });
        if (attempt < MAX_ATTEMPTS) {
          await new Promise((r) => setTimeout(r, this.retryDelayMs));
        }
      }
    }

    const detail = errorMessage(lastError);
    this.emit('error', {
      message: `Error getting completion from ${provider} after ${MAX_ATTEMPTS} attempts: ${detail}`,
      provider,
      model,
    });
    throw new ProviderError(`Failed after ${MAX_ATTEMPTS} attempts: ${detail}`, {
      attempts: MAX_ATTEMPTS,
      cause: lastError,
      body: lastError instanceof ProviderError ? lastError.body : undefined,
      response: lastError instanceof ProviderError ? lastError.response : undefined,
    });
  }

  private adapterFor(provider: Provider): ProviderAdapter {
    const adapter = this.adapters[provider];
    if (!adapter) {
      throw new ConfigurationError(`${provider} is unavailable: no API key configured`);
    }
    return adapter;
  }
}
