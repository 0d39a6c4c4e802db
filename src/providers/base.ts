import { PROVIDERS, Provider, type AppConfig, type EventSink, type ProviderAdapter } from '../types.js';
import { createAnthropicAdapter } from './anthropic.js';
import { createOpenAIAdapter } from './openai.js';
import { createOpenRouterAdapter } from './openrouter.js';
import type { AdapterOptions } from './shared.js';

export function createAdapter(provider: Provider, options: AdapterOptions): ProviderAdapter {
  switch (provider) {
    case Provider.Anthropic:
      return createAnthropicAdapter(options);
    case Provider.OpenRouter:
      return createOpenRouterAdapter(options);
    case Provider.OpenAI:
      return createOpenAIAdapter(options);
  }
}

/**
 * One adapter per provider that has a credential. Providers without one are
 * left out and reported as unavailable by the completion engine.
 */
export function createAdapters(
  config: AppConfig,
  onEvent?: EventSink,
): Partial<Record<Provider, ProviderAdapter>> {
  const adapters: Partial<Record<Provider, ProviderAdapter>> = {};
  for (const provider of PROVIDERS) {
    const apiKey = config.apiKeys[provider];
    if (!apiKey) continue;
    adapters[provider] = createAdapter(provider, {
      apiKey,
      maxTokens: config.maxTokens,
      timeoutMs: config.timeout * 1000,
      reasoningModel: config.reasoningModel,
      noSystemPromptModels: config.noSystemPromptModels,
      onEvent,
    });
  }
  return adapters;
}
