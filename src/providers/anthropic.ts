import { complete, stream } from '@mariozechner/pi-ai';
import type { Context, Model } from '@mariozechner/pi-ai';
import { ProviderError, errorMessage } from '../errors.js';
import { Provider, type Message, type ProviderAdapter } from '../types.js';
import {
  extractText,
  resolveModel,
  toPiMessages,
  withTimeout,
  type AdapterOptions,
} from './shared.js';

const ANTHROPIC_BASE_URL = 'https://api.anthropic.com';

// Extended reasoning: large output ceiling with most of it reserved for thinking
export const REASONING_MAX_TOKENS = 64000;
export const REASONING_BUDGET_TOKENS = 54000;

type AnthropicModel = Model<'anthropic-messages'>;

/**
 * Anthropic Messages backend. The system prompt travels in its own field.
 * The configured reasoning model is streamed with thinking enabled; only the
 * visible text deltas are kept.
 */
export function createAnthropicAdapter(options: AdapterOptions): ProviderAdapter {
  const { apiKey, maxTokens, timeoutMs, reasoningModel } = options;
  const emit = options.onEvent ?? (() => {});

  const buildContext = (model: AnthropicModel, messages: readonly Message[], systemPrompt: string): Context => ({
    systemPrompt,
    messages: toPiMessages(messages, model),
  });

  const completeOnce = async (model: AnthropicModel, context: Context, temperature: number, label: string) => {
    const result = await withTimeout(
      (signal) => complete(model, context, { apiKey, maxTokens, temperature, signal }),
      timeoutMs,
      label,
    );
    return extractText(result, label);
  };

  const streamReasoning = (model: AnthropicModel, context: Context, label: string): Promise<string> =>
    withTimeout(
      async (signal) => {
        const events = stream(model, context, {
          apiKey,
          maxTokens: REASONING_MAX_TOKENS,
          thinkingEnabled: true,
          thinkingBudgetTokens: REASONING_BUDGET_TOKENS,
          signal,
        });
        const deltas: string[] = [];
        for await (const event of events) {
          if (event.type === 'text_delta') {
            deltas.push(event.delta);
          } else if (event.type === 'error') {
            throw new ProviderError(`${label} stream error`);
          }
        }
        if (deltas.length === 0) {
          return extractText(await events.result(), label, '');
        }
        return deltas.join('');
      },
      timeoutMs,
      label,
    );

  return {
    provider: Provider.Anthropic,
    async complete(modelId, messages, systemPrompt, temperature) {
      const label = `${Provider.Anthropic}/${modelId}`;
      try {
        const model = resolveModel('anthropic', 'anthropic-messages', modelId, ANTHROPIC_BASE_URL);
        const context = buildContext(model, messages, systemPrompt);

        if (modelId === reasoningModel) {
          try {
            return await streamReasoning(model, context, label);
          } catch (streamErr) {
            emit('warn', {
              message: `Streaming error from ${label}: ${errorMessage(streamErr)}. Falling back to a single request.`,
              provider: Provider.Anthropic,
            });
          }
        }

        return await completeOnce(model, context, temperature, label);
      } catch (err) {
        throw ProviderError.from(err);
      }
    },
  };
}
