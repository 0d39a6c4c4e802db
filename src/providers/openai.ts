import { complete } from '@mariozechner/pi-ai';
import type { Context } from '@mariozechner/pi-ai';
import { ProviderError } from '../errors.js';
import { Provider, type ProviderAdapter } from '../types.js';
import { extractText, resolveModel, toPiMessages, userTurn, withTimeout, type AdapterOptions } from './shared.js';

const OPENAI_BASE_URL = 'https://api.openai.com/v1';

/**
 * OpenAI chat-completions backend. Some models reject both the system role and
 * sampling parameters: for those the system prompt becomes the first user turn
 * and no temperature is sent.
 */
export function createOpenAIAdapter(options: AdapterOptions): ProviderAdapter {
  const { apiKey, maxTokens, timeoutMs, noSystemPromptModels } = options;

  return {
    provider: Provider.OpenAI,
    async complete(modelId, messages, systemPrompt, temperature) {
      const label = `${Provider.OpenAI}/${modelId}`;
      try {
        const model = resolveModel('openai', 'openai-completions', modelId, OPENAI_BASE_URL);
        const restricted = noSystemPromptModels.includes(modelId);

        let context: Context;
        if (restricted) {
          const history = toPiMessages(messages, model);
          context = { messages: systemPrompt ? [userTurn(systemPrompt), ...history] : history };
        } else {
          context = { systemPrompt, messages: toPiMessages(messages, model) };
        }

        const result = await withTimeout(
          (signal) =>
            complete(
              model,
              context,
              restricted ? { apiKey, maxTokens, signal } : { apiKey, maxTokens, temperature, signal },
            ),
          timeoutMs,
          label,
        );
        return extractText(result, label);
      } catch (err) {
        throw ProviderError.from(err);
      }
    },
  };
}
