/**
 * OpenRouter backend: a plain bearer-token POST to the chat completions endpoint.
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { Provider, type ProviderAdapter } from '../types.js';
import type { AdapterOptions } from './shared.js';

export const OPENROUTER_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const NO_DATA = '<No data returned>';

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).passthrough().optional() }).passthrough())
    .optional(),
});

export function createOpenRouterAdapter(options: AdapterOptions, apiUrl: string = OPENROUTER_URL): ProviderAdapter {
  const { apiKey, timeoutMs } = options;

  return {
    provider: Provider.OpenRouter,
    async complete(model, messages, systemPrompt, temperature) {
      const label = `${Provider.OpenRouter}/${model}`;
      const requestBody = {
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          ...messages.map((m) => ({ role: m.role, content: m.content })),
        ],
        temperature,
      };

      let response: Response;
      try {
        response = await fetch(apiUrl, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(requestBody),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        throw ProviderError.from(err, label);
      }

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw new ProviderError(`${label}: HTTP ${response.status} ${response.statusText}`.trim(), {
          response,
          body: errorText,
        });
      }

      let raw: unknown;
      try {
        raw = await response.json();
      } catch (err) {
        throw ProviderError.from(err, `${label}: malformed response`);
      }
      const parsed = ChatCompletionSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderError(`${label}: malformed response`, { response, body: JSON.stringify(raw) });
      }
      return parsed.data.choices?.[0]?.message?.content ?? NO_DATA;
    },
  };
}
