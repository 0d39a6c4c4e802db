import { getModels } from '@mariozechner/pi-ai';
import type {
  Api,
  AssistantMessage,
  KnownProvider,
  Message as PiMessage,
  Model,
} from '@mariozechner/pi-ai';
import { ProviderError } from '../errors.js';
import type { EventSink, Message } from '../types.js';

export interface AdapterOptions {
  apiKey: string;
  maxTokens: number;
  /** Per-call deadline in milliseconds */
  timeoutMs: number;
  reasoningModel: string;
  noSystemPromptModels: readonly string[];
  onEvent?: EventSink;
}

// ============================================================================
// Shared pi-ai plumbing
// ============================================================================

/**
 * Map a model id to a pi-ai Model descriptor for the given wire API.
 * Registered models keep their metadata; unknown ids get a minimal descriptor.
 */
export function resolveModel<TApi extends Api>(
  piProvider: KnownProvider,
  api: TApi,
  id: string,
  baseUrl: string,
): Model<TApi> {
  const registered = getModels(piProvider).find((m) => m.id === id);
  if (registered) {
    return { ...registered, api } as Model<TApi>;
  }
  return {
    id,
    name: id,
    api,
    provider: piProvider,
    baseUrl,
    reasoning: false,
    input: ['text'],
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
    contextWindow: 128000,
    maxTokens: 4096,
    headers: {},
  } as Model<TApi>;
}

export function userTurn(content: string): PiMessage {
  return { role: 'user', content, timestamp: Date.now() };
}

/** Prior assistant turns replayed to pi-ai carry no usage of their own. */
export function assistantTurn<TApi extends Api>(content: string, model: Model<TApi>): PiMessage {
  const turn: AssistantMessage = {
    role: 'assistant',
    content: [{ type: 'text', text: content }],
    api: model.api,
    provider: model.provider,
    model: model.id,
    usage: {
      input: 0,
      output: 0,
      cacheRead: 0,
      cacheWrite: 0,
      totalTokens: 0,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
    },
    stopReason: 'stop',
    timestamp: Date.now(),
  };
  return turn;
}

/** Canonical messages in pi-ai shape; anything that is not an assistant turn is sent as user. */
export function toPiMessages<TApi extends Api>(messages: readonly Message[], model: Model<TApi>): PiMessage[] {
  return messages.map((m) => (m.role === 'assistant' ? assistantTurn(m.content, model) : userTurn(m.content)));
}

/**
 * Pull the visible text out of a finished pi-ai message. pi-ai reports API
 * failures on the message itself rather than throwing.
 */
export function extractText(result: AssistantMessage, label: string, separator = '\n'): string {
  if (result.stopReason === 'error' || result.errorMessage) {
    throw new ProviderError(`${label}: ${(result.errorMessage ?? 'request failed').slice(0, 500)}`, {
      body: result.errorMessage,
    });
  }
  const parts: string[] = [];
  for (const block of result.content) {
    if (block.type === 'text' && block.text) parts.push(block.text);
  }
  return parts.join(separator);
}

/**
 * Run a request with a deadline. The request receives an abort signal that
 * fires when the deadline passes or the request fails, so a timed-out call does
 * not keep running underneath a retry.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const ac = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ac.abort();
      reject(new ProviderError(`${label} timed out after ${timeoutMs / 1000}s`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(ac.signal), deadline]);
  } catch (err) {
    ac.abort();
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
