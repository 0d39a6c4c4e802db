import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { AssistantMessage } from '@mariozechner/pi-ai';

vi.mock('@mariozechner/pi-ai', () => ({
  complete: vi.fn(),
  stream: vi.fn(),
  getModels: vi.fn(() => []),
}));

import { complete, stream } from '@mariozechner/pi-ai';
import { createMessage } from '../chat-session.js';
import { ProviderError } from '../errors.js';
import { Provider } from '../types.js';
import { createAnthropicAdapter, REASONING_BUDGET_TOKENS, REASONING_MAX_TOKENS } from './anthropic.js';
import { createOpenAIAdapter } from './openai.js';
import { extractText, resolveModel, toPiMessages, withTimeout, type AdapterOptions } from './shared.js';

const REASONING = 'claude-3-7-sonnet-20250219';

const options: AdapterOptions = {
  apiKey: 'test-secret',
  maxTokens: 8192,
  timeoutMs: 5000,
  reasoningModel: REASONING,
  noSystemPromptModels: ['o1-preview'],
};

function result(texts: string[], extra: Partial<AssistantMessage> = {}): AssistantMessage {
  return {
    role: 'assistant',
    content: texts.map((text) => ({ type: 'text' as const, text })),
    api: 'anthropic-messages',
    provider: 'anthropic',
    model: 'm',
    usage: {
      input: 0,
      output: 0,
      cacheRead: 0,
      cacheWrite: 0,
      totalTokens: 0,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
    },
    stopReason: 'stop',
    timestamp: 0,
    ...extra,
  };
}

/** Minimal stand-in for pi-ai's event stream: async iterable plus result(). */
function fakeStream(events: Array<{ type: string; delta?: string }>, final: AssistantMessage) {
  const s = {
    async *[Symbol.asyncIterator]() {
      for (const e of events) yield e;
    },
    result: async () => final,
  };
  return s as unknown as ReturnType<typeof stream>;
}

const history = [createMessage('user', 'Explain gravity')];

beforeEach(() => {
  vi.mocked(complete).mockReset();
  vi.mocked(stream).mockReset();
});

describe('shared helpers', () => {
  it('builds a descriptor for models pi-ai does not know', () => {
    expect(resolveModel('openai', 'openai-completions', 'm', 'https://example.test/v1')).toMatchObject({
      id: 'm',
      api: 'openai-completions',
      provider: 'openai',
      baseUrl: 'https://example.test/v1',
    });
  });

  it('sends every non-assistant message as a user turn', () => {
    const model = resolveModel('openai', 'openai-completions', 'm', 'https://example.test/v1');
    const out = toPiMessages(
      [createMessage('system', 'note'), createMessage('user', 'q'), createMessage('assistant', 'a', 'A')],
      model,
    );
    expect(out.map((m) => m.role)).toEqual(['user', 'user', 'assistant']);
    expect(out[2]).toMatchObject({ content: [{ type: 'text', text: 'a' }], model: 'm', stopReason: 'stop' });
  });

  it('joins text blocks and surfaces error results', () => {
    expect(extractText(result(['a', 'b']), 'x')).toBe('a\nb');
    expect(extractText(result(['a', 'b']), 'x', '')).toBe('ab');
    const failed = result([], { stopReason: 'error', errorMessage: '401 invalid x-api-key' });
    expect(() => extractText(failed, 'Anthropic/m')).toThrow(new ProviderError('Anthropic/m: 401 invalid x-api-key'));
  });

  it('rejects once the deadline passes and aborts the request', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout(
      (signal) => {
        seen.signal = signal;
        return new Promise<string>(() => {});
      },
      10,
      'OpenAI/gpt-4o',
    );

    await expect(pending).rejects.toThrow('OpenAI/gpt-4o timed out after 0.01s');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('leaves the signal alone when the request finishes in time', async () => {
    const seen: { signal?: AbortSignal } = {};
    const text = await withTimeout(
      async (signal) => {
        seen.signal = signal;
        return 'done';
      },
      1000,
      'OpenAI/gpt-4o',
    );
    expect(text).toBe('done');
    expect(seen.signal?.aborted).toBe(false);
  });
});

describe('Anthropic adapter', () => {
  it('sends the system prompt separately with the configured limits', async () => {
    vi.mocked(complete).mockResolvedValue(result(['Masses attract.']));
    const adapter = createAnthropicAdapter(options);

    const text = await adapter.complete('claude-3-opus-20240229', history, 'Be thorough.', 0.3);

    expect(text).toBe('Masses attract.');
    const [model, context, opts] = vi.mocked(complete).mock.calls[0];
    expect(model).toMatchObject({ id: 'claude-3-opus-20240229', api: 'anthropic-messages', provider: 'anthropic' });
    expect(context.systemPrompt).toBe('Be thorough.');
    expect(context.messages).toEqual([expect.objectContaining({ role: 'user', content: 'Explain gravity' })]);
    expect(opts).toEqual({ apiKey: 'test-secret', maxTokens: 8192, temperature: 0.3, signal: expect.any(AbortSignal) });
    expect(stream).not.toHaveBeenCalled();
  });

  it('turns an error result into a ProviderError', async () => {
    vi.mocked(complete).mockResolvedValue(result([], { stopReason: 'error', errorMessage: 'overloaded' }));
    const adapter = createAnthropicAdapter(options);

    await expect(adapter.complete('claude-3-opus-20240229', history, 's', 0)).rejects.toThrow(
      new ProviderError('Anthropic/claude-3-opus-20240229: overloaded'),
    );
  });

  it('streams the reasoning model with thinking enabled and keeps only text', async () => {
    vi.mocked(stream).mockReturnValue(
      fakeStream(
        [
          { type: 'thinking_delta', delta: 'hmm' },
          { type: 'text_delta', delta: 'Space' },
          { type: 'text_delta', delta: 'time' },
        ],
        result(['ignored']),
      ),
    );
    const adapter = createAnthropicAdapter(options);

    expect(await adapter.complete(REASONING, history, 's', 0.9)).toBe('Spacetime');
    const opts = vi.mocked(stream).mock.calls[0][2];
    expect(opts?.signal).toBeInstanceOf(AbortSignal);
    expect(opts).toMatchObject({
      apiKey: 'test-secret',
      maxTokens: REASONING_MAX_TOKENS,
      thinkingEnabled: true,
      thinkingBudgetTokens: REASONING_BUDGET_TOKENS,
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('falls back to a single request when streaming fails', async () => {
    vi.mocked(stream).mockReturnValue(fakeStream([{ type: 'error' }], result([])));
    vi.mocked(complete).mockResolvedValue(result(['fallback']));
    const onEvent = vi.fn();
    const adapter = createAnthropicAdapter({ ...options, onEvent });

    expect(await adapter.complete(REASONING, history, 's', 0.9)).toBe('fallback');
    expect(onEvent).toHaveBeenCalledWith('warn', {
      message:
        `Streaming error from Anthropic/${REASONING}: Anthropic/${REASONING} stream error. ` +
        'Falling back to a single request.',
      provider: Provider.Anthropic,
    });
    expect(vi.mocked(complete).mock.calls[0][2]).toEqual({
      apiKey: 'test-secret',
      maxTokens: 8192,
      temperature: 0.9,
      signal: expect.any(AbortSignal),
    });
  });
});

describe('OpenAI adapter', () => {
  it('passes the system prompt and temperature', async () => {
    vi.mocked(complete).mockResolvedValue(result(['4']));
    const adapter = createOpenAIAdapter(options);

    expect(await adapter.complete('gpt-4o', history, 'sys', 0.2)).toBe('4');
    const [model, context, opts] = vi.mocked(complete).mock.calls[0];
    expect(model).toMatchObject({ id: 'gpt-4o', api: 'openai-completions', baseUrl: 'https://api.openai.com/v1' });
    expect(context.systemPrompt).toBe('sys');
    expect(opts).toEqual({ apiKey: 'test-secret', maxTokens: 8192, temperature: 0.2, signal: expect.any(AbortSignal) });
  });

  it('moves the system prompt into the conversation for restricted models', async () => {
    vi.mocked(complete).mockResolvedValue(result(['ok']));
    const adapter = createOpenAIAdapter(options);

    await adapter.complete('o1-preview', history, 'sys', 0.2);

    const [, context, opts] = vi.mocked(complete).mock.calls[0];
    expect(context.systemPrompt).toBeUndefined();
    expect(context.messages.map((m) => ('content' in m ? m.content : null))).toEqual(['sys', 'Explain gravity']);
    expect(opts).toEqual({ apiKey: 'test-secret', maxTokens: 8192, signal: expect.any(AbortSignal) });
  });

  it('wraps thrown errors', async () => {
    vi.mocked(complete).mockRejectedValue(new Error('socket hang up'));
    const adapter = createOpenAIAdapter(options);
    await expect(adapter.complete('gpt-4o', history, 's', 0)).rejects.toBeInstanceOf(ProviderError);
  });
});
