import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CompletionEngine } from '../src/completion.js';
import { SessionController } from '../src/controller.js';
import { SessionStore } from '../src/session.js';
import { toDisplayTurns } from '../src/transcript.js';
import { ChatMode, Provider, type Message, type ProviderAdapter } from '../src/types.js';

/** Adapter that records what it was sent and answers by model id. */
function recordingAdapter(provider: Provider, answer: (model: string, messages: readonly Message[]) => string) {
  const seen: Array<{ model: string; messages: readonly Message[]; system: string }> = [];
  const adapter: ProviderAdapter = {
    provider,
    complete: vi.fn(async (model: string, messages: readonly Message[], system: string) => {
      seen.push({ model, messages, system });
      return answer(model, messages);
    }),
  };
  return { adapter, seen };
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'roundtable-flow-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('round table conversation', () => {
  it('runs two rounds, saves, reloads and continues', async () => {
    const openai = recordingAdapter(Provider.OpenAI, (model, messages) =>
      model === 'gpt-4o' ? `chairman read ${messages.length}` : `A on: ${messages[messages.length - 1].content}`,
    );
    const openrouter = recordingAdapter(Provider.OpenRouter, (_model, messages) => `B saw ${messages.length}`);
    const engine = new CompletionEngine(
      { [Provider.OpenAI]: openai.adapter, [Provider.OpenRouter]: openrouter.adapter },
      { retryDelayMs: 0 },
    );
    const sessions = new SessionStore(join(dir, 'sessions'));
    const controller = new SessionController(engine, { sessions, defaultSystem: 'Be precise.' });
    const selection = { provider: Provider.OpenAI, model: 'gpt-4o-mini', temperature: 0.7 };

    controller.switchMode(ChatMode.RoundTable);
    controller.addParticipant({ name: 'A', provider: Provider.OpenAI, model: 'gpt-4o-mini' });
    controller.addParticipant({ name: 'B', provider: Provider.OpenRouter, model: 'deepseek/deepseek-r1' });
    controller.setChairman({ provider: Provider.OpenAI, model: 'gpt-4o' });

    await controller.submit('Explain gravity', selection);
    await controller.submit('And tides?', selection);

    // Second round: participants see the whole history, chairman sees user turns plus the summary request
    expect(openrouter.seen[1].messages).toHaveLength(5);
    const chairmanCalls = openai.seen.filter((c) => c.model === 'gpt-4o');
    expect(chairmanCalls).toHaveLength(2);
    expect(chairmanCalls[1].messages.map((m) => m.role)).toEqual(['user', 'user', 'user']);
    expect(chairmanCalls[1].system.startsWith('Be precise.\n\nYou are the chairman')).toBe(true);

    expect(toDisplayTurns(controller.session)).toEqual([
      ['Explain gravity', '**A**: A on: Explain gravity\n\n---\n\n**B**: B saw 1\n\n---\n\n**Chairman (gpt-4o)**: chairman read 2'],
      ['And tides?', '**A**: A on: And tides?\n\n---\n\n**B**: B saw 5\n\n---\n\n**Chairman (gpt-4o)**: chairman read 3'],
    ]);

    expect(await controller.save('gravity')).toEqual({ ok: true, message: 'Session saved to gravity.json' });
    const onDisk: unknown = JSON.parse(await readFile(join(dir, 'sessions', 'gravity.json'), 'utf-8'));
    expect(onDisk).toMatchObject({
      system: 'Be precise.',
      mode: 'Round Table',
      round_table: {
        models: {
          A: { provider: 'OpenAI', model: 'gpt-4o-mini' },
          B: { provider: 'OpenRouter', model: 'deepseek/deepseek-r1' },
        },
        chairman: { provider: 'OpenAI', model: 'gpt-4o' },
      },
    });

    const resumed = new SessionController(engine, { sessions });
    expect((await resumed.load('gravity.json')).ok).toBe(true);
    expect(resumed.session).toEqual(controller.session);

    await resumed.submit('And orbits?', selection);
    expect(resumed.session.history).toHaveLength(12);
    expect(resumed.session.history[11]).toEqual({
      role: 'assistant',
      content: 'chairman read 4',
      source: 'Chairman (gpt-4o)',
    });
  });
});
