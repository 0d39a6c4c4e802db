import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildConfig } from '../config.js';
import { Provider } from '../types.js';
import { CLIError, collect, createLogger, parseModelRef, parseParticipant, parseTemperature, resolveSelection } from './helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('option parsing', () => {
  it('splits Provider:model on the first colon', () => {
    expect(parseModelRef('openrouter:meta-llama/llama-3:free')).toEqual({
      provider: Provider.OpenRouter,
      model: 'meta-llama/llama-3:free',
    });
    expect(() => parseModelRef('gpt-4o')).toThrow(CLIError);
    expect(() => parseModelRef('Gemini:pro')).toThrow(CLIError);
  });

  it('parses name=Provider:model participants', () => {
    expect(parseParticipant('critic=Anthropic:claude-3-opus-20240229')).toEqual({
      name: 'critic',
      provider: Provider.Anthropic,
      model: 'claude-3-opus-20240229',
    });
    expect(() => parseParticipant('Anthropic:claude')).toThrow(CLIError);
  });

  it('validates temperature', () => {
    expect(parseTemperature(undefined, 0.7)).toBe(0.7);
    expect(parseTemperature('0', 0.7)).toBe(0);
    expect(() => parseTemperature('2.5', 0.7)).toThrow(CLIError);
  });

  it('collects repeated options', () => {
    expect(collect('b', ['a'])).toEqual(['a', 'b']);
  });
});

describe('resolveSelection', () => {
  const config = buildConfig({ temperature: 0.4 }, { OPENAI_API_KEY: 'test-secret', OPENROUTER_API_KEY: 'test-secret' });

  it('defaults to the first available provider and its first model', () => {
    expect(resolveSelection(config, {})).toEqual({
      provider: Provider.OpenRouter,
      model: 'deepseek/deepseek-r1',
      temperature: 0.4,
    });
  });

  it('honours explicit choices', () => {
    expect(resolveSelection(config, { provider: 'openai', model: 'o1-preview', temperature: '1' })).toEqual({
      provider: Provider.OpenAI,
      model: 'o1-preview',
      temperature: 1,
    });
  });

  it('refuses a provider without a credential', () => {
    expect(() => resolveSelection(config, { provider: 'anthropic' })).toThrow(CLIError);
  });
});

describe('createLogger', () => {
  it('always shows warnings and hides info unless verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const quiet = createLogger();
    quiet('info', { message: 'hidden' });
    quiet('status', { message: 'hidden' });
    quiet('participant:done', { message: 'hidden' });
    expect(spy).not.toHaveBeenCalled();
    quiet('warn', { message: 'careful' });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toContain('careful');

    spy.mockClear();
    const loud = createLogger({ verbose: true });
    loud('info', { message: 'shown' });
    loud('participant:done', { message: 'shown' });
    loud('error', { message: 'shown' });
    expect(spy).toHaveBeenCalledTimes(3);
  });
});
