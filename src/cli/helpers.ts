import { resolve as resolvePath } from 'node:path';
import chalk from 'chalk';
import { DEFAULT_SYSTEM_PROMPT } from '../chat-session.js';
import { CompletionEngine } from '../completion.js';
import { API_KEY_ENV, availableProviders, loadConfig, parseProvider, validateCredentials } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { createAdapters } from '../providers/base.js';
import { PromptStore, SessionStore } from '../session.js';
import type { AppConfig, EventSink, Message, ModelRef, Participant, Provider, Selection } from '../types.js';

export class CLIError extends Error {
  constructor(message: string, public exitCode: number = 1) {
    super(message);
    this.name = 'CLIError';
  }
}

export async function readStdin(timeoutMs = 5000): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const timer = setTimeout(() => {
      process.stdin.destroy();
      resolve(Buffer.concat(chunks).toString('utf-8'));
    }, timeoutMs);
    process.stdin.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    process.stdin.on('end', () => {
      clearTimeout(timer);
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    process.stdin.on('error', () => {
      clearTimeout(timer);
      resolve('');
    });
  });
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Event sink that writes engine events to stderr. Progress and info lines
 * only show with --verbose; warnings always do.
 */
export function createLogger(options: { verbose?: boolean; progress?: boolean } = {}): EventSink {
  const verbose = options.verbose ?? false;
  const progress = options.progress ?? verbose;
  return (event, data) => {
    switch (event) {
      case 'warn':
      case 'participant:failed':
        console.error(chalk.yellow(`⚠ ${data.message}`));
        break;
      case 'error':
        if (verbose) console.error(chalk.red(data.message));
        break;
      case 'participant:done':
      case 'chairman:start':
        if (progress) console.error(chalk.dim(`  ${data.message}`));
        break;
      case 'info':
      case 'status':
        if (verbose) console.error(chalk.dim(data.message));
        break;
    }
  };
}

/** Round-table answers get a header per source; the chairman's stands out. */
export function printAnswers(messages: readonly Message[]): void {
  for (const m of messages) {
    console.log('');
    if (m.source) {
      console.log(
        m.source.startsWith('Chairman')
          ? chalk.bold.green(`═══ ${m.source} ═══`)
          : chalk.bold.yellow(`── ${m.source} ──`),
      );
    }
    console.log(m.content);
  }
  console.log('');
}

// ============================================================================
// Runtime wiring
// ============================================================================

export interface Runtime {
  config: AppConfig;
  log: EventSink;
  engine: CompletionEngine;
  sessions: SessionStore;
  prompts: PromptStore;
  defaultSystem: string;
}

export async function createRuntime(log: EventSink): Promise<Runtime> {
  let config: AppConfig;
  try {
    config = await loadConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) throw new CLIError(chalk.red(err.message));
    throw err;
  }
  for (const warning of validateCredentials(config)) log('info', { message: warning });
  if (availableProviders(config).length === 0) {
    throw new CLIError(
      chalk.red('No providers available.') +
        '\n' +
        chalk.dim(`Set at least one of ${Object.values(API_KEY_ENV).join(', ')} (a .env file works too).`),
    );
  }

  const engine = new CompletionEngine(createAdapters(config, log), { onEvent: log });
  const sessions = new SessionStore(resolvePath(config.sessionsDir));
  const prompts = new PromptStore(resolvePath(config.promptsDir));
  await sessions.init();
  const defaultPrompt = await prompts.loadDefault(config.defaultPrompt, log);

  return {
    config,
    log,
    engine,
    sessions,
    prompts,
    defaultSystem: defaultPrompt ?? DEFAULT_SYSTEM_PROMPT,
  };
}

// ============================================================================
// Option parsing
// ============================================================================

/** `Provider:model`; the model id may itself contain `:` or `/`. */
export function parseModelRef(spec: string): ModelRef {
  const sep = spec.indexOf(':');
  if (sep <= 0 || sep === spec.length - 1) {
    throw new CLIError(chalk.red(`Invalid model "${spec}". Expected Provider:model, e.g. OpenAI:gpt-4o`));
  }
  try {
    return { provider: parseProvider(spec.slice(0, sep)), model: spec.slice(sep + 1).trim() };
  } catch (err) {
    if (err instanceof ConfigurationError) throw new CLIError(chalk.red(err.message));
    throw err;
  }
}

/** `name=Provider:model` */
export function parseParticipant(spec: string): Participant {
  const eq = spec.indexOf('=');
  if (eq <= 0) {
    throw new CLIError(
      chalk.red(`Invalid participant "${spec}". Expected name=Provider:model, e.g. critic=Anthropic:claude-3-opus-20240229`),
    );
  }
  return { name: spec.slice(0, eq).trim(), ...parseModelRef(spec.slice(eq + 1)) };
}

export function parseTemperature(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const t = Number(value);
  if (!Number.isFinite(t) || t < 0 || t > 2) {
    throw new CLIError(chalk.red(`Invalid temperature "${value}". Must be between 0 and 2.`));
  }
  return t;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Provider/model for Standard turns. Defaults to the first available provider
 * and the first model configured for it.
 */
export function resolveSelection(
  config: AppConfig,
  opts: { provider?: string; model?: string; temperature?: string },
): Selection {
  let provider: Provider;
  try {
    provider = opts.provider ? parseProvider(opts.provider) : availableProviders(config)[0];
  } catch (err) {
    if (err instanceof ConfigurationError) throw new CLIError(chalk.red(err.message));
    throw err;
  }
  const models = config.availableModels[provider];
  if (!models) {
    throw new CLIError(chalk.red(`${provider} is unavailable: set ${API_KEY_ENV[provider]}`));
  }
  return {
    provider,
    model: opts.model ?? models[0],
    temperature: parseTemperature(opts.temperature, config.temperature),
  };
}
