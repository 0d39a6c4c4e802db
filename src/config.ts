import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse } from 'yaml';
import { ConfigFileSchema, type ConfigFile } from './config-schema.js';
import { ConfigurationError } from './errors.js';
import { PROVIDERS, Provider, type AppConfig } from './types.js';

const CONFIG_DIR = join(homedir(), '.roundtable');
const CONFIG_PATH = join(CONFIG_DIR, 'config.yaml');
const LOCAL_CONFIG = 'roundtable.yaml';

export const API_KEY_ENV: Record<Provider, string> = {
  [Provider.Anthropic]: 'ANTHROPIC_API_KEY',
  [Provider.OpenRouter]: 'OPENROUTER_API_KEY',
  [Provider.OpenAI]: 'OPENAI_API_KEY',
};

export const DEFAULT_MODELS: Record<Provider, string[]> = {
  [Provider.Anthropic]: ['claude-3-7-sonnet-20250219', 'claude-3-5-sonnet-20241022', 'claude-3-opus-20240229'],
  [Provider.OpenRouter]: ['deepseek/deepseek-r1'],
  [Provider.OpenAI]: ['gpt-4o', 'o1-preview', 'gpt-4.5-preview'],
};

const DEFAULTS = {
  maxTokens: 8192,
  timeout: 120,
  temperature: 0.7,
  reasoningModel: 'claude-3-7-sonnet-20250219',
  noSystemPromptModels: ['o1-preview', 'gpt-4.5-preview'],
  sessionsDir: 'chatbot_sessions',
  promptsDir: 'chatbot_prompts',
  defaultPrompt: 'code_guru.json',
};

/**
 * Build the runtime config from a parsed config file and the environment.
 * A provider without a credential is left out of `availableModels`.
 */
export function buildConfig(file: ConfigFile = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const readKey = (provider: Provider): string => (env[API_KEY_ENV[provider]] ?? '').trim();
  const apiKeys: Record<Provider, string> = {
    [Provider.Anthropic]: readKey(Provider.Anthropic),
    [Provider.OpenRouter]: readKey(Provider.OpenRouter),
    [Provider.OpenAI]: readKey(Provider.OpenAI),
  };
  const availableModels: AppConfig['availableModels'] = {};
  for (const provider of PROVIDERS) {
    if (apiKeys[provider]) {
      availableModels[provider] = file.models?.[provider] ?? DEFAULT_MODELS[provider];
    }
  }

  return {
    apiKeys,
    availableModels,
    maxTokens: file.maxTokens ?? DEFAULTS.maxTokens,
    timeout: file.timeout ?? DEFAULTS.timeout,
    temperature: file.temperature ?? DEFAULTS.temperature,
    reasoningModel: file.reasoningModel ?? DEFAULTS.reasoningModel,
    noSystemPromptModels: file.noSystemPromptModels ?? DEFAULTS.noSystemPromptModels,
    sessionsDir: file.sessionsDir ?? DEFAULTS.sessionsDir,
    promptsDir: file.promptsDir ?? DEFAULTS.promptsDir,
    defaultPrompt: file.defaultPrompt ?? DEFAULTS.defaultPrompt,
  };
}

export async function readConfigFile(path: string): Promise<ConfigFile> {
  const raw = await readFile(path, 'utf-8');
  const parsed = ConfigFileSchema.safeParse(parse(raw) ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid config ${path}:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}

/** Project-local `roundtable.yaml` first, then `~/.roundtable/config.yaml`. */
export async function loadConfig(cwd: string = process.cwd()): Promise<AppConfig> {
  const localPath = join(cwd, LOCAL_CONFIG);
  const path = existsSync(localPath) ? localPath : CONFIG_PATH;
  if (!existsSync(path)) return buildConfig();
  return buildConfig(await readConfigFile(path));
}

export function availableProviders(config: AppConfig): Provider[] {
  return PROVIDERS.filter((p) => config.availableModels[p] !== undefined);
}

/** One warning per provider that will be unavailable. */
export function validateCredentials(config: AppConfig): string[] {
  return PROVIDERS.filter((p) => !config.apiKeys[p]).map(
    (p) => `${API_KEY_ENV[p]} not found. ${p} will be unavailable.`,
  );
}

export function parseProvider(value: string): Provider {
  const match = PROVIDERS.find((p) => p.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Unknown provider "${value}". Valid providers: ${PROVIDERS.join(', ')}`);
  }
  return match;
}

export { CONFIG_PATH };
