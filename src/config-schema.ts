import { z } from 'zod';
import { DEFAULT_SYSTEM_PROMPT } from './chat-session.js';
import { ChatMode, Provider } from './types.js';

const ProviderSchema = z.nativeEnum(Provider);

const ModelListsSchema = z
  .object({
    [Provider.Anthropic]: z.array(z.string().min(1)).min(1),
    [Provider.OpenRouter]: z.array(z.string().min(1)).min(1),
    [Provider.OpenAI]: z.array(z.string().min(1)).min(1),
  })
  .partial();

export const ConfigFileSchema = z
  .object({
    maxTokens: z.number().int().positive().optional(),
    timeout: z.number().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    reasoningModel: z.string().optional(),
    noSystemPromptModels: z.array(z.string()).optional(),
    sessionsDir: z.string().optional(),
    promptsDir: z.string().optional(),
    defaultPrompt: z.string().optional(),
    models: ModelListsSchema.optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// --- Persisted session ---

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string().min(1),
  source: z.string().nullish(),
});

/** Older files stored model refs as `[provider, model]` tuples */
const ModelRefSchema = z.union([
  z.object({ provider: ProviderSchema, model: z.string() }),
  z.tuple([ProviderSchema, z.string()]).transform(([provider, model]) => ({ provider, model })),
]);

const RoundTableSchema = z
  .object({
    models: z.record(z.string(), ModelRefSchema).default({}),
    order: z.array(z.string()).optional(),
    chairman: ModelRefSchema.nullish(),
    chairman_model: ModelRefSchema.nullish(),
  })
  .passthrough();

export const SessionFileSchema = z
  .object({
    system: z.string().default(DEFAULT_SYSTEM_PROMPT),
    history: z.array(MessageSchema).default([]),
    round_table: RoundTableSchema.optional(),
    mode: z.nativeEnum(ChatMode).default(ChatMode.Standard),
  })
  .passthrough();

export type SessionFile = z.infer<typeof SessionFileSchema>;

export const PromptFileSchema = z.object({ prompt: z.string() }).passthrough();
