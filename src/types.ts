/**
 * Core types for Round Table
 */

// --- Provider ---

export enum Provider {
  Anthropic = 'Anthropic',
  OpenRouter = 'OpenRouter',
  OpenAI = 'OpenAI',
}

export const PROVIDERS: readonly Provider[] = [Provider.Anthropic, Provider.OpenRouter, Provider.OpenAI];

export enum ChatMode {
  Standard = 'Standard Chat',
  RoundTable = 'Round Table',
}

export interface ModelRef {
  provider: Provider;
  model: string;
}

export interface ProviderAdapter {
  provider: Provider;
  complete(
    model: string,
    messages: readonly Message[],
    systemPrompt: string,
    temperature: number,
  ): Promise<string>;
}

// --- Conversation ---

export type Role = 'user' | 'assistant' | 'system';

export interface Message {
  readonly role: Role;
  readonly content: string;
  /** Participant name or `Chairman (<model>)` for round-table answers */
  readonly source?: string;
}

export interface Participant extends ModelRef {
  name: string;
}

export interface RoundTableConfig {
  readonly participants: readonly Participant[];
  readonly chairman: ModelRef | null;
}

export interface ChatSession {
  readonly system: string;
  readonly history: readonly Message[];
  readonly roundTable: RoundTableConfig;
  readonly mode: ChatMode;
}

/** Provider/model/temperature picked for a Standard-mode turn */
export interface Selection extends ModelRef {
  temperature: number;
}

// --- Events ---

export type EngineEvent =
  | 'info'
  | 'warn'
  | 'error'
  | 'status'
  | 'participant:done'
  | 'participant:failed'
  | 'chairman:start';

export type EventSink = (event: EngineEvent, data: { message: string; [key: string]: unknown }) => void;

// --- Config ---

export interface AppConfig {
  apiKeys: Record<Provider, string>;
  /** Selectable models per provider; providers without a credential are absent */
  availableModels: Partial<Record<Provider, string[]>>;
  maxTokens: number;
  /** Per-call timeout in seconds */
  timeout: number;
  temperature: number;
  reasoningModel: string;
  noSystemPromptModels: string[];
  sessionsDir: string;
  promptsDir: string;
  defaultPrompt: string;
}
