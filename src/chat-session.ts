/**
 * Conversation model. Sessions and messages are immutable values; every
 * operation returns a new session so a turn can be applied in one step.
 */

import { ConfigurationError } from './errors.js';
import {
  ChatMode,
  type ChatSession,
  type Message,
  type ModelRef,
  type Participant,
  type Role,
  type RoundTableConfig,
} from './types.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant. Explain in depth.';

export function createMessage(role: Role, content: string, source?: string): Message {
  if (content.length === 0) {
    throw new ConfigurationError(`Cannot create an empty ${role} message`);
  }
  return Object.freeze(source !== undefined ? { role, content, source } : { role, content });
}

export function emptyRoundTable(): RoundTableConfig {
  return { participants: [], chairman: null };
}

export function createSession(system = DEFAULT_SYSTEM_PROMPT, init: Partial<ChatSession> = {}): ChatSession {
  return {
    system,
    history: init.history ?? [],
    roundTable: init.roundTable ?? emptyRoundTable(),
    mode: init.mode ?? ChatMode.Standard,
  };
}

export function appendMessages(session: ChatSession, messages: readonly Message[]): ChatSession {
  return { ...session, history: [...session.history, ...messages] };
}

export function hasContent(session: ChatSession): boolean {
  return session.history.length > 0;
}

// --- Round table roster ---

export function findParticipant(config: RoundTableConfig, name: string): Participant | undefined {
  return config.participants.find((p) => p.name === name);
}

export function addParticipant(config: RoundTableConfig, participant: Participant): RoundTableConfig {
  const name = participant.name.trim();
  if (!name) {
    throw new ConfigurationError('Please enter a name for the participant');
  }
  if (findParticipant(config, name)) {
    throw new ConfigurationError(`Participant '${name}' already exists`);
  }
  return {
    ...config,
    participants: [...config.participants, { name, provider: participant.provider, model: participant.model }],
  };
}

export function removeParticipants(
  config: RoundTableConfig,
  names: readonly string[],
): { config: RoundTableConfig; removed: string[] } {
  const removed = config.participants.filter((p) => names.includes(p.name)).map((p) => p.name);
  return {
    config: { ...config, participants: config.participants.filter((p) => !removed.includes(p.name)) },
    removed,
  };
}

export function setChairman(config: RoundTableConfig, chairman: ModelRef): RoundTableConfig {
  return { ...config, chairman: { provider: chairman.provider, model: chairman.model } };
}

export function clearRoster(): RoundTableConfig {
  return emptyRoundTable();
}

export function chairmanLabel(chairman: ModelRef): string {
  return `Chairman (${chairman.model})`;
}

/**
 * Shape check for a history. Conversations start with a user turn and never hold
 * two user turns in a row; Standard mode additionally never holds two assistant
 * turns in a row. Returns the index of the first offending message, or -1.
 */
export function findHistoryViolation(history: readonly Message[], mode: ChatMode): number {
  if (history.length === 0) return -1;
  if (history[0].role !== 'user') return 0;
  for (let i = 1; i < history.length; i++) {
    const prev = history[i - 1].role;
    const cur = history[i].role;
    if (cur === 'user' && prev === 'user') return i;
    if (mode === ChatMode.Standard && cur === 'assistant' && prev === 'assistant') return i;
  }
  return -1;
}

export function validateHistory(history: readonly Message[], mode: ChatMode): boolean {
  return findHistoryViolation(history, mode) === -1;
}
