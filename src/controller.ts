import {
  addParticipant,
  appendMessages,
  clearRoster,
  createMessage,
  createSession,
  DEFAULT_SYSTEM_PROMPT,
  findHistoryViolation,
  hasContent,
  removeParticipants,
  setChairman,
} from './chat-session.js';
import type { CompletionEngine } from './completion.js';
import { ConfigurationError, describeError, errorMessage } from './errors.js';
import { RoundTable } from './round-table.js';
import type { PromptStore, SessionStore } from './session.js';
import {
  ChatMode,
  type ChatSession,
  type EventSink,
  type Message,
  type ModelRef,
  type Participant,
  type Selection,
} from './types.js';

/** Histories longer than this are autosaved after each successful turn. */
export const AUTOSAVE_THRESHOLD = 4;

export type TurnPhase = 'awaiting-input' | 'processing' | 'settled';

export interface Outcome {
  ok: boolean;
  message: string;
}

export type TurnResult =
  | { status: 'ignored' }
  | { status: 'completed'; messages: Message[] }
  | { status: 'failed'; error: string };

export interface SessionControllerOptions {
  defaultSystem?: string;
  session?: ChatSession;
  sessions?: SessionStore;
  prompts?: PromptStore;
  onEvent?: EventSink;
  /** Clock used for autosave file names */
  now?: () => Date;
}

export function autosaveFilename(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `autosave_${day}_${time}.json`;
}

/**
 * Owns one conversation. Decides per turn whether a single model or the round
 * table answers, and applies each turn's messages in one update.
 *
 * Callers serialize turns: one `submit` at a time per controller.
 */
export class SessionController {
  private current: ChatSession;
  private defaultSystem: string;
  private engine: CompletionEngine;
  private roundTable: RoundTable;
  private sessions?: SessionStore;
  private prompts?: PromptStore;
  private emit: EventSink;
  private now: () => Date;
  private turnPhase: TurnPhase = 'awaiting-input';
  private statusText = 'Ready';

  constructor(engine: CompletionEngine, options: SessionControllerOptions = {}) {
    this.engine = engine;
    this.defaultSystem = options.defaultSystem ?? DEFAULT_SYSTEM_PROMPT;
    this.current = options.session ?? createSession(this.defaultSystem);
    this.sessions = options.sessions;
    this.prompts = options.prompts;
    this.emit = options.onEvent ?? (() => {});
    this.now = options.now ?? (() => new Date());
    this.roundTable = new RoundTable(engine, {
      onEvent: (event, data) => {
        if (event === 'participant:done' || event === 'chairman:start') {
          this.setStatus('processing', data.message);
        }
        this.emit(event, data);
      },
    });
  }

  get session(): ChatSession {
    return this.current;
  }

  get phase(): TurnPhase {
    return this.turnPhase;
  }

  get status(): string {
    return this.statusText;
  }

  // --- Turns ---

  async submit(text: string, selection: Selection): Promise<TurnResult> {
    if (!text.trim()) return { status: 'ignored' };

    const user = createMessage('user', text);
    this.current = appendMessages(this.current, [user]);
    const session = this.current;

    try {
      let produced: Message[];
      if (session.mode === ChatMode.Standard) {
        this.setStatus('processing', 'Processing your request...');
        const content = await this.engine.getCompletion(
          selection.provider,
          selection.model,
          session.history,
          session.system,
          selection.temperature,
        );
        produced = [createMessage('assistant', content)];
      } else {
        this.setStatus('processing', 'Collecting opinions from round table participants...');
        const outcome = await this.roundTable.run(
          session.roundTable,
          session.history,
          session.system,
          selection.temperature,
        );
        produced = [
          ...outcome.responses.map((r) => createMessage('assistant', r.content, r.name)),
          createMessage('assistant', outcome.chairman.content, outcome.chairman.label),
        ];
      }

      this.current = appendMessages(this.current, produced);
      this.setStatus(
        'settled',
        session.mode === ChatMode.Standard ? 'Ready' : 'Round table discussion complete',
      );
      if (this.current.history.length > AUTOSAVE_THRESHOLD) {
        await this.autosave();
      }
      return { status: 'completed', messages: produced };
    } catch (err) {
      const error = describeError(err);
      // Roster and credential problems are for the user to fix, not faults to log
      if (!(err instanceof ConfigurationError)) {
        this.emit('error', { message: `Error processing message: ${error}` });
      }
      this.setStatus('settled', error);
      return { status: 'failed', error };
    }
  }

  /** Best effort: a failed autosave is logged and never fails the turn. */
  private async autosave(): Promise<void> {
    if (!this.sessions) return;
    const filename = autosaveFilename(this.now());
    try {
      await this.sessions.save(this.current, filename);
      this.emit('info', { message: `Session auto-saved to ${filename}`, filename });
    } catch (err) {
      this.emit('warn', { message: `Failed to auto-save session: ${errorMessage(err)}` });
    }
  }

  // --- Mode and history ---

  /**
   * Switching with history present starts a fresh conversation so Standard and
   * round-table shaped histories never mix. System prompt and roster carry over.
   */
  switchMode(mode: ChatMode): string {
    let cleared = '';
    if (mode !== this.current.mode && hasContent(this.current)) {
      this.current = createSession(this.current.system, { roundTable: this.current.roundTable, mode });
      cleared = ` Chat history cleared when switching to ${mode} mode.`;
    } else {
      this.current = { ...this.current, mode };
    }

    let message: string;
    if (mode === ChatMode.RoundTable) {
      const count = this.current.roundTable.participants.length;
      if (count === 0) {
        message = 'Switched to Round Table mode. Please add participants.';
      } else if (!this.current.roundTable.chairman) {
        message = `Switched to Round Table mode with ${count} participants. Please set a chairman.`;
      } else {
        message = `Switched to Round Table mode with ${count} participants and chairman.`;
      }
    } else {
      message = 'Switched to Standard Chat mode.';
    }
    return this.setStatus('awaiting-input', message + cleared);
  }

  clear(): string {
    this.current = createSession(this.defaultSystem, {
      roundTable: this.current.roundTable,
      mode: this.current.mode,
    });
    return this.setStatus('awaiting-input', 'Chat session cleared');
  }

  setSystemPrompt(system: string): string {
    this.current = { ...this.current, system };
    return 'System prompt updated';
  }

  // --- Roster ---

  /** Duplicate or empty names are refused and leave the roster untouched. */
  addParticipant(participant: Participant): Outcome {
    try {
      this.current = {
        ...this.current,
        roundTable: addParticipant(this.current.roundTable, participant),
      };
    } catch (err) {
      if (err instanceof ConfigurationError) return { ok: false, message: err.message };
      throw err;
    }
    return { ok: true, message: `Added ${participant.name.trim()} (${participant.model}) to round table participants` };
  }

  removeParticipants(names: readonly string[]): Outcome {
    const { config, removed } = removeParticipants(this.current.roundTable, names);
    this.current = { ...this.current, roundTable: config };
    return removed.length > 0
      ? { ok: true, message: `Removed participant(s): ${removed.join(', ')}` }
      : { ok: false, message: 'No participants removed' };
  }

  setChairman(chairman: ModelRef): Outcome {
    this.current = { ...this.current, roundTable: setChairman(this.current.roundTable, chairman) };
    return { ok: true, message: `Set chairman to ${chairman.model} (${chairman.provider})` };
  }

  clearRoster(): Outcome {
    this.current = { ...this.current, roundTable: clearRoster() };
    return { ok: true, message: 'Round table participants and chairman cleared' };
  }

  // --- Files ---

  async loadPrompt(filename: string): Promise<Outcome> {
    if (!this.prompts) return { ok: false, message: 'No prompt directory configured' };
    if (!filename) return { ok: false, message: 'No prompt file selected' };
    try {
      const prompt = await this.prompts.load(filename);
      this.current = { ...this.current, system: prompt };
      return { ok: true, message: `Successfully loaded prompt from ${filename}` };
    } catch (err) {
      return { ok: false, message: `Error loading prompt: ${describeError(err)}` };
    }
  }

  async save(filename: string): Promise<Outcome> {
    if (!this.sessions) return { ok: false, message: 'No session directory configured' };
    if (!filename.trim()) return { ok: false, message: 'Please enter a filename' };
    try {
      return { ok: true, message: await this.sessions.save(this.current, filename.trim()) };
    } catch (err) {
      return { ok: false, message: `Error saving session: ${describeError(err)}` };
    }
  }

  /** Replaces the owned session. A file that fails to load leaves a fresh one. */
  async load(filename: string): Promise<Outcome> {
    if (!this.sessions) return { ok: false, message: 'No session directory configured' };
    if (!filename) return { ok: false, message: 'No session file selected' };
    try {
      const { session, message } = await this.sessions.load(filename);
      this.current = session;
      const violation = findHistoryViolation(session.history, session.mode);
      if (violation !== -1) {
        this.emit('warn', { message: `${filename}: history is out of order at message ${violation + 1}` });
      }
      return { ok: true, message: this.setStatus('awaiting-input', message) };
    } catch (err) {
      this.current = createSession(this.defaultSystem);
      return { ok: false, message: this.setStatus('awaiting-input', `Error loading session: ${describeError(err)}`) };
    }
  }

  private setStatus(phase: TurnPhase, message: string): string {
    this.turnPhase = phase;
    this.statusText = message;
    this.emit('status', { message, phase });
    return message;
  }
}
