/**
 * Session and prompt files. Sessions are stored as one JSON document each with
 * the fields `system`, `history`, `round_table` and `mode`.
 */

import { readFile, writeFile, mkdir, readdir, stat } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { PromptFileSchema, SessionFileSchema, type SessionFile } from './config-schema.js';
import { createMessage, createSession, emptyRoundTable, hasContent } from './chat-session.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { ChatMode, ChatSession, EventSink, ModelRef, Participant } from './types.js';

export interface SessionDocument {
  system: string;
  history: Array<{ role: string; content: string; source?: string }>;
  round_table: {
    models: Record<string, ModelRef>;
    /** Participant names in roster order; object keys that look like integers lose theirs */
    order: string[];
    chairman: ModelRef | null;
  };
  mode: ChatMode;
}

export function serializeSession(session: ChatSession): SessionDocument {
  const models: Record<string, ModelRef> = {};
  for (const p of session.roundTable.participants) {
    models[p.name] = { provider: p.provider, model: p.model };
  }
  return {
    system: session.system,
    history: session.history.map((m) =>
      m.source !== undefined
        ? { role: m.role, content: m.content, source: m.source }
        : { role: m.role, content: m.content },
    ),
    round_table: {
      models,
      order: session.roundTable.participants.map((p) => p.name),
      chairman: session.roundTable.chairman,
    },
    mode: session.mode,
  };
}

/**
 * Rebuild a session from parsed JSON. Files written before round tables existed
 * have no `mode` or `round_table`; they load as Standard with an empty roster.
 */
export function deserializeSession(data: unknown): ChatSession {
  const parsed = SessionFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid session file: ${issues.join('; ')}`);
  }
  return fromSessionFile(parsed.data);
}

function fromSessionFile(file: SessionFile): ChatSession {
  const rt = file.round_table;
  const participants: Participant[] = rt ? rosterInOrder(rt.models, rt.order ?? []) : [];
  const chairman = rt?.chairman ?? rt?.chairman_model ?? null;

  return createSession(file.system, {
    history: file.history.map((m) => createMessage(m.role, m.content, m.source ?? undefined)),
    roundTable: rt ? { participants, chairman } : emptyRoundTable(),
    mode: file.mode,
  });
}

/** Names listed in `order` come first, in that order; any others keep key order. */
function rosterInOrder(models: Record<string, ModelRef>, order: readonly string[]): Participant[] {
  const names = order.filter((name, i) => Object.hasOwn(models, name) && order.indexOf(name) === i);
  for (const name of Object.keys(models)) {
    if (!names.includes(name)) names.push(name);
  }
  return names.map((name) => ({ name, provider: models[name].provider, model: models[name].model }));
}

export class SessionStore {
  private dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  get path(): string {
    return this.dir;
  }

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  async save(session: ChatSession, filename: string): Promise<string> {
    if (!hasContent(session)) {
      return 'Nothing to save - session is empty';
    }
    const name = filename.endsWith('.json') ? filename : `${filename}.json`;
    await this.init();
    await writeFile(join(this.dir, name), JSON.stringify(serializeSession(session), null, 2), 'utf-8');
    return `Session saved to ${name}`;
  }

  async load(filename: string): Promise<{ session: ChatSession; message: string }> {
    const raw: unknown = JSON.parse(await readFile(join(this.dir, filename), 'utf-8'));
    if (!hasHistory(raw)) {
      return { session: createSession(), message: 'Session file is empty or invalid' };
    }
    return { session: deserializeSession(raw), message: `Session loaded from ${filename}` };
  }

  /** Session files, most recently modified first. */
  async list(): Promise<string[]> {
    return listJson(this.dir, true);
  }
}

function hasHistory(raw: unknown): boolean {
  if (typeof raw !== 'object' || raw === null || !('history' in raw)) return false;
  return Array.isArray(raw.history) && raw.history.length > 0;
}

export class PromptStore {
  private dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  get path(): string {
    return this.dir;
  }

  async load(filename: string): Promise<string> {
    const raw: unknown = JSON.parse(await readFile(join(this.dir, filename), 'utf-8'));
    const parsed = PromptFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Prompt file ${filename} must be a JSON object with a "prompt" string`);
    }
    return parsed.data.prompt;
  }

  /** The startup prompt, or null when the file is absent or unreadable. */
  async loadDefault(filename: string, onEvent?: EventSink): Promise<string | null> {
    if (!existsSync(join(this.dir, filename))) return null;
    try {
      return await this.load(filename);
    } catch (err) {
      onEvent?.('warn', { message: `Error loading default prompt ${filename}: ${errorMessage(err)}` });
      return null;
    }
  }

  async list(): Promise<string[]> {
    return listJson(this.dir, false);
  }
}

async function listJson(dir: string, newestFirst: boolean): Promise<string[]> {
  if (!existsSync(dir)) return [];
  const names = (await readdir(dir)).filter((f) => f.endsWith('.json'));
  if (!newestFirst) return names.sort();
  const withTimes = await Promise.all(
    names.map(async (name) => ({ name, mtime: (await stat(join(dir, name))).mtimeMs })),
  );
  return withTimes.sort((a, b) => b.mtime - a.mtime).map((f) => f.name);
}
