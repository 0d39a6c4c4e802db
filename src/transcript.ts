import chalk from 'chalk';
import { ChatMode, type ChatSession, type RoundTableConfig } from './types.js';

export const TURN_DIVIDER = '\n\n---\n\n';

export type DisplayTurn = [user: string, assistant: string];

/**
 * Group a history into displayable (user, assistant) turns.
 * Standard sessions pair messages two by two. Round-table sessions fold every
 * assistant answer after a user message into one block, labelled by source.
 */
export function toDisplayTurns(session: ChatSession): DisplayTurn[] {
  const history = session.history;
  const turns: DisplayTurn[] = [];

  if (session.mode === ChatMode.Standard) {
    for (let i = 0; i < history.length; i += 2) {
      turns.push([history[i].content, history[i + 1]?.content ?? '']);
    }
    return turns;
  }

  let i = 0;
  while (i < history.length) {
    if (history[i].role !== 'user') {
      i++;
      continue;
    }
    const answers: string[] = [];
    let j = i + 1;
    while (j < history.length && history[j].role === 'assistant') {
      const m = history[j];
      answers.push(m.source ? `**${m.source}**: ${m.content}` : m.content);
      j++;
    }
    turns.push([history[i].content, answers.join(TURN_DIVIDER)]);
    i = j;
  }
  return turns;
}

export function renderTranscript(session: ChatSession): string {
  const lines: string[] = [];
  for (const [user, assistant] of toDisplayTurns(session)) {
    lines.push(chalk.bold.cyan('You: ') + user);
    lines.push('');
    lines.push(assistant ? assistant : chalk.dim('(no response)'));
    lines.push('');
  }
  return lines.join('\n');
}

export function formatRoster(config: RoundTableConfig): string[] {
  const lines = config.participants.map((p) => `${p.name} — ${p.provider}/${p.model}`);
  if (lines.length === 0) lines.push('No participants');
  lines.push(
    config.chairman
      ? `Chairman: ${config.chairman.model} (${config.chairman.provider})`
      : 'No chairman selected',
  );
  return lines;
}
