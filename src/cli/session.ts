import type { Command } from 'commander';
import chalk from 'chalk';
import { resolve as resolvePath } from 'node:path';
import { loadConfig } from '../config.js';
import { describeError } from '../errors.js';
import { PromptStore, SessionStore } from '../session.js';
import { formatRoster, renderTranscript } from '../transcript.js';
import { ChatMode } from '../types.js';
import { CLIError } from './helpers.js';

export function registerSessionCommands(program: Command): void {
  // --- roundtable sessions ---
  const sessionsCmd = program.command('sessions').description('Saved chat sessions');

  sessionsCmd
    .command('list')
    .description('List saved sessions, newest first')
    .action(async () => {
      const config = await loadConfig();
      const store = new SessionStore(resolvePath(config.sessionsDir));
      const files = await store.list();
      if (files.length === 0) {
        console.log(chalk.dim(`No sessions in ${store.path}`));
        return;
      }
      for (const f of files) console.log(`  ${f}`);
    });

  sessionsCmd
    .command('show <file>')
    .description('Print a saved session')
    .action(async (file: string) => {
      const config = await loadConfig();
      const store = new SessionStore(resolvePath(config.sessionsDir));
      const { session, message } = await store.load(file).catch((err: unknown) => {
        throw new CLIError(chalk.red(`Error loading session: ${describeError(err)}`));
      });
      console.log(chalk.dim(message));
      console.log(chalk.bold(`Mode: ${session.mode}`));
      if (session.mode === ChatMode.RoundTable) {
        for (const line of formatRoster(session.roundTable)) console.log(chalk.dim(`  ${line}`));
      }
      console.log(chalk.dim(`System: ${session.system}`));
      console.log('');
      console.log(renderTranscript(session));
    });

  // --- roundtable prompts ---
  const promptsCmd = program.command('prompts').description('System prompt files');

  promptsCmd
    .command('list')
    .description('List prompt files')
    .action(async () => {
      const config = await loadConfig();
      const store = new PromptStore(resolvePath(config.promptsDir));
      const files = await store.list();
      if (files.length === 0) {
        console.log(chalk.dim(`No prompts in ${store.path}`));
        return;
      }
      for (const f of files) {
        const marker = f === config.defaultPrompt ? chalk.green(' (default)') : '';
        console.log(`  ${f}${marker}`);
      }
    });
}
