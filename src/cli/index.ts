#!/usr/bin/env node

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError } from '../errors.js';
import { CLIError } from './helpers.js';
import { registerAskCommand } from './ask.js';
import { registerChatCommand } from './chat.js';
import { registerProvidersCommand } from './providers.js';
import { registerSessionCommands } from './session.js';

const program = new Command();

const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
program
  .name('roundtable')
  .description('Chat with one model, or put the question to a round table of models')
  .version(version);

registerChatCommand(program);
registerAskCommand(program);
registerSessionCommands(program);
registerProvidersCommand(program);

// Ensure clean exit after any command (prevents event-loop hangs from dangling handles)
program.hook('postAction', () => {
  process.exit(0);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CLIError) {
    if (err.message) console.error(err.message);
    process.exit(err.exitCode);
  }
  if (err instanceof ConfigurationError) {
    console.error(chalk.red(err.message));
    process.exit(1);
  }
  throw err;
});
