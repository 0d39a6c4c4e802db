import type { Command } from 'commander';
import chalk from 'chalk';
import { input } from '@inquirer/prompts';
import { API_KEY_ENV, parseProvider } from '../config.js';
import { SessionController } from '../controller.js';
import { ConfigurationError } from '../errors.js';
import { formatRoster, renderTranscript } from '../transcript.js';
import { ChatMode, type AppConfig, type Provider, type Selection } from '../types.js';
import { CLIError, createLogger, createRuntime, printAnswers, resolveSelection } from './helpers.js';

interface ChatOptions {
  provider?: string;
  model?: string;
  temperature?: string;
  mode?: string;
  session?: string;
  prompt?: string;
  verbose?: boolean;
}

export interface ChatState {
  config: AppConfig;
  selection: Selection;
}

export interface CommandResult {
  lines: string[];
  exit?: boolean;
}

export const HELP_LINES = [
  '/mode [standard|round-table]    Switch chat mode (toggles without an argument)',
  '/model <provider> <model>       Model used in Standard mode',
  '/temperature <0-2>              Sampling temperature',
  '/add <name> <provider> <model>  Add a round table participant',
  '/remove <name...>               Remove round table participants',
  '/chairman <provider> <model>    Set the round table chairman',
  '/roster                         Show participants and chairman',
  '/reset-roster                   Remove all participants and the chairman',
  '/system <text>                  Replace the system prompt',
  '/prompt <file>                  Load the system prompt from a prompt file',
  '/save <file>                    Save the session',
  '/load <file>                    Load a saved session',
  '/clear                          Start a new conversation',
  '/history                        Print the conversation so far',
  '/help                           Show this list',
  '/exit                           Leave the chat',
];

export function parseMode(value: string): ChatMode | null {
  switch (value.trim().toLowerCase()) {
    case 'standard':
    case 'standard chat':
      return ChatMode.Standard;
    case 'round-table':
    case 'roundtable':
    case 'round table':
    case 'rt':
      return ChatMode.RoundTable;
    default:
      return null;
  }
}

function requireProvider(config: AppConfig, name: string): Provider {
  const provider = parseProvider(name);
  if (!config.availableModels[provider]) {
    throw new ConfigurationError(`${provider} is unavailable: set ${API_KEY_ENV[provider]}`);
  }
  return provider;
}

/**
 * Run one slash command against the controller. Returns the lines to print;
 * invalid arguments come back as a usage or error line, never as a throw.
 */
export async function handleCommand(
  controller: SessionController,
  state: ChatState,
  line: string,
): Promise<CommandResult> {
  const [command, ...args] = line.trim().split(/\s+/);
  const rest = line.trim().slice(command.length).trim();

  try {
    switch (command) {
      case '/mode': {
        let mode: ChatMode | null;
        if (args.length === 0) {
          mode = controller.session.mode === ChatMode.Standard ? ChatMode.RoundTable : ChatMode.Standard;
        } else {
          mode = parseMode(rest);
        }
        if (!mode) return { lines: ['Usage: /mode [standard|round-table]'] };
        return { lines: [controller.switchMode(mode)] };
      }

      case '/model': {
        if (args.length !== 2) return { lines: ['Usage: /model <provider> <model>'] };
        const provider = requireProvider(state.config, args[0]);
        state.selection = { ...state.selection, provider, model: args[1] };
        return { lines: [`Using ${args[1]} (${provider})`] };
      }

      case '/temperature': {
        const t = Number(args[0]);
        if (args.length !== 1 || !Number.isFinite(t) || t < 0 || t > 2) {
          return { lines: ['Usage: /temperature <0-2>'] };
        }
        state.selection = { ...state.selection, temperature: t };
        return { lines: [`Temperature set to ${t}`] };
      }

      case '/add': {
        if (args.length !== 3) return { lines: ['Usage: /add <name> <provider> <model>'] };
        const provider = requireProvider(state.config, args[1]);
        return { lines: [controller.addParticipant({ name: args[0], provider, model: args[2] }).message] };
      }

      case '/remove':
        if (args.length === 0) return { lines: ['Usage: /remove <name...>'] };
        return { lines: [controller.removeParticipants(args).message] };

      case '/chairman': {
        if (args.length !== 2) return { lines: ['Usage: /chairman <provider> <model>'] };
        const provider = requireProvider(state.config, args[0]);
        return { lines: [controller.setChairman({ provider, model: args[1] }).message] };
      }

      case '/roster':
        return { lines: formatRoster(controller.session.roundTable) };

      case '/reset-roster':
        return { lines: [controller.clearRoster().message] };

      case '/system':
        if (!rest) return { lines: [controller.session.system] };
        return { lines: [controller.setSystemPrompt(rest)] };

      case '/prompt':
        if (!rest) return { lines: ['Usage: /prompt <file>'] };
        return { lines: [(await controller.loadPrompt(rest)).message] };

      case '/save':
        return { lines: [(await controller.save(rest)).message] };

      case '/load':
        if (!rest) return { lines: ['Usage: /load <file>'] };
        return { lines: [(await controller.load(rest)).message] };

      case '/clear':
        return { lines: [controller.clear()] };

      case '/history': {
        const transcript = renderTranscript(controller.session);
        return { lines: [transcript || 'No messages yet'] };
      }

      case '/help':
        return { lines: HELP_LINES };

      case '/exit':
      case '/quit':
        return { lines: [], exit: true };

      default:
        return { lines: [`Unknown command ${command}. Type /help for a list.`] };
    }
  } catch (err) {
    if (err instanceof ConfigurationError) return { lines: [err.message] };
    throw err;
  }
}

function promptLabel(controller: SessionController, state: ChatState): string {
  if (controller.session.mode === ChatMode.RoundTable) {
    return chalk.magenta(`[round table: ${controller.session.roundTable.participants.length}]`);
  }
  return chalk.cyan(`[${state.selection.model}]`);
}

function isExitPrompt(err: unknown): boolean {
  return err instanceof Error && err.name === 'ExitPromptError';
}

async function chatLoop(controller: SessionController, state: ChatState): Promise<void> {
  for (;;) {
    let line: string;
    try {
      line = await input({ message: promptLabel(controller, state) });
    } catch (err) {
      if (isExitPrompt(err)) return;
      throw err;
    }

    if (line.trim().startsWith('/')) {
      const result = await handleCommand(controller, state, line);
      for (const l of result.lines) console.log(chalk.dim(l));
      if (result.exit) return;
      continue;
    }

    const result = await controller.submit(line, state.selection);
    if (result.status === 'completed') {
      printAnswers(result.messages);
    } else if (result.status === 'failed') {
      console.error(chalk.red(result.error));
    }
  }
}

export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Interactive chat with one model or a round table')
    .option('--provider <name>', 'Provider for standard mode (Anthropic, OpenRouter, OpenAI)')
    .option('-m, --model <id>', 'Model id for standard mode')
    .option('-t, --temperature <n>', 'Sampling temperature (0-2)')
    .option('--mode <mode>', 'standard or round-table')
    .option('--session <file>', 'Resume a saved session')
    .option('--prompt <file>', 'Load the system prompt from a prompt file')
    .option('-v, --verbose', 'Show retries and status changes')
    .action(async (opts: ChatOptions) => {
      if (!process.stdin.isTTY) {
        throw new CLIError(chalk.red('chat needs a terminal. Use: roundtable ask "your question"'));
      }
      const log = createLogger({ verbose: opts.verbose, progress: true });
      const runtime = await createRuntime(log);
      const controller = new SessionController(runtime.engine, {
        defaultSystem: runtime.defaultSystem,
        sessions: runtime.sessions,
        prompts: runtime.prompts,
        onEvent: log,
      });
      const state: ChatState = { config: runtime.config, selection: resolveSelection(runtime.config, opts) };

      if (opts.session) {
        const loaded = await controller.load(opts.session);
        console.log(loaded.ok ? chalk.dim(loaded.message) : chalk.red(loaded.message));
      }
      if (opts.prompt) {
        const loaded = await controller.loadPrompt(opts.prompt);
        console.log(loaded.ok ? chalk.dim(loaded.message) : chalk.red(loaded.message));
      }
      if (opts.mode) {
        const mode = parseMode(opts.mode);
        if (!mode) throw new CLIError(chalk.red(`Unknown mode "${opts.mode}". Use standard or round-table.`));
        console.log(chalk.dim(controller.switchMode(mode)));
      }

      console.log('');
      console.log(chalk.bold.cyan('Round table chat.') + chalk.dim(' Type /help for commands, /exit to leave.'));
      console.log('');
      await chatLoop(controller, state);
    });
}
