import type { Command } from 'commander';
import chalk from 'chalk';
import { SessionController } from '../controller.js';
import { ChatMode } from '../types.js';
import {
  CLIError,
  collect,
  createLogger,
  createRuntime,
  parseModelRef,
  parseParticipant,
  printAnswers,
  readStdin,
  resolveSelection,
} from './helpers.js';

interface AskOptions {
  provider?: string;
  model?: string;
  temperature?: string;
  participant: string[];
  chairman?: string;
  system?: string;
  prompt?: string;
  session?: string;
  save?: string;
  json?: boolean;
  verbose?: boolean;
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Ask one question, to a single model or to the round table')
    .argument('[question]', 'Question to ask (or pipe via stdin)')
    .option('--provider <name>', 'Provider for standard mode (Anthropic, OpenRouter, OpenAI)')
    .option('-m, --model <id>', 'Model id for standard mode')
    .option('-t, --temperature <n>', 'Sampling temperature (0-2)')
    .option('--participant <spec>', 'Round table participant name=Provider:model (repeatable)', collect, [])
    .option('--chairman <spec>', 'Round table chairman Provider:model')
    .option('--system <text>', 'System prompt')
    .option('--prompt <file>', 'Load the system prompt from a prompt file')
    .option('--session <file>', 'Continue a saved session')
    .option('--save <file>', 'Save the session after answering')
    .option('--json', 'Print the answers as JSON')
    .option('-v, --verbose', 'Show progress and retries')
    .action(async (question: string | undefined, opts: AskOptions) => {
      if (!question) {
        if (process.stdin.isTTY) {
          throw new CLIError(
            chalk.red('No question provided. Usage: roundtable ask "your question"') +
              '\n' +
              chalk.dim('Or pipe: echo "question" | roundtable ask'),
          );
        }
        question = await readStdin();
      }
      if (!question.trim()) {
        throw new CLIError(chalk.red('Empty input.'));
      }

      const log = createLogger({ verbose: opts.verbose, progress: !opts.json });
      const runtime = await createRuntime(log);
      const controller = new SessionController(runtime.engine, {
        defaultSystem: runtime.defaultSystem,
        sessions: runtime.sessions,
        prompts: runtime.prompts,
        onEvent: log,
      });

      if (opts.session) {
        const loaded = await controller.load(opts.session);
        if (!loaded.ok) throw new CLIError(chalk.red(loaded.message));
      }
      if (opts.prompt) {
        const loaded = await controller.loadPrompt(opts.prompt);
        if (!loaded.ok) throw new CLIError(chalk.red(loaded.message));
      }
      if (opts.system) controller.setSystemPrompt(opts.system);

      if (opts.participant.length > 0 || opts.chairman) {
        controller.switchMode(ChatMode.RoundTable);
        for (const spec of opts.participant) {
          const added = controller.addParticipant(parseParticipant(spec));
          if (!added.ok) throw new CLIError(chalk.red(added.message));
        }
        if (opts.chairman) controller.setChairman(parseModelRef(opts.chairman));
      }

      const selection = resolveSelection(runtime.config, opts);
      const result = await controller.submit(question, selection);

      if (result.status === 'failed') {
        throw new CLIError(chalk.red(result.error));
      }
      if (result.status === 'completed') {
        if (opts.json) {
          console.log(JSON.stringify(result.messages, null, 2));
        } else {
          printAnswers(result.messages);
        }
      }

      if (opts.save) {
        const saved = await controller.save(opts.save);
        console.error(saved.ok ? chalk.dim(saved.message) : chalk.yellow(saved.message));
      }
    });
}
