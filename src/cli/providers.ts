import type { Command } from 'commander';
import chalk from 'chalk';
import { API_KEY_ENV, CONFIG_PATH, loadConfig } from '../config.js';
import { PROVIDERS } from '../types.js';

export function registerProvidersCommand(program: Command): void {
  // --- roundtable providers ---
  program
    .command('providers')
    .description('List providers and the models configured for them')
    .action(async () => {
      const config = await loadConfig();
      for (const provider of PROVIDERS) {
        const models = config.availableModels[provider];
        if (!models) {
          console.log(`  ${chalk.red('✗')} ${chalk.bold(provider)} ${chalk.dim(`— set ${API_KEY_ENV[provider]}`)}`);
          continue;
        }
        console.log(`  ${chalk.green('✓')} ${chalk.bold(provider)}`);
        for (const m of models) {
          const tag = m === config.reasoningModel ? chalk.dim(' (extended thinking)') : '';
          console.log(`      ${m}${tag}`);
        }
      }
      console.log('');
      console.log(chalk.dim(`Model lists can be overridden in ${CONFIG_PATH}`));
    });
}
