/**
 * Check Command
 *
 * Show the deny-list decision for a command without running it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig, loadEnvironment } from '../../core/config.js';
import { CommandFilter } from '../../policy/CommandFilter.js';

export const checkCommandCommand = new Command('check-command')
  .description('Check a shell command against the deny-list policy')
  .argument('<command...>', 'Command to check')
  .option('-p, --policy <path>', 'Deny-list policy file (defaults to DENYLIST_PATH)')
  .action((commandWords: string[], options: { policy?: string }) => {
    try {
      loadEnvironment();
      const filter = CommandFilter.fromFile(options.policy ?? getConfig().policyPath);
      const command = commandWords.join(' ');
      const decision = filter.isAllowed(command);

      if (decision.allowed) {
        console.log(chalk.green('ALLOWED ') + command);
        return;
      }
      console.log(chalk.red('BLOCKED ') + command);
      console.log(chalk.dim(`${decision.reason} Pattern: ${filter.matchingPattern(command) ?? 'unknown'}`));
      process.exitCode = 2;
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });
