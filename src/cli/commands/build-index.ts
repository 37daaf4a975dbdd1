/**
 * Build Index Command
 *
 * Index the ticket corpus and write the cache used when
 * KNOWLEDGE_REQUIRE_CACHE=1.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfig, loadEnvironment } from '../../core/config.js';
import { CsvKnowledgeBase } from '../../knowledge/CsvKnowledgeBase.js';

export const buildIndexCommand = new Command('build-index')
  .description('Build the knowledge-base index cache')
  .option('--csv <path>', 'Ticket corpus (defaults to KNOWLEDGE_CSV_PATH)')
  .option('--cache <path>', 'Cache file (defaults to KNOWLEDGE_CACHE_PATH)')
  .action((options: { csv?: string; cache?: string }) => {
    const spinner = ora('Indexing tickets...').start();
    try {
      loadEnvironment();
      const { knowledge } = getConfig();
      const csvPath = options.csv ?? knowledge.csvPath;
      const cachePath = options.cache ?? (options.csv ? `${options.csv}.index.json` : knowledge.cachePath);

      const base = new CsvKnowledgeBase({ csvPath, cachePath, requireCache: true });
      const count = base.build();
      if (count === 0) {
        spinner.fail(chalk.red(`No tickets indexed. Check ${csvPath}`));
        process.exit(1);
      }
      spinner.succeed(`Indexed ${count} tickets`);
      console.log(chalk.dim(`Cache written to ${cachePath}`));
    } catch (error) {
      spinner.fail(chalk.red('Failed to build index'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
