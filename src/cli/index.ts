#!/usr/bin/env node
/**
 * Support Pilot CLI
 *
 * Operator surface for the support pipeline.
 */

import { Command } from 'commander';
import { buildIndexCommand } from './commands/build-index.js';
import { checkCommandCommand } from './commands/check-command.js';
import { diagnoseCommand } from './commands/diagnose.js';

const program = new Command();

program
  .name('support-pilot')
  .description('Support Pilot - diagnose, fix and verify desktop support issues')
  .version('0.1.0');

program.addCommand(diagnoseCommand);
program.addCommand(checkCommandCommand);
program.addCommand(buildIndexCommand);

program.parse();
