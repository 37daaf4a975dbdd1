/**
 * Diagnose Command
 *
 * Run the support pipeline for one issue.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfig, loadEnvironment } from '../../core/config.js';
import { PipelineCancelledError } from '../../core/errors.js';
import type { DiagnosisResult, FixPlan } from '../../core/types.js';
import { createPipeline } from '../../pipeline/createPipeline.js';
import type { PipelineOutcome } from '../../pipeline/PipelineController.js';
import { askYesNo } from '../prompt.js';

interface DiagnoseOptions {
  autoFix: boolean;
  yes: boolean;
  json: boolean;
}

function printDiagnosis(diagnosis: DiagnosisResult): void {
  console.log();
  console.log(chalk.cyan(`Issue type: ${diagnosis.issueType}`) + chalk.dim(` (stage ${diagnosis.fixStage})`));
  if (diagnosis.planSummary) {
    console.log(chalk.dim(diagnosis.planSummary));
  }
  if (diagnosis.actionPlan.length > 0) {
    console.log();
    console.log(chalk.cyan('Diagnostic steps'));
    for (const line of diagnosis.actionPlan) {
      const color = line.endsWith('[ALLOWED]') ? chalk.white : chalk.yellow;
      console.log('  ' + color(line));
    }
  }
  if (diagnosis.evidence.webError) {
    console.log(chalk.dim(`Web search: ${diagnosis.evidence.webError}`));
  }
  console.log();
  console.log(chalk.cyan('Findings'));
  console.log(diagnosis.findings);
}

function printPlan(plan: FixPlan): void {
  console.log();
  console.log(chalk.cyan(plan.commands.length > 0 ? `Proposed fix (stage ${plan.stage})` : 'Answer'));
  console.log(plan.summary);
  for (const command of plan.commands) {
    console.log(chalk.dim('  > ') + command);
  }
}

function printOutcome(outcome: PipelineOutcome): void {
  for (const attempt of outcome.attempts) {
    const mark = attempt.execution.success ? chalk.green('✓') : chalk.red('✗');
    console.log(`${mark} Stage ${attempt.stage}: ${attempt.execution.verificationMessage}`);
  }
  const color = outcome.status === 'resolved' || outcome.status === 'answered' ? chalk.green : chalk.yellow;
  console.log();
  console.log(color(`[${outcome.status}] `) + outcome.message);
  if (outcome.failedCommands.length > 0) {
    console.log(chalk.red('Commands that reported errors:'));
    for (const command of outcome.failedCommands) {
      console.log(chalk.red('  - ') + command);
    }
  }
}

export const diagnoseCommand = new Command('diagnose')
  .description('Diagnose an issue, propose a fix and optionally apply it')
  .argument('<issue...>', 'Free-text problem description')
  .option('--auto-fix', 'Apply fixes and escalate automatically on verified failure', false)
  .option('-y, --yes', 'Do not ask before applying each fix', false)
  .option('--json', 'Print the outcome as JSON', false)
  .action(async (issueWords: string[], options: DiagnoseOptions) => {
    const issueText = issueWords.join(' ').trim();
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const spinner = ora('Loading configuration...').start();
    try {
      loadEnvironment();
      const pipeline = createPipeline(getConfig());

      const outcome = await pipeline.controller.run(issueText, {
        autoFix: options.autoFix,
        signal: controller.signal,
        onPhase: message => {
          spinner.start(`${message}...`);
        },
        confirm: async plan => {
          spinner.stop();
          if (options.yes) {
            return true;
          }
          printPlan(plan);
          return askYesNo('Apply this fix?');
        }
      });
      spinner.stop();

      if (options.json) {
        console.log(JSON.stringify(outcome, null, 2));
        return;
      }

      printDiagnosis(outcome.diagnosis);
      printPlan(outcome.plan);
      printOutcome(outcome);
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        spinner.warn(chalk.yellow(error.message));
        process.exitCode = 130;
        return;
      }
      spinner.fail(chalk.red('Diagnosis failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
