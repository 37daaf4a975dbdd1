/**
 * ExecutorAgent (Verifier)
 *
 * Applies a FixPlan command by command through the CommandRunner, with no
 * early abort: a failed command is reported and the next one still runs.
 * Afterwards the category's verification probes run; a category without
 * probes verifies trivially.
 *
 * success = no command reported an error or a non-zero exit, AND every
 * probe read healthy.
 */

import { throwIfCancelled } from '../core/errors.js';
import type { CommandResult, ExecutionResult, FixPlan, IssueType } from '../core/types.js';
import type { CommandRunner } from '../execution/CommandRunner.js';
import type { PlaybookCatalog } from '../playbooks/PlaybookCatalog.js';

export interface Verification {
  verified: boolean;
  message: string;
}

/**
 * A result counts as a runtime failure when it carries error text or a
 * non-null, non-zero exit code
 */
export function hasRuntimeError(result: CommandResult): boolean {
  return result.error !== '' || (result.returnCode !== null && result.returnCode !== 0);
}

export class ExecutorAgent {
  private readonly runner: CommandRunner;
  private readonly catalog: PlaybookCatalog;

  constructor(runner: CommandRunner, catalog: PlaybookCatalog) {
    this.runner = runner;
    this.catalog = catalog;
  }

  async apply(plan: FixPlan, signal?: AbortSignal): Promise<ExecutionResult> {
    const commandResults: CommandResult[] = [];
    for (const command of plan.commands) {
      throwIfCancelled(signal, 'execution');
      commandResults.push(await this.runner.run(command));
    }

    const hadErrors = commandResults.some(hasRuntimeError);
    if (hadErrors) {
      console.log(`[Executor] ${commandResults.filter(hasRuntimeError).length} command(s) reported errors`);
    }

    throwIfCancelled(signal, 'verification');
    const { verified, message } = await this.verify(plan.issueType);

    return {
      success: !hadErrors && verified,
      commandResults,
      verified,
      verificationMessage: message
    };
  }

  /**
   * Run the category's post-fix probes; every probe must read healthy
   */
  async verify(issueType: IssueType): Promise<Verification> {
    const probes = this.catalog.verificationFor(issueType);
    if (probes.length === 0) {
      return { verified: true, message: 'Verification skipped; please confirm the issue is resolved.' };
    }

    const failed: string[] = [];
    for (const probe of probes) {
      const result = await this.runner.run(probe.command);
      const healthy = result.allowed && probe.expect.test(result.output);
      console.log(`[Executor] VERIFY ${probe.description}: ${healthy ? 'ok' : 'failed'}`);
      if (!healthy) {
        failed.push(`${probe.description} (${result.output || result.error || 'no output'})`);
      }
    }

    if (failed.length > 0) {
      return { verified: false, message: `Verification failed: ${failed.join('; ')}` };
    }
    return { verified: true, message: `Verified: ${probes.map(probe => probe.description).join(', ')}.` };
  }
}
