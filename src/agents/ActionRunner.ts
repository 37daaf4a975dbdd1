/**
 * ActionRunner (Action agent)
 *
 * Walks a diagnostic plan strictly in order. Each step is preflighted,
 * then policy-checked, then run only when allowed. Every step leaves one
 * numbered audit line and one CommandResult, in plan order, whatever
 * happened to it:
 *
 *   1. Check drive usage [ALLOWED]
 *   2. Format the disk [BLOCKED (Command blocked by denylist.)]
 *   3. List Bluetooth devices [SKIPPED (no Bluetooth device is enumerable)]
 */

import { throwIfCancelled } from '../core/errors.js';
import type { CommandResult, PlanStep } from '../core/types.js';
import type { CommandRunner } from '../execution/CommandRunner.js';
import { DefaultPreflight, type PreflightChecker } from './Preflight.js';

export interface PlanExecution {
  /** Audit trail, parallel to commandResults */
  validatedSteps: string[];
  commandResults: CommandResult[];
}

export class ActionRunner {
  private readonly runner: CommandRunner;
  private readonly preflight: PreflightChecker;

  constructor(runner: CommandRunner, preflight: PreflightChecker = new DefaultPreflight(runner)) {
    this.runner = runner;
    this.preflight = preflight;
  }

  /**
   * Cancellation is honoured between steps, never inside one
   */
  async executePlan(steps: readonly PlanStep[], signal?: AbortSignal): Promise<PlanExecution> {
    const validatedSteps: string[] = [];
    const commandResults: CommandResult[] = [];

    for (const step of steps) {
      throwIfCancelled(signal, 'diagnostics');
      const number = validatedSteps.length + 1;

      const preflight = await this.preflight.check(step);
      if (!preflight.ok) {
        validatedSteps.push(`${number}. ${step.description} [SKIPPED (${preflight.reason})]`);
        const skipped: CommandResult = {
          command: step.command,
          allowed: false,
          output: '',
          error: `Skipped: ${preflight.reason}`,
          returnCode: null
        };
        this.runner.recordAttempt(skipped);
        commandResults.push(skipped);
        continue;
      }

      const decision = this.runner.filter.isAllowed(step.command);
      if (!decision.allowed) {
        validatedSteps.push(`${number}. ${step.description} [BLOCKED (${decision.reason})]`);
        const blocked: CommandResult = {
          command: step.command,
          allowed: false,
          output: '',
          error: decision.reason,
          returnCode: null
        };
        this.runner.recordAttempt(blocked);
        commandResults.push(blocked);
        continue;
      }

      validatedSteps.push(`${number}. ${step.description} [ALLOWED]`);
      commandResults.push(await this.runner.run(step.command));
    }

    return { validatedSteps, commandResults };
  }
}
