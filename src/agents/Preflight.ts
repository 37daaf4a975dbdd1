/**
 * Preflight checks
 *
 * Step-specific preconditions probed before a step reaches the
 * CommandFilter. A failed preflight skips the step without a policy
 * decision.
 */

import type { PlanStep } from '../core/types.js';
import type { CommandRunner } from '../execution/CommandRunner.js';

export interface PreflightOutcome {
  ok: boolean;
  /** Empty when ok */
  reason: string;
}

export interface PreflightChecker {
  check(step: PlanStep): Promise<PreflightOutcome>;
}

const PASS: PreflightOutcome = { ok: true, reason: '' };

/**
 * Command that lists the first present device of a PnP class
 */
export function deviceProbeCommand(deviceClass: string): string {
  const safeClass = deviceClass.replace(/[^\w]/g, '');
  return `Get-PnpDevice -Class ${safeClass} -PresentOnly -ErrorAction SilentlyContinue | Select-Object -First 1 -ExpandProperty InstanceId`;
}

/**
 * Checks the preflight kinds the playbooks use:
 * - every step: the command must not be empty
 * - `requires-parameter`: the step's extracted parameter must be non-empty
 * - `device-class`: at least one device of the class must enumerate
 *   (probed through the CommandRunner, so the probe is policy-checked and
 *   transcribed like any other command)
 */
export class DefaultPreflight implements PreflightChecker {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  async check(step: PlanStep): Promise<PreflightOutcome> {
    if (!step.command.trim()) {
      return { ok: false, reason: 'empty command' };
    }

    const preflight = step.preflight;
    if (!preflight) {
      return PASS;
    }

    switch (preflight.kind) {
      case 'requires-parameter':
        return step.parameter
          ? PASS
          : { ok: false, reason: preflight.reason ?? 'missing parameter' };

      case 'device-class': {
        const probe = await this.runner.run(deviceProbeCommand(preflight.deviceClass));
        const present = probe.allowed && probe.returnCode === 0 && probe.output !== '';
        return present
          ? PASS
          : { ok: false, reason: `no ${preflight.deviceClass} device is enumerable` };
      }
    }
  }
}
