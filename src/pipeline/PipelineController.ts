/**
 * PipelineController
 *
 * Owns the diagnose -> research -> act -> fix -> execute -> verify ->
 * escalate loop for one issue. Every run starts a fresh EscalationState at
 * stage 1; the state is passed and returned explicitly and never shared
 * between issues. Escalation attempts run one after another, at most four
 * per issue.
 *
 * Nothing inside a run throws except cancellation: every component degrades
 * to a narrower result, so a run always ends in a PipelineOutcome.
 */

import { throwIfCancelled } from '../core/errors.js';
import { MAX_STAGE, type DiagnosisResult, type EscalationState, type ExecutionResult, type FixPlan } from '../core/types.js';
import type { DiagnosisAgent } from '../agents/DiagnosisAgent.js';
import { hasRuntimeError, type ExecutorAgent } from '../agents/ExecutorAgent.js';
import type { FixPlanner } from '../agents/FixPlanner.js';
import { applyDecision, decideEscalation, startIssue, type EscalationDecision } from './escalation.js';

export type PipelineStatus =
  | 'answered'
  | 'awaiting_confirmation'
  | 'declined'
  | 'resolved'
  | 'manual_retry'
  | 'escalation_required';

export interface AttemptRecord {
  stage: EscalationState['stage'];
  diagnosis: DiagnosisResult;
  plan: FixPlan;
  execution: ExecutionResult;
  decision: EscalationDecision;
}

export interface PipelineOutcome {
  status: PipelineStatus;
  state: EscalationState;
  /** Diagnosis and plan of the last cycle */
  diagnosis: DiagnosisResult;
  plan: FixPlan;
  attempts: AttemptRecord[];
  /** Commands that produced runtime errors, across every attempt */
  failedCommands: string[];
  message: string;
}

export interface RunOptions {
  /** Apply proposed fixes and escalate automatically */
  autoFix?: boolean;
  /** Asked before each fix is applied; false stops the run */
  confirm?: (plan: FixPlan, state: EscalationState) => boolean | Promise<boolean>;
  /** Progress notifications for interactive surfaces */
  onPhase?: (message: string) => void;
  signal?: AbortSignal;
}

export interface ManualAttempt {
  state: EscalationState;
  execution: ExecutionResult;
  failedCommands: string[];
}

export function failedCommandsOf(executions: readonly ExecutionResult[]): string[] {
  const failed = new Set<string>();
  for (const execution of executions) {
    for (const result of execution.commandResults) {
      if (result.allowed && hasRuntimeError(result)) {
        failed.add(result.command);
      }
    }
  }
  return [...failed];
}

function exhaustedMessage(execution: ExecutionResult): string {
  return `All ${MAX_STAGE} remediation stages were tried without success. Escalate to a technician. ${execution.verificationMessage}`;
}

export class PipelineController {
  private readonly diagnosis: DiagnosisAgent;
  private readonly planner: FixPlanner;
  private readonly executor: ExecutorAgent;

  constructor(diagnosis: DiagnosisAgent, planner: FixPlanner, executor: ExecutorAgent) {
    this.diagnosis = diagnosis;
    this.planner = planner;
    this.executor = executor;
  }

  startIssue(issueText: string): EscalationState {
    return startIssue(issueText);
  }

  /**
   * Diagnose and propose a fix at the state's stage
   */
  async cycle(state: EscalationState, signal?: AbortSignal): Promise<{ diagnosis: DiagnosisResult; plan: FixPlan }> {
    const diagnosis = await this.diagnosis.diagnose(state.issueText, state.stage, signal);
    throwIfCancelled(signal, 'fix planning');
    const plan = await this.planner.propose(state.issueText, diagnosis);
    return { diagnosis, plan };
  }

  async run(issueText: string, options: RunOptions = {}): Promise<PipelineOutcome> {
    const { autoFix = false, confirm, onPhase, signal } = options;
    let state = startIssue(issueText);
    const attempts: AttemptRecord[] = [];

    for (;;) {
      onPhase?.(`Diagnosing (stage ${state.stage})`);
      const { diagnosis, plan } = await this.cycle(state, signal);

      const finish = (status: PipelineStatus, message: string): PipelineOutcome => ({
        status,
        state: { ...state, retryInProgress: false },
        diagnosis,
        plan,
        attempts,
        failedCommands: failedCommandsOf(attempts.map(attempt => attempt.execution)),
        message
      });

      if (plan.commands.length === 0) {
        const previous = attempts[attempts.length - 1];
        if (!previous) {
          return finish('answered', plan.summary);
        }
        // An escalated stage with nothing left to run fails like the stage before it
        const skip = decideEscalation(state, previous.execution);
        console.log(`[Pipeline] Stage ${state.stage}: no fix commands -> ${skip.kind}`);
        if (skip.kind !== 'advance') {
          return finish('escalation_required', exhaustedMessage(previous.execution));
        }
        state = applyDecision(state, skip);
        continue;
      }
      if (!autoFix) {
        return finish('awaiting_confirmation', plan.summary);
      }
      if (confirm && !(await confirm(plan, state))) {
        return finish('declined', 'The proposed fix was not applied.');
      }

      throwIfCancelled(signal, 'execution');
      onPhase?.(`Applying fix (stage ${state.stage})`);
      state = { ...state, retryInProgress: true };
      const execution = await this.executor.apply(plan, signal);
      const decision = decideEscalation(state, execution);
      attempts.push({ stage: state.stage, diagnosis, plan, execution, decision });
      console.log(`[Pipeline] Stage ${state.stage}: success=${execution.success} verified=${execution.verified} -> ${decision.kind}`);

      switch (decision.kind) {
        case 'resolved':
          return finish('resolved', `Issue resolved at stage ${state.stage}. ${execution.verificationMessage}`);

        case 'manual_retry':
          return finish(
            'manual_retry',
            'Some fix commands reported errors although verification passed. Review the failed commands and retry manually.'
          );

        case 'exhausted':
          return finish('escalation_required', exhaustedMessage(execution));

        case 'advance':
          state = applyDecision(state, decision);
          console.log(`[Pipeline] Escalating to stage ${state.stage}`);
          break;
      }
    }
  }

  /**
   * User-initiated re-diagnosis at the current stage
   */
  async retry(state: EscalationState, signal?: AbortSignal): Promise<{ state: EscalationState; diagnosis: DiagnosisResult; plan: FixPlan }> {
    const next = { ...state, retryInProgress: true };
    const { diagnosis, plan } = await this.cycle(next, signal);
    return { state: { ...next, retryInProgress: false }, diagnosis, plan };
  }

  /**
   * User-initiated fix application. Manual attempts never move the stage.
   */
  async applyManually(state: EscalationState, plan: FixPlan, signal?: AbortSignal): Promise<ManualAttempt> {
    const execution = await this.executor.apply(plan, signal);
    return {
      state: { ...state, retryInProgress: false },
      execution,
      failedCommands: failedCommandsOf([execution])
    };
  }
}
