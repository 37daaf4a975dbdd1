/**
 * Escalation state machine
 *
 * Transitions are driven only by the ExecutionResult of an auto-fix attempt:
 *
 *   success                          -> resolved
 *   !success &&  verified            -> manual_retry (stage unchanged)
 *   !success && !verified, stage < 4 -> advance (stage + 1)
 *   !success && !verified, stage = 4 -> exhausted
 *
 * The stage never decreases within one issue; a new issue starts at 1.
 */

import {
  MAX_STAGE,
  MIN_STAGE,
  type EscalationStage,
  type EscalationState,
  type ExecutionResult
} from '../core/types.js';

export type EscalationDecision =
  | { kind: 'resolved' }
  | { kind: 'manual_retry' }
  | { kind: 'advance'; nextStage: EscalationStage }
  | { kind: 'exhausted' };

export function startIssue(issueText: string): EscalationState {
  return { stage: MIN_STAGE, issueText, retryInProgress: false };
}

export function nextStage(stage: EscalationStage): EscalationStage | undefined {
  switch (stage) {
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      return 4;
    case 4:
      return undefined;
  }
}

export function decideEscalation(state: EscalationState, result: ExecutionResult): EscalationDecision {
  if (result.success) {
    return { kind: 'resolved' };
  }
  if (result.verified) {
    return { kind: 'manual_retry' };
  }
  const next = nextStage(state.stage);
  if (next === undefined || state.stage >= MAX_STAGE) {
    return { kind: 'exhausted' };
  }
  return { kind: 'advance', nextStage: next };
}

/**
 * State after a decision. Only `advance` changes the stage.
 */
export function applyDecision(state: EscalationState, decision: EscalationDecision): EscalationState {
  if (decision.kind === 'advance') {
    return { ...state, stage: decision.nextStage, retryInProgress: true };
  }
  return { ...state, retryInProgress: false };
}
