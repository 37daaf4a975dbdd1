/**
 * Support Pipeline
 */

export { PipelineController, failedCommandsOf } from './PipelineController.js';
export type { PipelineOutcome, PipelineStatus, RunOptions, AttemptRecord, ManualAttempt } from './PipelineController.js';
export { startIssue, nextStage, decideEscalation, applyDecision } from './escalation.js';
export type { EscalationDecision } from './escalation.js';
export { createPipeline, assemblePipeline } from './createPipeline.js';
export type { PipelineComponents, PipelineOverrides } from './createPipeline.js';
