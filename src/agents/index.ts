/**
 * Support Agents
 */

export { Classifier, extractInstallTarget, sanitizeParameter, normalizeIssueText, CHITCHAT_SUMMARY } from './Classifier.js';
export { EvidenceAggregator, keywordsFor, selectSop, webQueryFor, SOP_SCORE_THRESHOLD } from './EvidenceAggregator.js';
export type { EvidenceAggregatorOptions } from './EvidenceAggregator.js';
export { ActionRunner } from './ActionRunner.js';
export type { PlanExecution } from './ActionRunner.js';
export { DefaultPreflight, deviceProbeCommand } from './Preflight.js';
export type { PreflightChecker, PreflightOutcome } from './Preflight.js';
export { Summarizer, transcriptText, evidenceHints } from './Summarizer.js';
export {
  FixPlanner,
  resolveTargets,
  selectNetworkAdapter,
  selectBluetoothRadio,
  CONFIRMATION_PROMPT,
  NOT_IN_DIAGNOSTICS,
  NO_DIRECT_ANSWER
} from './FixPlanner.js';
export type { RemediationTargets } from './FixPlanner.js';
export { Gatekeeper, BLOCKED_TERMS, PROMOTIONAL_REFUSAL } from './Gatekeeper.js';
export { ExecutorAgent, hasRuntimeError } from './ExecutorAgent.js';
export type { Verification } from './ExecutorAgent.js';
export { DiagnosisAgent } from './DiagnosisAgent.js';
export type { PreparedDiagnosis } from './DiagnosisAgent.js';
export * from './AnswerExtractors.js';
