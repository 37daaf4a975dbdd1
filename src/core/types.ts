/**
 * Core Types
 *
 * Data model shared by every stage of the support pipeline:
 * plans, command results, evidence, diagnosis, fix plans and escalation state.
 */

/**
 * Closed taxonomy of issue categories
 */
export const ISSUE_TYPES = [
  'system_info',
  'install_app',
  'network',
  'bluetooth',
  'disk_space',
  'performance',
  'account',
  'app_error',
  'general',
  'chitchat'
] as const;

export type IssueType = typeof ISSUE_TYPES[number];

export function isIssueType(value: string): value is IssueType {
  const known: readonly string[] = ISSUE_TYPES;
  return known.includes(value);
}

/**
 * Escalation stage. Higher stages select more invasive remediation.
 */
export type EscalationStage = 1 | 2 | 3 | 4;

export const MIN_STAGE: EscalationStage = 1;
export const MAX_STAGE: EscalationStage = 4;

/**
 * Precondition probe attached to a plan step
 */
export type PreflightSpec =
  | { kind: 'requires-parameter'; reason?: string }
  | { kind: 'device-class'; deviceClass: string };

export interface PlanStep {
  description: string;
  command: string;
  preflight?: PreflightSpec;
  /** Extracted parameter the command was rendered with */
  parameter?: string;
}

export interface CommandResult {
  command: string;
  /** false means the command was never run */
  allowed: boolean;
  output: string;
  error: string;
  returnCode: number | null;
}

export interface KnowledgeMatch {
  score: number;
  id: string;
  issueText: string;
  responseText: string;
  category: string;
  status: string;
  resolutionTime: string;
}

export interface WebHit {
  title: string;
  snippet: string;
  url: string;
}

export interface Evidence {
  knowledge: KnowledgeMatch[];
  web: WebHit[];
  webQuery: string;
  webError: string;
  webCount: number;
}

export interface Classification {
  issueType: IssueType;
  /** e.g. target application name for install requests */
  extractedParam: string;
  source: 'generation' | 'rules' | 'default';
}

export interface DiagnosticPlan {
  issueType: IssueType;
  extractedParam: string;
  steps: PlanStep[];
  summary: string;
  isChat: boolean;
}

export interface DiagnosisResult {
  readonly issueText: string;
  readonly issueType: IssueType;
  readonly extractedParam: string;
  readonly planSummary: string;
  readonly findings: string;
  readonly actionPlan: readonly string[];
  readonly commandResults: readonly CommandResult[];
  readonly evidence: Evidence;
  readonly blockedCommands: readonly string[];
  readonly sopUsed: string;
  readonly isChat: boolean;
  readonly fixStage: EscalationStage;
}

export interface FixPlan {
  issueType: IssueType;
  summary: string;
  /** Empty means the summary stands alone as the answer */
  commands: string[];
  stage: EscalationStage;
  requiresConfirmation: boolean;
}

export interface ExecutionResult {
  success: boolean;
  commandResults: CommandResult[];
  verified: boolean;
  verificationMessage: string;
}

export interface EscalationState {
  readonly stage: EscalationStage;
  readonly issueText: string;
  readonly retryInProgress: boolean;
}
