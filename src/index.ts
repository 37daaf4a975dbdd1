/**
 * Support Pilot
 *
 * First-line technical support automation: diagnose a free-text problem
 * with read-only commands, propose a remediation script, run it behind a
 * deny-list gate, verify, and escalate through four remediation stages.
 */

export * from './core/types.js';
export {
  PipelineCancelledError,
  ShellTimeoutError,
  ShellOutputLimitError,
  ConfigurationError,
  PlaybookValidationError,
  throwIfCancelled
} from './core/errors.js';
export { getConfig, validateConfig, loadEnvironment, PROJECT_ROOT } from './core/config.js';
export type { SupportPilotConfig } from './core/config.js';
export { OutputSanitizer, getSanitizer, sanitize, maskEnvValue } from './core/OutputSanitizer.js';

export { CommandFilter, DENYLIST_REASON } from './policy/CommandFilter.js';
export type { CommandPolicy, DenyListFile, FilterDecision } from './policy/CommandFilter.js';

export { CommandRunner, DEFAULT_COMMAND_TIMEOUT_MS } from './execution/CommandRunner.js';
export type { CommandRunnerOptions } from './execution/CommandRunner.js';
export { NodeShellExecutor, settleExecution, MAX_BUFFER_BYTES } from './execution/ShellExecutor.js';
export type { ShellExecutor, ShellOutput, ShellKind } from './execution/ShellExecutor.js';
export { SessionTranscript } from './execution/SessionTranscript.js';
export type { TranscriptEntry, TranscriptSink } from './execution/SessionTranscript.js';

export { PlaybookCatalog, getDefaultCatalog, renderTemplate, DEFAULT_PLAYBOOK_PATH } from './playbooks/PlaybookCatalog.js';
export type { PlaybookStep, RemediationTemplate, VerificationProbe, ClassificationRule } from './playbooks/PlaybookCatalog.js';

export * from './providers/index.js';
export * from './knowledge/index.js';
export * from './research/index.js';
export * from './agents/index.js';
export * from './pipeline/index.js';
