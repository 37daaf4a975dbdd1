/**
 * DiagnosisAgent
 *
 * One diagnostic run: classify, research, plan, act, summarize. Split in
 * two so a caller can show the plan before any command runs:
 *
 *   prepare()  classification + evidence + plan (no commands run)
 *   execute()  walk the plan, summarize, freeze a DiagnosisResult
 */

import { throwIfCancelled } from '../core/errors.js';
import {
  MIN_STAGE,
  type Classification,
  type DiagnosisResult,
  type DiagnosticPlan,
  type EscalationStage,
  type Evidence
} from '../core/types.js';
import type { ActionRunner } from './ActionRunner.js';
import type { Classifier } from './Classifier.js';
import { keywordsFor, selectSop, type EvidenceAggregator } from './EvidenceAggregator.js';
import type { Summarizer } from './Summarizer.js';

export interface PreparedDiagnosis {
  classification: Classification;
  evidence: Evidence;
  plan: DiagnosticPlan;
  sopUsed: string;
}

export class DiagnosisAgent {
  private readonly classifier: Classifier;
  private readonly research: EvidenceAggregator;
  private readonly action: ActionRunner;
  private readonly summarizer: Summarizer;

  constructor(classifier: Classifier, research: EvidenceAggregator, action: ActionRunner, summarizer: Summarizer) {
    this.classifier = classifier;
    this.research = research;
    this.action = action;
    this.summarizer = summarizer;
  }

  async prepare(issueText: string, signal?: AbortSignal): Promise<PreparedDiagnosis> {
    throwIfCancelled(signal, 'classification');
    const classification = await this.classifier.classify(issueText);
    console.log(`[Diagnosis] Classified as ${classification.issueType} (${classification.source})`);

    throwIfCancelled(signal, 'research');
    const evidence = await this.research.fetch(issueText, classification.issueType, keywordsFor(issueText));
    const sopUsed = selectSop(evidence.knowledge);

    throwIfCancelled(signal, 'planning');
    const plan = await this.classifier.buildPlan(issueText, classification, evidence);
    return { classification, evidence, plan, sopUsed };
  }

  async execute(
    issueText: string,
    prepared: PreparedDiagnosis,
    stage: EscalationStage = MIN_STAGE,
    signal?: AbortSignal
  ): Promise<DiagnosisResult> {
    const { plan, evidence } = prepared;
    const { validatedSteps, commandResults } = await this.action.executePlan(plan.steps, signal);

    throwIfCancelled(signal, 'summary');
    const findings = plan.isChat
      ? plan.summary
      : await this.summarizer.findings(issueText, plan.issueType, commandResults, evidence);

    return Object.freeze({
      issueText,
      issueType: plan.issueType,
      extractedParam: plan.extractedParam,
      planSummary: plan.summary,
      findings,
      actionPlan: Object.freeze([...validatedSteps]),
      commandResults: Object.freeze([...commandResults]),
      evidence,
      blockedCommands: Object.freeze(commandResults.filter(result => !result.allowed).map(result => result.command)),
      sopUsed: prepared.sopUsed,
      isChat: plan.isChat,
      fixStage: stage
    });
  }

  async diagnose(issueText: string, stage: EscalationStage = MIN_STAGE, signal?: AbortSignal): Promise<DiagnosisResult> {
    const prepared = await this.prepare(issueText, signal);
    return this.execute(issueText, prepared, stage, signal);
  }
}
