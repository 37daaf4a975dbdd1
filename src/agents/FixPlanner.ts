/**
 * FixPlanner
 *
 * Proposes remediation for a diagnosis at its escalation stage, or answers
 * the question directly when no remediation applies.
 *
 * Remediation comes from generation when it is available and parses, and
 * from the playbooks otherwise. Network and Bluetooth playbooks are staged:
 *
 *   1. conservative service restart
 *   2. adapter power-cycle (and IP renewal for network)
 *   3. full adapter and service cycle
 *   4. device removal and hardware rescan
 *
 * Stages 2-4 target the adapter found in the diagnostic output; a command
 * whose target cannot be resolved is dropped rather than run half-filled.
 *
 * Direct answers: text extractors over the diagnostic output first, then
 * knowledge/web synthesis through the Gatekeeper, then a neutral reply.
 */

import { z } from 'zod';
import type { CommandResult, DiagnosisResult, FixPlan, IssueType } from '../core/types.js';
import type { PlaybookCatalog } from '../playbooks/PlaybookCatalog.js';
import { renderTemplate } from '../playbooks/PlaybookCatalog.js';
import { extractJson, type TextGenerator } from '../providers/TextGenerator.js';
import {
  answerFromDiagnostics,
  combinedOutput,
  formatKnowledgeSteps,
  isSystemInfoQuestion,
  parseListBlocks,
  type ListRecord
} from './AnswerExtractors.js';
import { SOP_SCORE_THRESHOLD } from './EvidenceAggregator.js';
import type { Gatekeeper } from './Gatekeeper.js';

export const CONFIRMATION_PROMPT = 'Apply the proposed fix?';
export const NOT_IN_DIAGNOSTICS = "I couldn't find that in diagnostics. Please re-run diagnostics.";
export const NO_DIRECT_ANSWER = "I couldn't find a direct answer. Try rephrasing the question.";

const FixPayload = z.object({
  summary: z.string().optional(),
  commands: z.array(z.union([z.string(), z.object({ command: z.string().optional() })])).optional()
});

/**
 * Values the remediation templates can reference
 */
export interface RemediationTargets {
  app?: string;
  /** Network adapter name, e.g. "Wi-Fi" */
  adapter?: string;
  /** PnP instance id of that network adapter */
  adapterInstanceId?: string;
  /** PnP instance id of the Bluetooth radio */
  instanceId?: string;
}

function isHealthy(record: ListRecord, healthyStatus: string): boolean {
  return (record.status ?? '').toLowerCase() === healthyStatus;
}

/**
 * Network adapter from `Get-NetAdapter | Format-List Name,...,Status,PnPDeviceID`:
 * the first adapter that is not Up, else the first adapter
 */
export function selectNetworkAdapter(results: readonly CommandResult[]): ListRecord | undefined {
  const adapters = parseListBlocks(combinedOutput(results)).filter(
    record => record.name && record.pnpdeviceid
  );
  return adapters.find(record => !isHealthy(record, 'up')) ?? adapters[0];
}

/**
 * Bluetooth radio from `Get-PnpDevice -Class Bluetooth | Format-List FriendlyName,InstanceId,Status`.
 * Radios sit on USB or PCI; BTHENUM entries are paired devices and profiles.
 * The first radio not reporting OK wins, else the first radio, else the
 * first device.
 */
export function selectBluetoothRadio(results: readonly CommandResult[]): ListRecord | undefined {
  const devices = parseListBlocks(combinedOutput(results)).filter(record => record.instanceid);
  const radios = devices.filter(record => /^(usb|pci)\\/i.test(record.instanceid));
  return radios.find(record => !isHealthy(record, 'ok')) ?? radios[0] ?? devices[0];
}

export function resolveTargets(diagnosis: DiagnosisResult): RemediationTargets {
  const targets: RemediationTargets = { app: diagnosis.extractedParam || undefined };
  if (diagnosis.issueType === 'network') {
    const adapter = selectNetworkAdapter(diagnosis.commandResults);
    targets.adapter = adapter?.name;
    targets.adapterInstanceId = adapter?.pnpdeviceid;
  }
  if (diagnosis.issueType === 'bluetooth') {
    targets.instanceId = selectBluetoothRadio(diagnosis.commandResults)?.instanceid;
  }
  return targets;
}

function withConfirmation(summary: string): string {
  const trimmed = summary.trim();
  if (trimmed.includes(CONFIRMATION_PROMPT)) {
    return trimmed;
  }
  return trimmed ? `${trimmed} ${CONFIRMATION_PROMPT}` : CONFIRMATION_PROMPT;
}

export class FixPlanner {
  private readonly generator: TextGenerator;
  private readonly catalog: PlaybookCatalog;
  private readonly gatekeeper: Gatekeeper;

  constructor(generator: TextGenerator, catalog: PlaybookCatalog, gatekeeper: Gatekeeper) {
    this.generator = generator;
    this.catalog = catalog;
    this.gatekeeper = gatekeeper;
  }

  async propose(issueText: string, diagnosis: DiagnosisResult): Promise<FixPlan> {
    if (diagnosis.isChat) {
      return this.plan(diagnosis, diagnosis.planSummary, []);
    }

    if (this.generator.available()) {
      const generated = await this.generateFix(issueText, diagnosis);
      if (generated) {
        if (generated.commands.length > 0) {
          return this.plan(diagnosis, withConfirmation(generated.summary || 'Proposed fix script ready.'), generated.commands);
        }
        return this.plan(diagnosis, await this.answerQuestion(issueText, diagnosis), []);
      }
    }

    return this.templateFix(issueText, diagnosis);
  }

  /**
   * Playbook remediation for the diagnosis' category and stage
   */
  async templateFix(issueText: string, diagnosis: DiagnosisResult): Promise<FixPlan> {
    const template = this.catalog.remediationFor(diagnosis.issueType, diagnosis.fixStage);
    if (template.commands.length === 0) {
      return this.plan(diagnosis, await this.answerQuestion(issueText, diagnosis), []);
    }

    const targets = resolveTargets(diagnosis);
    const commands: string[] = [];
    const unresolved = new Set<string>();
    for (const command of template.commands) {
      const rendered = renderTemplate(command, { ...targets });
      if (rendered.missing.length > 0) {
        rendered.missing.forEach(name => unresolved.add(name));
        console.log(`[FixPlanner] Dropping "${command}": unresolved ${rendered.missing.join(', ')}`);
        continue;
      }
      commands.push(rendered.text);
    }

    if (commands.length === 0) {
      return this.plan(
        diagnosis,
        `${template.summary} The fix could not be prepared because diagnostics did not report: ${[...unresolved].join(', ')}.`,
        []
      );
    }
    return this.plan(diagnosis, withConfirmation(template.summary), commands);
  }

  /**
   * Direct answer for informational requests
   */
  async answerQuestion(issueText: string, diagnosis: DiagnosisResult): Promise<string> {
    const extracted = answerFromDiagnostics(issueText, combinedOutput(diagnosis.commandResults));
    if (extracted) {
      return extracted;
    }
    if (isSystemInfoQuestion(issueText)) {
      return NOT_IN_DIAGNOSTICS;
    }

    const top = diagnosis.evidence.knowledge[0];
    const knowledge = top && top.score >= SOP_SCORE_THRESHOLD ? top : undefined;
    const knowledgeText = knowledge ? `${knowledge.id}: ${knowledge.responseText}` : '';
    const topWeb = diagnosis.evidence.web[0];
    const webText = topWeb ? `${topWeb.title} (${topWeb.url})` : '';

    let answer = '';
    if (this.generator.available() && (knowledgeText || webText)) {
      answer = await this.generator.generate(
        'You synthesize answers from a knowledge base and web hints. Pick the most relevant, safest guidance and keep it concise.',
        `Question: ${issueText}\nDiagnostics: ${diagnosis.findings}\nKB: ${knowledgeText}\nWeb: ${webText}\n` +
          'Provide the best single answer with concrete steps if applicable.'
      );
    }
    if (!answer && knowledge) {
      answer = formatKnowledgeSteps(knowledge.id, knowledge.responseText);
      if (webText) {
        answer = `${answer}\nAdditional reference: ${webText}`;
      }
    }
    if (!answer && webText) {
      answer = `Suggested reference: ${webText}`;
    }

    if (answer) {
      const sources = [knowledgeText, webText].filter(text => text !== '').join(' ');
      return this.gatekeeper.finalize(diagnosis.issueType, issueText, answer, sources);
    }
    return NO_DIRECT_ANSWER;
  }

  private plan(diagnosis: DiagnosisResult, summary: string, commands: string[]): FixPlan {
    return {
      issueType: diagnosis.issueType,
      summary,
      commands,
      stage: diagnosis.fixStage,
      requiresConfirmation: commands.length > 0
    };
  }

  private async generateFix(
    issueText: string,
    diagnosis: DiagnosisResult
  ): Promise<{ summary: string; commands: string[] } | undefined> {
    const top = diagnosis.evidence.knowledge[0];
    const topWeb = diagnosis.evidence.web[0];
    const stageHint = this.stageHint(diagnosis.issueType, diagnosis);

    const response = await this.generator.generate(
      'You are a Windows support agent. Propose a safe resolution script based on diagnostics. ' +
        'Return JSON only with keys: summary, commands. ' +
        'The summary must be short, user-friendly, and in passive voice only. ' +
        'Commands must be PowerShell commands for remediation; avoid destructive actions.',
      `Issue: ${issueText}\nType: ${diagnosis.issueType}\nFindings: ${diagnosis.findings}\n` +
        `${top ? `SOP (${top.id}): ${top.responseText}` : ''}\n` +
        `${topWeb ? `Web source: ${topWeb.title} (${topWeb.url})` : ''}\n` +
        `Fix stage: ${diagnosis.fixStage}\n${stageHint}` +
        'Return JSON with summary and commands.'
    );

    const parsed = FixPayload.safeParse(extractJson(response));
    if (!parsed.success) {
      console.log(`[FixPlanner] Fix plan parse failed. Raw response: ${response.slice(0, 1200)}`);
      return undefined;
    }

    const commands = (parsed.data.commands ?? [])
      .map(item => (typeof item === 'string' ? item : item.command ?? '').trim())
      .filter(command => command !== '');
    return { summary: (parsed.data.summary ?? '').trim(), commands };
  }

  private stageHint(issueType: IssueType, diagnosis: DiagnosisResult): string {
    if (!this.catalog.isStaged(issueType)) {
      return '';
    }
    const template = this.catalog.remediationFor(issueType, diagnosis.fixStage);
    const targets = resolveTargets(diagnosis);
    const commands = template.commands.map(command => renderTemplate(command, { ...targets }).text);
    return `Stage ${diagnosis.fixStage} playbook: ${template.summary} ${commands.join('; ')}\n`;
  }
}
