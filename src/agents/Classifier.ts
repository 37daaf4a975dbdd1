/**
 * Classifier (Orchestrator)
 *
 * Maps issue text to a category from the closed taxonomy, extracts the
 * parameter a category needs (the application name for install requests)
 * and builds the read-only diagnostic plan.
 *
 * Generation is preferred when it is available; without it classification
 * runs the ordered keyword rules and the plan comes from the playbook
 * templates. Generation that returns nothing usable degrades to `general`
 * (classification) or to the templates (plan). Commands are never checked
 * for being read-only here; that is the CommandFilter's job.
 */

import { z } from 'zod';
import {
  ISSUE_TYPES,
  isIssueType,
  type Classification,
  type DiagnosticPlan,
  type Evidence,
  type IssueType,
  type PlanStep
} from '../core/types.js';
import type { PlaybookCatalog } from '../playbooks/PlaybookCatalog.js';
import { renderTemplate } from '../playbooks/PlaybookCatalog.js';
import { extractJson, type TextGenerator } from '../providers/TextGenerator.js';
import { selectSop } from './EvidenceAggregator.js';

export const CHITCHAT_SUMMARY = 'Hi! How can I help you with your Windows issue today?';

const ClassificationPayload = z.object({
  issue_type: z.string().optional(),
  install_app: z.string().optional()
});

const GeneratedStep = z.union([
  z.string(),
  z.object({
    description: z.string().optional(),
    command: z.string().optional()
  })
]);

const PlanPayload = z.object({
  summary: z.string().optional(),
  commands: z.array(GeneratedStep).optional()
});

const LEADING_FILLERS = new Set(['the', 'a', 'an', 'me', 'app', 'application', 'program', 'software', 'latest', 'new']);
const TRAILING_FILLERS = new Set(['app', 'application', 'program', 'software', 'please']);

/**
 * Keep characters that are safe inside a quoted shell argument
 */
export function sanitizeParameter(value: string): string {
  return value.replace(/[^\w .+-]/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Application name from an install request, or ''
 *
 * "Can you install the Zoom app for me?" -> "Zoom"
 */
export function extractInstallTarget(issueText: string): string {
  const match = /\b(?:reinstall|install|set up|setup|download)\s+(.+)/i.exec(issueText);
  if (!match) {
    return '';
  }

  const target = match[1]
    .replace(/[?!.,;]+/g, ' ')
    .replace(/\b(?:on|onto|to|for|in) (?:my|this|the) (?:pc|computer|laptop|machine|system|desktop)\b.*$/i, '')
    .replace(/\bfor me\b.*$/i, '')
    .replace(/\bplease\b/gi, ' ');

  const words = target.split(/\s+/).filter(word => word !== '');
  while (words.length > 0 && LEADING_FILLERS.has(words[0].toLowerCase())) {
    words.shift();
  }
  while (words.length > 0 && TRAILING_FILLERS.has(words[words.length - 1].toLowerCase())) {
    words.pop();
  }
  return sanitizeParameter(words.join(' '));
}

export function normalizeIssueText(issueText: string): string {
  return issueText.toLowerCase().replace(/\s+/g, ' ').trim();
}

function formatWebHints(evidence: Evidence | undefined): string {
  return (evidence?.web ?? [])
    .slice(0, 5)
    .map(hit => [hit.title, hit.snippet, hit.url].filter(part => part !== '').join(' | '))
    .filter(line => line !== '')
    .join('\n');
}

export class Classifier {
  private readonly generator: TextGenerator;
  private readonly catalog: PlaybookCatalog;

  constructor(generator: TextGenerator, catalog: PlaybookCatalog) {
    this.generator = generator;
    this.catalog = catalog;
  }

  /**
   * Rule-based classification: first matching rule wins, `general` otherwise
   */
  classifyByRules(issueText: string): Classification {
    const normalized = normalizeIssueText(issueText);
    const issueType = this.catalog.matchRule(normalized);
    if (!issueType) {
      return { issueType: 'general', extractedParam: '', source: 'default' };
    }
    return {
      issueType,
      extractedParam: issueType === 'install_app' ? extractInstallTarget(issueText) : '',
      source: 'rules'
    };
  }

  async classify(issueText: string): Promise<Classification> {
    if (!this.generator.available()) {
      return this.classifyByRules(issueText);
    }

    const response = await this.generator.generate(
      'You are a Windows support classifier. Return JSON only. ' +
        `Use issue_type from: ${ISSUE_TYPES.join(', ')}.`,
      `Issue: ${issueText}\nReturn JSON with keys: issue_type, install_app (empty if not install).`
    );

    const parsed = ClassificationPayload.safeParse(extractJson(response));
    if (!parsed.success) {
      console.log(`[Classifier] Classification parse failed. Raw response: ${response.slice(0, 800)}`);
      return { issueType: 'general', extractedParam: '', source: 'default' };
    }

    const candidate = (parsed.data.issue_type ?? '').trim().toLowerCase();
    if (!isIssueType(candidate)) {
      console.log(`[Classifier] Unknown issue type "${candidate}", using general`);
      return { issueType: 'general', extractedParam: '', source: 'default' };
    }

    let extractedParam = sanitizeParameter(parsed.data.install_app ?? '');
    if (candidate === 'install_app' && !extractedParam) {
      extractedParam = extractInstallTarget(issueText);
    }
    return {
      issueType: candidate,
      extractedParam: candidate === 'install_app' ? extractedParam : '',
      source: 'generation'
    };
  }

  /**
   * Playbook diagnostics with `{app}` filled in
   */
  templatePlan(issueType: IssueType, extractedParam: string): PlanStep[] {
    return this.catalog.diagnosticsFor(issueType).map(template => {
      const rendered = renderTemplate(template.command, { app: extractedParam });
      const step: PlanStep = { description: template.description, command: rendered.text };
      if (template.preflight) {
        step.preflight = template.preflight;
      }
      if (template.command !== rendered.text || rendered.missing.length > 0) {
        step.parameter = extractedParam;
      }
      return step;
    });
  }

  async buildPlan(issueText: string, classification: Classification, evidence?: Evidence): Promise<DiagnosticPlan> {
    const { issueType, extractedParam } = classification;
    const base = { issueType, extractedParam, isChat: issueType === 'chitchat' };

    if (issueType === 'chitchat') {
      const generated = this.generator.available() ? await this.generatePlan(issueText, classification, evidence) : undefined;
      return { ...base, steps: [], summary: generated?.summary || CHITCHAT_SUMMARY };
    }

    if (this.generator.available()) {
      const generated = await this.generatePlan(issueText, classification, evidence);
      if (generated && generated.steps.length > 0) {
        return { ...base, steps: generated.steps, summary: generated.summary || 'Generated a diagnostic script based on the SOP and web references.' };
      }
      console.log('[Classifier] No usable generated steps, using playbook diagnostics');
    }

    const steps = this.templatePlan(issueType, extractedParam);
    return {
      ...base,
      steps,
      summary: steps.length > 0
        ? `Running ${steps.length} read-only diagnostic check(s) for ${issueType.replace(/_/g, ' ')}.`
        : 'No diagnostic checks apply to this request.'
    };
  }

  /**
   * Classify and plan in one call
   */
  async planFor(issueText: string, evidence?: Evidence): Promise<DiagnosticPlan> {
    const classification = await this.classify(issueText);
    return this.buildPlan(issueText, classification, evidence);
  }

  private async generatePlan(
    issueText: string,
    classification: Classification,
    evidence: Evidence | undefined
  ): Promise<{ summary: string; steps: PlanStep[] } | undefined> {
    const sop = evidence ? selectSop(evidence.knowledge) : '';
    const response = await this.generator.generate(
      'You are a Windows diagnostics planner. Use the SOP if provided and the web hints. ' +
        'Return JSON only with keys: summary, commands. ' +
        'Commands must be read-only PowerShell commands for diagnostics (no changes). ' +
        'commands is a list of objects: {"description": "...", "command": "..."}.',
      `Issue: ${issueText}\n` +
        `Type: ${classification.issueType}\n` +
        `Install app: ${classification.extractedParam}\n` +
        `SOP: ${sop || 'No SOP match found.'}\n` +
        `Web hints:\n${formatWebHints(evidence)}\n` +
        'If the issue is just a greeting or small talk, return a friendly summary and an empty commands list. ' +
        'Otherwise generate a diagnostic script that checks services, logs, adapters, system metrics, and app status as relevant.'
    );

    const parsed = PlanPayload.safeParse(extractJson(response));
    if (!parsed.success) {
      console.log(`[Classifier] Diagnostics plan parse failed. Raw response: ${response.slice(0, 1200)}`);
      return undefined;
    }

    const steps: PlanStep[] = [];
    for (const item of parsed.data.commands ?? []) {
      const command = (typeof item === 'string' ? item : item.command ?? '').trim();
      const description = (typeof item === 'string' ? '' : item.description ?? '').trim();
      if (command) {
        steps.push({ description: description || 'Run diagnostic command.', command });
      }
    }
    return { summary: (parsed.data.summary ?? '').trim(), steps };
  }
}
