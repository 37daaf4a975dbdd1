/**
 * PlaybookCatalog
 *
 * Hand-authored support playbooks: ordered classification rules, read-only
 * diagnostic steps per issue type, remediation (flat or staged 1-4),
 * verification probes and fallback findings. Loaded from
 * data/playbooks.json and validated with zod at construction.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { PROJECT_ROOT } from '../core/config.js';
import { PlaybookValidationError } from '../core/errors.js';
import type { EscalationStage, IssueType, PreflightSpec } from '../core/types.js';
import { ISSUE_TYPES } from '../core/types.js';

export const DEFAULT_PLAYBOOK_PATH = join(PROJECT_ROOT, 'data', 'playbooks.json');

const PreflightSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('requires-parameter'), reason: z.string().optional() }),
  z.object({ kind: z.literal('device-class'), deviceClass: z.string().min(1) })
]);

const StepSchema = z.object({
  description: z.string().min(1),
  command: z.string().min(1),
  preflight: PreflightSchema.optional()
});

const StageSchema = z.object({
  summary: z.string(),
  commands: z.array(z.string().min(1))
});

const RemediationSchema = z.object({
  summary: z.string().default(''),
  commands: z.array(z.string().min(1)).default([]),
  stages: z.object({ '1': StageSchema, '2': StageSchema, '3': StageSchema, '4': StageSchema }).optional()
});

const ProbeSchema = z.object({
  description: z.string().min(1),
  command: z.string().min(1),
  expect: z.string().min(1)
});

const CategorySchema = z.object({
  findingsFallback: z.string(),
  diagnostics: z.array(StepSchema).default([]),
  remediation: RemediationSchema.default({}),
  verification: z.array(ProbeSchema).default([])
});

const CatalogSchema = z.object({
  version: z.literal(1),
  classificationRules: z.array(z.object({
    issueType: z.enum(ISSUE_TYPES),
    patterns: z.array(z.string().min(1)).min(1)
  })),
  categories: z.object({
    system_info: CategorySchema,
    install_app: CategorySchema,
    network: CategorySchema,
    bluetooth: CategorySchema,
    disk_space: CategorySchema,
    performance: CategorySchema,
    account: CategorySchema,
    app_error: CategorySchema,
    general: CategorySchema,
    chitchat: CategorySchema
  })
});

type CategoryPlaybook = z.infer<typeof CategorySchema>;

export interface PlaybookStep {
  description: string;
  command: string;
  preflight?: PreflightSpec;
}

export interface RemediationTemplate {
  summary: string;
  commands: string[];
}

export interface VerificationProbe {
  description: string;
  command: string;
  /** Case-insensitive, multi-line: any output line may satisfy it */
  expect: RegExp;
}

export interface ClassificationRule {
  issueType: IssueType;
  patterns: RegExp[];
}

function compilePattern(source: string, pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new PlaybookValidationError(source, `bad pattern ${JSON.stringify(pattern)}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export class PlaybookCatalog {
  readonly source: string;
  readonly classificationRules: readonly ClassificationRule[];
  private readonly categories: Record<IssueType, CategoryPlaybook>;
  private readonly probes: Map<IssueType, VerificationProbe[]>;

  private constructor(source: string, data: z.infer<typeof CatalogSchema>) {
    this.source = source;
    this.categories = data.categories;
    this.classificationRules = data.classificationRules.map(rule => ({
      issueType: rule.issueType,
      patterns: rule.patterns.map(pattern => compilePattern(source, pattern, 'i'))
    }));
    this.probes = new Map();
    for (const type of ISSUE_TYPES) {
      this.probes.set(type, data.categories[type].verification.map(probe => ({
        description: probe.description,
        command: probe.command,
        expect: compilePattern(source, probe.expect, 'im')
      })));
    }
  }

  static load(path: string = DEFAULT_PLAYBOOK_PATH): PlaybookCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new PlaybookValidationError(path, error instanceof Error ? error.message : String(error));
    }
    return PlaybookCatalog.fromData(raw, path);
  }

  static fromData(data: unknown, source: string = 'inline'): PlaybookCatalog {
    const parsed = CatalogSchema.safeParse(data);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new PlaybookValidationError(source, detail);
    }
    return new PlaybookCatalog(source, parsed.data);
  }

  /**
   * First rule whose pattern matches wins; undefined when nothing matches
   */
  matchRule(text: string): IssueType | undefined {
    for (const rule of this.classificationRules) {
      if (rule.patterns.some(pattern => pattern.test(text))) {
        return rule.issueType;
      }
    }
    return undefined;
  }

  diagnosticsFor(issueType: IssueType): PlaybookStep[] {
    return this.categories[issueType].diagnostics.map(step => ({ ...step }));
  }

  isStaged(issueType: IssueType): boolean {
    return this.categories[issueType].remediation.stages !== undefined;
  }

  remediationFor(issueType: IssueType, stage: EscalationStage): RemediationTemplate {
    const remediation = this.categories[issueType].remediation;
    const template = remediation.stages ? remediation.stages[stage] : remediation;
    return { summary: template.summary, commands: [...template.commands] };
  }

  verificationFor(issueType: IssueType): VerificationProbe[] {
    return [...(this.probes.get(issueType) ?? [])];
  }

  fallbackFindings(issueType: IssueType): string {
    return this.categories[issueType].findingsFallback;
  }
}

let defaultCatalog: PlaybookCatalog | null = null;

/**
 * Lazily loaded catalog from data/playbooks.json
 */
export function getDefaultCatalog(): PlaybookCatalog {
  if (!defaultCatalog) {
    defaultCatalog = PlaybookCatalog.load();
  }
  return defaultCatalog;
}

export interface RenderedTemplate {
  text: string;
  /** Placeholder names with no (or an empty) value */
  missing: string[];
}

/**
 * Substitute `{name}` placeholders. Unresolved names are replaced with ''
 * and reported in `missing`.
 */
export function renderTemplate(template: string, params: Readonly<Record<string, string | undefined>>): RenderedTemplate {
  const missing: string[] = [];
  const text = template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (!value) {
      missing.push(name);
      return '';
    }
    return value;
  });
  return { text, missing };
}
