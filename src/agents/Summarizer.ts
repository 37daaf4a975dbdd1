/**
 * Summarizer
 *
 * Turns a diagnostic run into a short findings paragraph: generated from
 * the command output plus the top knowledge and web hints when generation
 * is available and there is output to read, otherwise the category's
 * fixed fallback sentence.
 */

import type { CommandResult, Evidence, IssueType } from '../core/types.js';
import type { PlaybookCatalog } from '../playbooks/PlaybookCatalog.js';
import type { TextGenerator } from '../providers/TextGenerator.js';

/**
 * Command text followed by its output (or its error), one block per result
 */
export function transcriptText(results: readonly CommandResult[]): string {
  const blocks: string[] = [];
  for (const result of results) {
    if (result.allowed && result.output) {
      blocks.push(`${result.command}\n${result.output}`);
    } else if (result.error) {
      blocks.push(`${result.command}\n${result.error}`);
    }
  }
  return blocks.join('\n\n');
}

export function evidenceHints(evidence: Evidence): { knowledgeHint: string; webHint: string } {
  const top = evidence.knowledge[0];
  const topWeb = evidence.web[0];
  return {
    knowledgeHint: top ? `Related SOP: ${top.issueText} -> ${top.responseText}` : '',
    webHint: topWeb ? `Web hint: ${topWeb.title} | ${topWeb.url}` : ''
  };
}

export class Summarizer {
  private readonly generator: TextGenerator;
  private readonly catalog: PlaybookCatalog;

  constructor(generator: TextGenerator, catalog: PlaybookCatalog) {
    this.generator = generator;
    this.catalog = catalog;
  }

  async findings(
    issueText: string,
    issueType: IssueType,
    results: readonly CommandResult[],
    evidence: Evidence
  ): Promise<string> {
    const output = transcriptText(results);

    if (this.generator.available() && output) {
      const { knowledgeHint, webHint } = evidenceHints(evidence);
      const summary = await this.generator.generate(
        'You are a Windows diagnostics assistant. Provide a short, user-friendly summary in passive voice only.',
        `Issue: ${issueText}\nType: ${issueType}\nOutput:\n${output}\n${knowledgeHint}\n${webHint}`
      );
      if (summary) {
        return summary;
      }
    }

    return this.catalog.fallbackFindings(issueType) || 'Diagnostics complete.';
  }
}
