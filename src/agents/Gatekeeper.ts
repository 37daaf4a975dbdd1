/**
 * Gatekeeper
 *
 * Last content-safety pass on answer text before it is shown. System-info
 * answers are structured values and pass through untouched. Anything else
 * that carries promotional or ad-tracking terms is replaced by a neutral
 * refusal; the rest goes through an editing pass when generation is
 * available, keeping the draft if the edit comes back empty.
 */

import type { IssueType } from '../core/types.js';
import type { TextGenerator } from '../providers/TextGenerator.js';

export const PROMOTIONAL_REFUSAL =
  'I filtered out promotional content. I can provide a neutral, technical answer instead.';

export const BLOCKED_TERMS: readonly string[] = [
  'pc repair tool',
  'speedup',
  'trusted',
  'download',
  'ad_provider',
  'ad_domain',
  'click_metadata',
  'bing.com/aclick'
];

const EDITOR_PROMPT =
  'You are a response editor. Ensure answers are safe, non-promotional, and cite sources when available.';

export class Gatekeeper {
  private readonly generator: TextGenerator;
  private readonly blockedTerms: readonly string[];

  constructor(generator: TextGenerator, blockedTerms: readonly string[] = BLOCKED_TERMS) {
    this.generator = generator;
    this.blockedTerms = blockedTerms.map(term => term.toLowerCase());
  }

  async finalize(issueType: IssueType, question: string, candidate: string, sourcesText: string): Promise<string> {
    if (!candidate || issueType === 'system_info') {
      return candidate;
    }

    const lowered = candidate.toLowerCase();
    const hit = this.blockedTerms.find(term => lowered.includes(term));
    if (hit) {
      console.log(`[Gatekeeper] Rejected answer containing "${hit}"`);
      return PROMOTIONAL_REFUSAL;
    }

    if (!this.generator.available()) {
      return candidate;
    }

    const edited = await this.generator.generate(
      EDITOR_PROMPT,
      `Question: ${question}\nDraft: ${candidate}\nSources: ${sourcesText}\nReturn a concise final answer.`
    );
    return edited || candidate;
  }
}
