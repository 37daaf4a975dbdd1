/**
 * EvidenceAggregator (Research)
 *
 * Gathers supporting evidence for an issue: knowledge-base matches and web
 * hits, looked up concurrently. Neither lookup can fail the caller: a base
 * that is not ready gives no matches, and web failures surface only through
 * the provider's sticky error status.
 */

import type { Evidence, IssueType, KnowledgeMatch, WebHit } from '../core/types.js';
import { DEFAULT_TOP_K, type KnowledgeSearch } from '../knowledge/types.js';
import { DEFAULT_MAX_RESULTS, type WebSearchProvider } from '../research/types.js';

/** Minimum knowledge score for a match to be used as an SOP hint */
export const SOP_SCORE_THRESHOLD = 0.2;

export interface EvidenceAggregatorOptions {
  topK?: number;
  maxWebResults?: number;
  /** Skip web lookups for informational system_info questions */
  skipWebForSystemInfo?: boolean;
}

const KEYWORD_TRIGGERS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['password', ['password']],
  ['blue screen', ['blue screen', 'bluescreen', 'bsod']],
  ['wi-fi', ['wifi', 'wi-fi', 'network', 'internet']],
  ['bluetooth', ['blue tooth', 'bluetooth', 'blutooth']],
  ['printer', ['printer']],
  ['install', ['install', 'setup']],
  ['performance', ['performance', 'slow']]
];

/**
 * Boost keywords implied by the issue text
 */
export function keywordsFor(issueText: string): string[] {
  const text = issueText.toLowerCase();
  return KEYWORD_TRIGGERS
    .filter(([, triggers]) => triggers.some(trigger => text.includes(trigger)))
    .map(([keyword]) => keyword);
}

/**
 * The top match as an SOP hint (`<id>: <issue> -> <response>`), or ''
 */
export function selectSop(matches: readonly KnowledgeMatch[]): string {
  const top = matches[0];
  if (!top || top.score < SOP_SCORE_THRESHOLD) {
    return '';
  }
  return `${top.id}: ${top.issueText} -> ${top.responseText}`;
}

export function webQueryFor(issueText: string): string {
  return `${issueText} Windows 11 troubleshooting steps`;
}

export class EvidenceAggregator {
  private readonly knowledge: KnowledgeSearch | null;
  private readonly web: WebSearchProvider | null;
  private readonly topK: number;
  private readonly maxWebResults: number;
  private readonly skipWebForSystemInfo: boolean;

  constructor(knowledge: KnowledgeSearch | null, web: WebSearchProvider | null, options: EvidenceAggregatorOptions = {}) {
    this.knowledge = knowledge;
    this.web = web;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.maxWebResults = options.maxWebResults ?? DEFAULT_MAX_RESULTS;
    this.skipWebForSystemInfo = options.skipWebForSystemInfo ?? true;
  }

  async fetch(issueText: string, issueType: IssueType, keywords: readonly string[] = keywordsFor(issueText)): Promise<Evidence> {
    const webQuery = webQueryFor(issueText);
    const skipWeb = issueType === 'chitchat' || (this.skipWebForSystemInfo && issueType === 'system_info');

    const [knowledge, web] = await Promise.all([
      this.searchKnowledge(issueText, keywords),
      skipWeb ? Promise.resolve<WebHit[]>([]) : this.searchWeb(webQuery)
    ]);

    return {
      knowledge,
      web,
      webQuery: skipWeb ? '' : webQuery,
      webError: skipWeb ? '' : this.web?.lastError ?? 'web search unavailable',
      webCount: skipWeb ? 0 : this.web?.lastCount ?? 0
    };
  }

  private async searchKnowledge(issueText: string, keywords: readonly string[]): Promise<KnowledgeMatch[]> {
    if (!this.knowledge?.isReady()) {
      return [];
    }
    try {
      return await this.knowledge.search(issueText, this.topK, keywords);
    } catch (error) {
      console.log(`[Research] Knowledge search failed: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  private async searchWeb(query: string): Promise<WebHit[]> {
    if (!this.web) {
      return [];
    }
    try {
      return await this.web.search(query, this.maxWebResults);
    } catch (error) {
      console.log(`[Research] Web search failed: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }
}
