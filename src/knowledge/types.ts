/**
 * Knowledge Base Types
 */

import type { KnowledgeMatch } from '../core/types.js';

/**
 * Knowledge-base search collaborator.
 *
 * A base that is not ready (no corpus, no index) answers every search with
 * an empty list instead of failing.
 */
export interface KnowledgeSearch {
  isReady(): boolean;
  /**
   * Top-K matches ranked by score descending. Candidates whose text contains
   * any of `keywordBoosts` get a fixed bonus before ranking.
   */
  search(query: string, topK: number, keywordBoosts: readonly string[]): Promise<KnowledgeMatch[]>;
}

/**
 * One row of the ticket corpus
 */
export interface TicketRow {
  conversationId: string;
  customerIssue: string;
  techResponse: string;
  issueCategory: string;
  issueStatus: string;
  resolutionTime: string;
}

/** Bonus added to a candidate whose text mentions a boost keyword */
export const KEYWORD_BOOST = 0.15;

export const DEFAULT_TOP_K = 5;
