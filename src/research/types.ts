/**
 * Web Search Types
 */

import type { WebHit } from '../core/types.js';

/**
 * Web-search collaborator.
 *
 * Failures never throw: they leave the sticky `lastError` set and yield [].
 * `lastCount` is the number of hits returned by the most recent search.
 */
export interface WebSearchProvider {
  search(query: string, maxResults?: number): Promise<WebHit[]>;
  readonly lastQuery: string;
  readonly lastError: string;
  readonly lastCount: number;
}

export const DEFAULT_MAX_RESULTS = 3;
