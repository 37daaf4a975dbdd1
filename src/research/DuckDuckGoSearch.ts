/**
 * DuckDuckGoSearch
 *
 * Web lookups through DuckDuckGo: the instant-answer JSON API first, then
 * the HTML results page (parsed with cheerio) when the API has no related
 * topics. Redirect links (`/l/?uddg=<target>`) are unwrapped to the target.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { WebHit } from '../core/types.js';
import { DEFAULT_MAX_RESULTS, type WebSearchProvider } from './types.js';

export interface DuckDuckGoSearchOptions {
  enabled?: boolean;
  timeoutMs?: number;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

// Grouped topics ({ Name, Topics }) carry no Text and are skipped
const InstantAnswerSchema = z.object({
  RelatedTopics: z.array(z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional()
  })).optional()
});

const INSTANT_ANSWER_URL = 'https://api.duckduckgo.com/';
const HTML_SEARCH_URL = 'https://html.duckduckgo.com/html/';

const REQUEST_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9'
};

/**
 * Unwrap a DuckDuckGo redirect link; other links come back unchanged
 */
export function normalizeResultLink(link: string): string {
  if (!link) {
    return link;
  }
  try {
    const url = new URL(link, 'https://duckduckgo.com');
    if (url.pathname === '/l/') {
      const target = url.searchParams.get('uddg');
      if (target) {
        return target;
      }
    }
    return link;
  } catch {
    return link;
  }
}

export class DuckDuckGoSearch implements WebSearchProvider {
  private readonly enabled: boolean;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  lastQuery = '';
  lastError = '';
  lastCount = 0;

  constructor(options: DuckDuckGoSearchOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, maxResults: number = DEFAULT_MAX_RESULTS): Promise<WebHit[]> {
    this.lastQuery = query;
    this.lastError = '';
    this.lastCount = 0;

    if (!this.enabled) {
      this.lastError = 'web search disabled';
      return [];
    }

    let results: WebHit[] = [];
    try {
      results = await this.instantAnswer(query, maxResults);
    } catch (error) {
      console.log(`[WebSearch] Instant answer failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (results.length === 0) {
      try {
        results = await this.htmlResults(query, maxResults);
      } catch (error) {
        console.log(`[WebSearch] HTML fallback failed: ${error instanceof Error ? error.message : String(error)}`);
        this.lastError = 'web search failed';
        return [];
      }
    }

    this.lastCount = results.length;
    console.log(`[WebSearch] ${results.length} result(s) for "${query}"`);
    return results;
  }

  private async instantAnswer(query: string, maxResults: number): Promise<WebHit[]> {
    const url = new URL(INSTANT_ANSWER_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_redirect', '1');
    url.searchParams.set('no_html', '1');

    const response = await this.fetchImpl(url.toString(), {
      headers: REQUEST_HEADERS,
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const parsed = InstantAnswerSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('unexpected instant answer payload');
    }
    const results: WebHit[] = [];
    for (const topic of parsed.data.RelatedTopics ?? []) {
      if (results.length >= maxResults) {
        break;
      }
      if (topic.Text && topic.FirstURL) {
        results.push({ title: topic.Text, snippet: topic.Text, url: topic.FirstURL });
      }
    }
    return results;
  }

  private async htmlResults(query: string, maxResults: number): Promise<WebHit[]> {
    const url = new URL(HTML_SEARCH_URL);
    url.searchParams.set('q', query);

    const response = await this.fetchImpl(url.toString(), {
      headers: REQUEST_HEADERS,
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const $ = cheerio.load(await response.text());
    const results: WebHit[] = [];
    $('a.result__a').each((_, element) => {
      if (results.length >= maxResults) {
        return false;
      }
      const $link = $(element);
      const title = $link.text().trim();
      const link = normalizeResultLink($link.attr('href') ?? '');
      if (title && link) {
        const snippet = $link.closest('.result').find('.result__snippet').first().text().trim();
        results.push({ title, snippet: snippet || title, url: link });
      }
      return undefined;
    });
    return results;
  }
}
