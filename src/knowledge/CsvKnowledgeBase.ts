/**
 * CsvKnowledgeBase
 *
 * Local knowledge base over a CSV corpus of past support tickets
 * (Conversation_ID, Customer_Issue, Tech_Response, Issue_Category,
 * Issue_Status, Resolution_Time). Tickets are indexed with TF-IDF; the index
 * is cached as JSON next to the corpus and keyed by the corpus' SHA-256, so a
 * changed CSV invalidates the cache.
 *
 * With `requireCache` the index is never built at runtime: a missing or stale
 * cache leaves the base not ready (every search returns []). `build-index`
 * builds the cache ahead of time.
 */

import { createHash } from 'crypto';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { PROJECT_ROOT } from '../core/config.js';
import type { KnowledgeMatch } from '../core/types.js';
import { parseCsv } from './csv.js';
import { TfIdfIndex } from './TfIdfIndex.js';
import { KEYWORD_BOOST, type KnowledgeSearch, type TicketRow } from './types.js';

export const DEFAULT_STOPWORDS_PATH = join(PROJECT_ROOT, 'data', 'knowledge', 'stopwords.txt');

export interface CsvKnowledgeBaseOptions {
  csvPath: string;
  cachePath?: string;
  requireCache?: boolean;
  stopWordsPath?: string;
}

const TicketRowSchema = z.object({
  conversationId: z.string(),
  customerIssue: z.string(),
  techResponse: z.string(),
  issueCategory: z.string(),
  issueStatus: z.string(),
  resolutionTime: z.string()
});

const CacheSchema = z.object({
  csvHash: z.string(),
  rows: z.array(TicketRowSchema),
  vocabulary: z.array(z.string()),
  idf: z.array(z.number()),
  vectors: z.array(z.array(z.tuple([z.number().int(), z.number()])))
});

type IndexCache = z.infer<typeof CacheSchema>;

export function loadStopWords(path: string = DEFAULT_STOPWORDS_PATH): Set<string> {
  if (!existsSync(path)) {
    return new Set();
  }
  return new Set(
    readFileSync(path, 'utf-8')
      .split(/\r?\n/)
      .map(word => word.trim().toLowerCase())
      .filter(word => word !== '')
  );
}

function hashFile(path: string): string {
  return createHash('sha256').update(readFileSync(path)).digest('hex');
}

function toTicketRow(record: Record<string, string>): TicketRow {
  return {
    conversationId: record.Conversation_ID ?? '',
    customerIssue: record.Customer_Issue ?? '',
    techResponse: record.Tech_Response ?? '',
    issueCategory: record.Issue_Category ?? '',
    issueStatus: record.Issue_Status ?? '',
    resolutionTime: record.Resolution_Time ?? ''
  };
}

function documentText(row: TicketRow): string {
  return [row.customerIssue, row.techResponse, row.issueCategory, row.issueStatus].join(' | ');
}

export class CsvKnowledgeBase implements KnowledgeSearch {
  private readonly csvPath: string;
  private readonly cachePath: string;
  private readonly requireCache: boolean;
  private readonly stopWords: Set<string>;
  private rows: TicketRow[] = [];
  private index: TfIdfIndex | null = null;
  private csvHash = '';

  constructor(options: CsvKnowledgeBaseOptions) {
    this.csvPath = options.csvPath;
    this.cachePath = options.cachePath ?? `${options.csvPath}.index.json`;
    this.requireCache = options.requireCache ?? false;
    this.stopWords = loadStopWords(options.stopWordsPath);
    this.load();
  }

  private load(): void {
    if (!existsSync(this.csvPath)) {
      console.warn(`[KnowledgeBase] Corpus not found at ${this.csvPath}; knowledge search disabled`);
      return;
    }
    this.csvHash = hashFile(this.csvPath);

    if (this.loadCache()) {
      console.log(`[KnowledgeBase] Loaded index for ${this.rows.length} tickets from ${this.cachePath}`);
      return;
    }
    if (this.requireCache) {
      console.warn(`[KnowledgeBase] No valid index cache at ${this.cachePath}; run build-index`);
      return;
    }
    this.build();
  }

  /**
   * Index the corpus and write the cache. Returns the number of tickets indexed.
   */
  build(): number {
    if (!existsSync(this.csvPath)) {
      return 0;
    }
    this.csvHash = hashFile(this.csvPath);
    this.rows = parseCsv(readFileSync(this.csvPath, 'utf-8')).map(toTicketRow);
    if (this.rows.length === 0) {
      this.index = null;
      return 0;
    }
    this.index = TfIdfIndex.fit(this.rows.map(documentText), this.stopWords);
    this.saveCache();
    console.log(`[KnowledgeBase] Indexed ${this.rows.length} tickets`);
    return this.rows.length;
  }

  private loadCache(): boolean {
    if (!existsSync(this.cachePath)) {
      return false;
    }
    try {
      const parsed = CacheSchema.safeParse(JSON.parse(readFileSync(this.cachePath, 'utf-8')));
      if (!parsed.success || parsed.data.csvHash !== this.csvHash) {
        return false;
      }
      this.rows = parsed.data.rows;
      this.index = TfIdfIndex.fromSnapshot(parsed.data, this.stopWords);
      return this.rows.length > 0;
    } catch (error) {
      console.warn(`[KnowledgeBase] Ignoring unreadable cache ${this.cachePath}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  private saveCache(): void {
    if (!this.index) {
      return;
    }
    const cache: IndexCache = { csvHash: this.csvHash, rows: this.rows, ...this.index.snapshot() };
    try {
      writeFileSync(this.cachePath, JSON.stringify(cache), 'utf-8');
    } catch (error) {
      console.warn(`[KnowledgeBase] Failed to write cache ${this.cachePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  isReady(): boolean {
    return this.index !== null && this.rows.length > 0;
  }

  get size(): number {
    return this.rows.length;
  }

  async search(query: string, topK: number, keywordBoosts: readonly string[]): Promise<KnowledgeMatch[]> {
    if (!this.index || this.rows.length === 0) {
      return [];
    }

    const scores = this.index.scores(query);
    const keywords = keywordBoosts.map(keyword => keyword.toLowerCase()).filter(keyword => keyword !== '');
    if (keywords.length > 0) {
      this.rows.forEach((row, i) => {
        const haystack = [row.customerIssue, row.techResponse, row.issueCategory].join(' ').toLowerCase();
        if (keywords.some(keyword => haystack.includes(keyword))) {
          scores[i] += KEYWORD_BOOST;
        }
      });
    }

    // Array.prototype.sort is stable, so equal scores keep corpus order
    return scores
      .map((score, i) => ({ score, i }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK))
      .map(({ score, i }) => {
        const row = this.rows[i];
        return {
          score,
          id: row.conversationId,
          issueText: row.customerIssue,
          responseText: row.techResponse,
          category: row.issueCategory,
          status: row.issueStatus,
          resolutionTime: row.resolutionTime
        };
      });
  }
}
