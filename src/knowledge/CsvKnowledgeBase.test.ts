import { describe, it, expect } from 'vitest';
import { appendFileSync, existsSync, mkdtempSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { PROJECT_ROOT } from '../core/config.js';
import { CsvKnowledgeBase, loadStopWords } from './CsvKnowledgeBase.js';
import { KEYWORD_BOOST } from './types.js';

const HEADER = 'Conversation_ID,Customer_Issue,Tech_Response,Issue_Category,Issue_Status,Resolution_Time\n';
const CORPUS =
  HEADER +
  'K-1,"Printer offline","Restart the spooler",Printer,Resolved,5 minutes\n' +
  'K-2,"Wifi offline","Restart the router",Network,Resolved,10 minutes\n' +
  'K-3,"Screen flickers","Update the display driver",Display,Open,1 hour\n';

function writeCorpus(): { dir: string; csvPath: string; cachePath: string; stopWordsPath: string } {
  const dir = mkdtempSync(join(tmpdir(), 'support-pilot-kb-'));
  const csvPath = join(dir, 'tickets.csv');
  writeFileSync(csvPath, CORPUS);
  return { dir, csvPath, cachePath: join(dir, 'tickets.index.json'), stopWordsPath: join(dir, 'no-stopwords.txt') };
}

describe('CsvKnowledgeBase', () => {
  it('ranks tickets by similarity and maps the ticket columns', async () => {
    const kb = new CsvKnowledgeBase(writeCorpus());

    const matches = await kb.search('printer offline', 2, []);

    expect(matches.map(match => match.id)).toEqual(['K-1', 'K-2']);
    expect(matches[0]).toEqual({
      score: expect.any(Number),
      id: 'K-1',
      issueText: 'Printer offline',
      responseText: 'Restart the spooler',
      category: 'Printer',
      status: 'Resolved',
      resolutionTime: '5 minutes'
    });
  });

  it('adds the keyword boost to tickets that mention a keyword', async () => {
    const kb = new CsvKnowledgeBase(writeCorpus());

    const matches = await kb.search('screen', 3, ['ROUTER']);

    expect(matches.map(match => match.id)).toEqual(['K-3', 'K-2', 'K-1']);
    expect(matches[1].score).toBeCloseTo(KEYWORD_BOOST, 10);
    expect(matches[2].score).toBe(0);
  });

  it('keeps corpus order for tied scores', async () => {
    const kb = new CsvKnowledgeBase(writeCorpus());
    const matches = await kb.search('zebra', 3, []);
    expect(matches.map(match => match.id)).toEqual(['K-1', 'K-2', 'K-3']);
  });

  it('caches the index and rejects a stale cache when required', async () => {
    const paths = writeCorpus();
    const built = new CsvKnowledgeBase(paths);
    expect(built.isReady()).toBe(true);
    expect(existsSync(paths.cachePath)).toBe(true);

    const cached = new CsvKnowledgeBase({ ...paths, requireCache: true });
    expect(cached.isReady()).toBe(true);
    expect(cached.size).toBe(3);

    appendFileSync(paths.csvPath, 'K-4,"Mouse lags","Replace the battery",Hardware,Resolved,5 minutes\n');
    const stale = new CsvKnowledgeBase({ ...paths, requireCache: true });
    expect(stale.isReady()).toBe(false);
    expect(await stale.search('mouse', 3, [])).toEqual([]);

    expect(stale.build()).toBe(4);
    expect(stale.isReady()).toBe(true);
    expect((await stale.search('mouse lags', 1, []))[0].id).toBe('K-4');
  });

  it('is not ready when the corpus is missing', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'support-pilot-kb-'));
    const kb = new CsvKnowledgeBase({ csvPath: join(dir, 'missing.csv') });
    expect(kb.isReady()).toBe(false);
    expect(kb.build()).toBe(0);
    expect(await kb.search('printer', 5, [])).toEqual([]);
  });

  it('finds the storage ticket in the bundled corpus', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'support-pilot-kb-'));
    const kb = new CsvKnowledgeBase({
      csvPath: join(PROJECT_ROOT, 'data', 'knowledge', 'tech_support_tickets.csv'),
      cachePath: join(dir, 'tickets.index.json')
    });

    const [top] = await kb.search('my c drive is full', 1, []);
    expect(top.id).toBe('TS-1009');
    expect(top.category).toBe('Storage');
  });
});

describe('loadStopWords', () => {
  it('reads one lowercase word per line and tolerates a missing file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'support-pilot-stop-'));
    const path = join(dir, 'stop.txt');
    writeFileSync(path, 'The\r\nand\n\n');
    expect([...loadStopWords(path)]).toEqual(['the', 'and']);
    expect(loadStopWords(join(dir, 'missing.txt')).size).toBe(0);
  });
});
