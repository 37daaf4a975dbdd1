import { describe, it, expect } from 'vitest';
import { StaticKnowledgeBase, StaticWebSearch, knowledgeMatch } from '../test/fakes.js';
import { EvidenceAggregator, keywordsFor, selectSop, webQueryFor } from './EvidenceAggregator.js';

const hit = { title: 'Fix Wi-Fi drops', snippet: 'Update the driver.', url: 'https://support.example.com/wifi' };

describe('keywordsFor', () => {
  it('maps trigger words to boost keywords in a fixed order', () => {
    expect(keywordsFor('My WiFi and Bluetooth are slow')).toEqual(['wi-fi', 'bluetooth', 'performance']);
    expect(keywordsFor('BSOD after update')).toEqual(['blue screen']);
    expect(keywordsFor('hello')).toEqual([]);
  });
});

describe('selectSop', () => {
  it('uses the top match only when it clears the threshold', () => {
    expect(selectSop([knowledgeMatch({ score: 0.19 })])).toBe('');
    expect(selectSop([knowledgeMatch({ id: 'TS-1009', score: 0.2, issueText: 'C drive is almost full', responseText: 'Run Disk Cleanup.' })]))
      .toBe('TS-1009: C drive is almost full -> Run Disk Cleanup.');
    expect(selectSop([])).toBe('');
  });
});

describe('EvidenceAggregator', () => {
  it('looks up knowledge and the web for a troubleshooting issue', async () => {
    const knowledge = new StaticKnowledgeBase([knowledgeMatch({ id: 'TS-1001' })]);
    const web = new StaticWebSearch([hit]);
    const aggregator = new EvidenceAggregator(knowledge, web);

    const evidence = await aggregator.fetch('wifi drops', 'network');

    expect(evidence).toEqual({
      knowledge: [knowledgeMatch({ id: 'TS-1001' })],
      web: [hit],
      webQuery: 'wifi drops Windows 11 troubleshooting steps',
      webError: '',
      webCount: 1
    });
    expect(knowledge.queries).toEqual([{ query: 'wifi drops', topK: 5, keywordBoosts: ['wi-fi'] }]);
    expect(web.queries).toEqual([webQueryFor('wifi drops')]);
  });

  it('skips the web for small talk and system information', async () => {
    const web = new StaticWebSearch([hit]);
    const aggregator = new EvidenceAggregator(null, web);

    const chat = await aggregator.fetch('hello', 'chitchat');
    const info = await aggregator.fetch('what is my ip address', 'system_info');

    expect(web.queries).toEqual([]);
    expect(chat.webQuery).toBe('');
    expect(info).toEqual({ knowledge: [], web: [], webQuery: '', webError: '', webCount: 0 });
  });

  it('searches the web for system information when configured to', async () => {
    const web = new StaticWebSearch([hit]);
    const aggregator = new EvidenceAggregator(null, web, { skipWebForSystemInfo: false, maxWebResults: 1 });

    const evidence = await aggregator.fetch('what is my ip address', 'system_info');

    expect(evidence.web).toEqual([hit]);
    expect(web.queries).toHaveLength(1);
  });

  it('degrades to empty evidence when collaborators are missing or failing', async () => {
    const notReady = new StaticKnowledgeBase([knowledgeMatch()], false);
    const failing = new StaticWebSearch([], 'web search failed');

    const degraded = await new EvidenceAggregator(notReady, failing).fetch('printer offline', 'general');
    expect(degraded.knowledge).toEqual([]);
    expect(notReady.queries).toEqual([]);
    expect(degraded.webError).toBe('web search failed');

    const missing = await new EvidenceAggregator(null, null).fetch('printer offline', 'general');
    expect(missing.webError).toBe('web search unavailable');
    expect(missing.webCount).toBe(0);
  });

  it('contains a collaborator that throws', async () => {
    const throwing = new StaticKnowledgeBase();
    throwing.search = async () => {
      throw new Error('index corrupted');
    };

    const evidence = await new EvidenceAggregator(throwing, null).fetch('printer offline', 'general');
    expect(evidence.knowledge).toEqual([]);
  });
});
