import { describe, it, expect } from 'vitest';
import { PipelineCancelledError } from '../core/errors.js';
import { CommandRunner } from '../execution/CommandRunner.js';
import { getDefaultCatalog } from '../playbooks/PlaybookCatalog.js';
import { CommandFilter } from '../policy/CommandFilter.js';
import { TextGenerator } from '../providers/TextGenerator.js';
import { ScriptedShell, StaticKnowledgeBase, StaticWebSearch, knowledgeMatch } from '../test/fakes.js';
import { ActionRunner } from './ActionRunner.js';
import { CHITCHAT_SUMMARY, Classifier } from './Classifier.js';
import { DiagnosisAgent } from './DiagnosisAgent.js';
import { EvidenceAggregator } from './EvidenceAggregator.js';
import { Summarizer } from './Summarizer.js';

function agent(shell: ScriptedShell, knowledge = new StaticKnowledgeBase(), web = new StaticWebSearch()): DiagnosisAgent {
  const generator = TextGenerator.unavailable();
  const catalog = getDefaultCatalog();
  return new DiagnosisAgent(
    new Classifier(generator, catalog),
    new EvidenceAggregator(knowledge, web),
    new ActionRunner(new CommandRunner(new CommandFilter(['format *']), shell)),
    new Summarizer(generator, catalog)
  );
}

describe('DiagnosisAgent', () => {
  it('prepares a plan without running any command', async () => {
    const shell = new ScriptedShell();
    const knowledge = new StaticKnowledgeBase([
      knowledgeMatch({ id: 'TS-1009', score: 0.45, issueText: 'C drive is almost full', responseText: 'Run Disk Cleanup.' })
    ]);

    const prepared = await agent(shell, knowledge).prepare('c drive is full');

    expect(prepared.classification.issueType).toBe('disk_space');
    expect(prepared.plan.steps).toHaveLength(2);
    expect(prepared.sopUsed).toBe('TS-1009: C drive is almost full -> Run Disk Cleanup.');
    expect(shell.calls).toEqual([]);
  });

  it('diagnoses a full drive into a frozen result', async () => {
    const shell = new ScriptedShell().on('Get-PSDrive', { stdout: 'Name : C\nUsed : 107374182400\nFree : 1073741824' });

    const result = await agent(shell).diagnose('c drive is full', 3);

    expect(result.issueType).toBe('disk_space');
    expect(result.actionPlan).toEqual(['1. Check drive usage [ALLOWED]', '2. Measure the temp folder size [ALLOWED]']);
    expect(result.commandResults).toHaveLength(2);
    expect(result.blockedCommands).toEqual([]);
    expect(result.findings).toBe('Drive usage and temporary files were measured.');
    expect(result.evidence.webQuery).toBe('c drive is full Windows 11 troubleshooting steps');
    expect(result.fixStage).toBe(3);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.commandResults)).toBe(true);
  });

  it('answers small talk without diagnostics', async () => {
    const shell = new ScriptedShell();
    const web = new StaticWebSearch();

    const result = await agent(shell, undefined, web).diagnose('hello');

    expect(result.isChat).toBe(true);
    expect(result.findings).toBe(CHITCHAT_SUMMARY);
    expect(result.actionPlan).toEqual([]);
    expect(shell.calls).toEqual([]);
    expect(web.queries).toEqual([]);
  });

  it('honours cancellation before classification', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(agent(new ScriptedShell()).diagnose('c drive is full', 1, controller.signal)).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
  });
});
