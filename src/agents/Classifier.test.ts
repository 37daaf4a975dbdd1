import { describe, it, expect } from 'vitest';
import { getDefaultCatalog } from '../playbooks/PlaybookCatalog.js';
import { TextGenerator } from '../providers/TextGenerator.js';
import { ScriptedLLMClient, knowledgeMatch } from '../test/fakes.js';
import {
  CHITCHAT_SUMMARY,
  Classifier,
  extractInstallTarget,
  normalizeIssueText,
  sanitizeParameter
} from './Classifier.js';

const catalog = getDefaultCatalog();
const offline = new Classifier(TextGenerator.unavailable(), catalog);

function withReplies(...replies: Array<string | Error>): { classifier: Classifier; client: ScriptedLLMClient } {
  const client = new ScriptedLLMClient(replies);
  return { classifier: new Classifier(new TextGenerator(client), catalog), client };
}

describe('extractInstallTarget', () => {
  it('pulls the application name out of a request', () => {
    expect(extractInstallTarget('Can you install the Zoom app for me?')).toBe('Zoom');
    expect(extractInstallTarget('Please install Visual Studio Code on my laptop')).toBe('Visual Studio Code');
    expect(extractInstallTarget('reinstall Slack please')).toBe('Slack');
    expect(extractInstallTarget('my printer is broken')).toBe('');
  });
});

describe('sanitizeParameter', () => {
  it('drops characters that could break out of a quoted argument', () => {
    expect(sanitizeParameter('Zoom"; Remove-Item C:\\ -Recurse')).toBe('Zoom Remove-Item C -Recurse');
    expect(sanitizeParameter('  Notepad++  ')).toBe('Notepad++');
  });
});

describe('normalizeIssueText', () => {
  it('lowercases and collapses whitespace', () => {
    expect(normalizeIssueText('  My   WiFi\tDrops ')).toBe('my wifi drops');
  });
});

describe('Classifier.classify without generation', () => {
  it('applies the ordered rules', async () => {
    expect(await offline.classify('c drive is full')).toEqual({ issueType: 'disk_space', extractedParam: '', source: 'rules' });
    expect(await offline.classify('hello')).toEqual({ issueType: 'chitchat', extractedParam: '', source: 'rules' });
    expect((await offline.classify('my bluetooth mouse stopped working')).issueType).toBe('bluetooth');
    expect((await offline.classify('WiFi keeps disconnecting')).issueType).toBe('network');
    expect((await offline.classify('what is my ip address')).issueType).toBe('system_info');
  });

  it('extracts the install target', async () => {
    expect(await offline.classify('Can you install the Zoom app for me?')).toEqual({
      issueType: 'install_app',
      extractedParam: 'Zoom',
      source: 'rules'
    });
  });

  it('falls back to general when no rule matches', async () => {
    expect(await offline.classify('the printer smells odd')).toEqual({ issueType: 'general', extractedParam: '', source: 'default' });
  });
});

describe('Classifier.classify with generation', () => {
  it('accepts a category from the closed set', async () => {
    const { classifier, client } = withReplies('{"issue_type":"network","install_app":""}');
    expect(await classifier.classify('internet is weird')).toEqual({ issueType: 'network', extractedParam: '', source: 'generation' });
    expect(client.prompts[0][1].content).toBe('Issue: internet is weird\nReturn JSON with keys: issue_type, install_app (empty if not install).');
  });

  it('reads JSON embedded in prose and keeps the app name', async () => {
    const { classifier } = withReplies('Sure! {"issue_type": "Install_App", "install_app": "Slack"}');
    expect(await classifier.classify('get me slack')).toEqual({ issueType: 'install_app', extractedParam: 'Slack', source: 'generation' });
  });

  it('extracts the app from the text when generation leaves it empty', async () => {
    const { classifier } = withReplies('{"issue_type":"install_app","install_app":""}');
    expect((await classifier.classify('please install zoom')).extractedParam).toBe('zoom');
  });

  it('degrades to general on unusable output', async () => {
    const general = { issueType: 'general', extractedParam: '', source: 'default' };
    expect(await withReplies('It is a network problem').classifier.classify('wifi')).toEqual(general);
    expect(await withReplies('{"issue_type":"printer"}').classifier.classify('printer')).toEqual(general);
    expect(await withReplies(new Error('503 unavailable')).classifier.classify('wifi')).toEqual(general);
  });
});

describe('Classifier.buildPlan', () => {
  it('uses playbook diagnostics without generation', async () => {
    const plan = await offline.planFor('c drive is full');

    expect(plan.issueType).toBe('disk_space');
    expect(plan.isChat).toBe(false);
    expect(plan.steps.map(step => step.description)).toEqual(['Check drive usage', 'Measure the temp folder size']);
    expect(plan.steps[0].command).toBe('Get-PSDrive -PSProvider FileSystem | Format-List Name,Used,Free');
    expect(plan.summary).toBe('Running 2 read-only diagnostic check(s) for disk space.');
  });

  it('renders the install target into the package checks', async () => {
    const plan = await offline.planFor('Can you install the Zoom app for me?');

    expect(plan.steps[0]).toEqual({ description: 'Check that winget is available', command: 'winget --version' });
    expect(plan.steps[1]).toEqual({
      description: 'Search the package catalog',
      command: 'winget search --name "Zoom" --accept-source-agreements',
      preflight: { kind: 'requires-parameter', reason: 'no application name was given' },
      parameter: 'Zoom'
    });
  });

  it('marks a missing install target for the preflight', () => {
    const steps = offline.templatePlan('install_app', '');
    expect(steps[1].command).toBe('winget search --name "" --accept-source-agreements');
    expect(steps[1].parameter).toBe('');
  });

  it('returns no steps for small talk', async () => {
    const plan = await offline.planFor('hello');
    expect(plan).toEqual({ issueType: 'chitchat', extractedParam: '', isChat: true, steps: [], summary: CHITCHAT_SUMMARY });
  });

  it('uses generated steps and passes the SOP hint', async () => {
    const { classifier, client } = withReplies(
      '{"summary":"Adapters will be checked.","commands":[{"description":"List adapters","command":"Get-NetAdapter"},"ipconfig /all",{"description":"No command"}]}'
    );
    const evidence = {
      knowledge: [knowledgeMatch({ id: 'TS-1001', score: 0.5, issueText: 'Wi-Fi drops', responseText: 'Update the driver.' })],
      web: [],
      webQuery: '',
      webError: '',
      webCount: 0
    };

    const plan = await classifier.buildPlan('wifi drops', { issueType: 'network', extractedParam: '', source: 'generation' }, evidence);

    expect(plan.steps).toEqual([
      { description: 'List adapters', command: 'Get-NetAdapter' },
      { description: 'Run diagnostic command.', command: 'ipconfig /all' }
    ]);
    expect(plan.summary).toBe('Adapters will be checked.');
    expect(client.prompts[0][1].content).toContain('SOP: TS-1001: Wi-Fi drops -> Update the driver.\n');
  });

  it('falls back to playbook steps when generation proposes none', async () => {
    const { classifier } = withReplies('{"summary":"Nothing to check.","commands":[]}');
    const plan = await classifier.buildPlan('wifi drops', { issueType: 'network', extractedParam: '', source: 'generation' });
    expect(plan.steps).toHaveLength(4);
    expect(plan.summary).toBe('Running 4 read-only diagnostic check(s) for network.');
  });
});
