import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { PROJECT_ROOT } from '../core/config.js';
import { PipelineCancelledError } from '../core/errors.js';
import type { EscalationStage } from '../core/types.js';
import { getDefaultCatalog } from '../playbooks/PlaybookCatalog.js';
import { CommandFilter } from '../policy/CommandFilter.js';
import { TextGenerator } from '../providers/TextGenerator.js';
import { MemoryTranscript, ScriptedLLMClient, ScriptedShell } from '../test/fakes.js';
import { assemblePipeline } from './createPipeline.js';

const ADAPTERS =
  'Name                 : Wi-Fi\nInterfaceDescription : Intel(R) Wi-Fi 6 AX201\nStatus               : Disconnected\nPnPDeviceID          : PCI\\VEN_8086&DEV_A0F0\\3&11583659&0&A3';

function pipeline(shell: ScriptedShell, generator: TextGenerator = TextGenerator.unavailable()) {
  const transcript = new MemoryTranscript();
  const parts = assemblePipeline({
    filter: CommandFilter.fromFile(join(PROJECT_ROOT, 'data', 'denylist.json')),
    shell,
    generator,
    catalog: getDefaultCatalog(),
    knowledge: null,
    web: null,
    transcript
  });
  return { ...parts, transcript };
}

function brokenNetwork(): ScriptedShell {
  return new ScriptedShell()
    .on('Get-NetAdapter', { stdout: ADAPTERS })
    .on('Test-NetConnection', { stdout: 'False' });
}

describe('PipelineController.run', () => {
  it('proposes the disk cleanup and waits for confirmation', async () => {
    const shell = new ScriptedShell();
    const { controller } = pipeline(shell);

    const outcome = await controller.run('c drive is full');

    expect(outcome.status).toBe('awaiting_confirmation');
    expect(outcome.diagnosis.actionPlan).toEqual(['1. Check drive usage [ALLOWED]', '2. Measure the temp folder size [ALLOWED]']);
    expect(outcome.plan.commands).toEqual([
      'Remove-Item -Path "$env:TEMP\\*" -Recurse -Force -ErrorAction SilentlyContinue',
      'Clear-RecycleBin -Force -ErrorAction SilentlyContinue'
    ]);
    expect(outcome.message).toBe('Temporary files will be removed and the Recycle Bin will be emptied. Apply the proposed fix?');
    expect(outcome.attempts).toEqual([]);
    expect(shell.calls).toHaveLength(2);
  });

  it('resolves a full drive when the fix is applied cleanly', async () => {
    const { controller } = pipeline(new ScriptedShell());

    const outcome = await controller.run('c drive is full', { autoFix: true });

    expect(outcome.status).toBe('resolved');
    expect(outcome.state.stage).toBe(1);
    expect(outcome.message).toBe('Issue resolved at stage 1. Verification skipped; please confirm the issue is resolved.');
  });

  it('asks for a manual retry when a fix command failed but verification passed', async () => {
    const shell = new ScriptedShell().on('Clear-RecycleBin', { stderr: 'The system cannot find the path specified.', exitCode: 1 });
    const { controller } = pipeline(shell);

    const outcome = await controller.run('c drive is full', { autoFix: true });

    expect(outcome.status).toBe('manual_retry');
    expect(outcome.failedCommands).toEqual(['Clear-RecycleBin -Force -ErrorAction SilentlyContinue']);
    expect(outcome.attempts).toHaveLength(1);
  });

  it('escalates a network fix through all four stages, then stops', async () => {
    const { controller } = pipeline(brokenNetwork());
    const phases: string[] = [];
    const confirmedStages: EscalationStage[] = [];

    const outcome = await controller.run('My wifi keeps disconnecting', {
      autoFix: true,
      confirm: (_plan, state) => {
        confirmedStages.push(state.stage);
        return true;
      },
      onPhase: message => phases.push(message)
    });

    expect(outcome.status).toBe('escalation_required');
    expect(outcome.state.stage).toBe(4);
    expect(confirmedStages).toEqual([1, 2, 3, 4]);
    expect(outcome.attempts.map(attempt => attempt.stage)).toEqual([1, 2, 3, 4]);
    expect(outcome.attempts.map(attempt => attempt.decision.kind)).toEqual(['advance', 'advance', 'advance', 'exhausted']);
    expect(outcome.attempts[1].plan.commands).toEqual([
      'Disable-NetAdapter -Name "Wi-Fi" -Confirm:$false',
      'Enable-NetAdapter -Name "Wi-Fi" -Confirm:$false',
      'ipconfig /release',
      'ipconfig /renew'
    ]);
    expect(outcome.attempts[3].plan.commands).toEqual([
      'pnputil /remove-device "PCI\\VEN_8086&DEV_A0F0\\3&11583659&0&A3"',
      'pnputil /scan-devices'
    ]);
    expect(outcome.message).toBe(
      'All 4 remediation stages were tried without success. Escalate to a technician. Verification failed: Internet connectivity (False)'
    );
    expect(phases.slice(0, 3)).toEqual(['Diagnosing (stage 1)', 'Applying fix (stage 1)', 'Diagnosing (stage 2)']);
  });

  it('moves past stages whose fix needs a Bluetooth radio that never enumerated', async () => {
    const shell = new ScriptedShell().on('(Get-Service -Name bthserv).Status', { stdout: 'Stopped' });
    const { controller } = pipeline(shell);
    const confirmedStages: EscalationStage[] = [];

    const outcome = await controller.run('my bluetooth is not working', {
      autoFix: true,
      confirm: (_plan, state) => {
        confirmedStages.push(state.stage);
        return true;
      }
    });

    expect(outcome.diagnosis.actionPlan[1]).toBe('2. List Bluetooth devices [SKIPPED (no Bluetooth device is enumerable)]');
    expect(confirmedStages).toEqual([1, 3, 4]);
    expect(outcome.attempts.map(attempt => attempt.decision.kind)).toEqual(['advance', 'advance', 'exhausted']);
    expect(outcome.attempts[1].plan.commands).toEqual(['Stop-Service -Name bthserv -Force', 'Start-Service -Name bthserv']);
    expect(outcome.status).toBe('escalation_required');
    expect(outcome.state.stage).toBe(4);
    expect(outcome.message).toBe(
      'All 4 remediation stages were tried without success. Escalate to a technician. ' +
        'Verification failed: Bluetooth service status (Stopped); Bluetooth adapter status (no output)'
    );
  });

  it('starts a new issue at stage 1 after a previous issue exhausted the ladder', async () => {
    const { controller } = pipeline(brokenNetwork());

    const first = await controller.run('My wifi keeps disconnecting', { autoFix: true });
    expect(first.state.stage).toBe(4);

    const second = await controller.run('c drive is full', { autoFix: true });
    expect(second.attempts[0].stage).toBe(1);
    expect(second.plan.stage).toBe(1);
    expect(controller.startIssue('anything').stage).toBe(1);
  });

  it('stops when the fix is declined', async () => {
    const shell = new ScriptedShell();
    const { controller } = pipeline(shell);

    const outcome = await controller.run('c drive is full', { autoFix: true, confirm: async () => false });

    expect(outcome.status).toBe('declined');
    expect(outcome.message).toBe('The proposed fix was not applied.');
    expect(shell.calls.some(command => command.startsWith('Clear-RecycleBin'))).toBe(false);
  });

  it('answers informational questions without proposing commands', async () => {
    const shell = new ScriptedShell().on('Get-NetIPAddress', {
      stdout: 'IPAddress      : 192.168.1.20\nInterfaceAlias : Wi-Fi\n\nIPAddress      : 127.0.0.1\nInterfaceAlias : Loopback Pseudo-Interface 1'
    });
    const { controller } = pipeline(shell);

    const outcome = await controller.run('what is my ip address', { autoFix: true });

    expect(outcome.status).toBe('answered');
    expect(outcome.message).toBe('192.168.1.20');
  });

  it('answers free disk space from drive usage', async () => {
    const shell = new ScriptedShell().on('Get-PSDrive', { stdout: 'Name : C\nUsed : 107374182400\nFree : 21474836480' });
    const { controller } = pipeline(shell);

    const outcome = await controller.run('How much free disk space do I have?', { autoFix: true });

    expect(outcome.diagnosis.issueType).toBe('system_info');
    expect(outcome.status).toBe('answered');
    expect(outcome.message).toBe('Disk C: Used 100.0 GB, Free 20.0 GB');
  });

  it('answers small talk', async () => {
    const { controller } = pipeline(new ScriptedShell());
    const outcome = await controller.run('hello');
    expect(outcome.status).toBe('answered');
    expect(outcome.message).toBe('Hi! How can I help you with your Windows issue today?');
  });

  it('logs a generated destructive step as blocked and never runs it', async () => {
    const client = new ScriptedLLMClient([
      '{"issue_type":"disk_space","install_app":""}',
      '{"summary":"The drive will be checked.","commands":[' +
        '{"description":"Format the system drive","command":"format C: /fs:ntfs /q"},' +
        '{"description":"Check drive usage","command":"Get-PSDrive -PSProvider FileSystem"}]}',
      'Drive C was checked.',
      'no fix today'
    ]);
    const shell = new ScriptedShell();
    const { controller, transcript } = pipeline(shell, new TextGenerator(client));

    const outcome = await controller.run('c drive is full');

    expect(outcome.diagnosis.actionPlan).toEqual([
      '1. Format the system drive [BLOCKED (Command blocked by denylist.)]',
      '2. Check drive usage [ALLOWED]'
    ]);
    expect(outcome.diagnosis.commandResults[0]).toEqual({
      command: 'format C: /fs:ntfs /q',
      allowed: false,
      output: '',
      error: 'Command blocked by denylist.',
      returnCode: null
    });
    expect(outcome.diagnosis.blockedCommands).toEqual(['format C: /fs:ntfs /q']);
    expect(outcome.diagnosis.findings).toBe('Drive C was checked.');
    expect(shell.calls).toEqual(['Get-PSDrive -PSProvider FileSystem']);
    expect(transcript.commands.map(entry => entry.allowed)).toEqual([false, true]);
    expect(outcome.plan.commands).toHaveLength(2);
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const { controller: pipelineController } = pipeline(new ScriptedShell());

    await expect(pipelineController.run('c drive is full', { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
  });
});

describe('PipelineController manual operations', () => {
  it('retries at the same stage', async () => {
    const { controller } = pipeline(brokenNetwork());
    const state = { ...controller.startIssue('My wifi keeps disconnecting'), stage: 3 as const };

    const { state: after, plan } = await controller.retry(state);

    expect(after).toEqual({ stage: 3, issueText: 'My wifi keeps disconnecting', retryInProgress: false });
    expect(plan.stage).toBe(3);
    expect(plan.commands[0]).toBe('Restart-NetAdapter -Name "Wi-Fi" -Confirm:$false');
  });

  it('applies a fix manually without moving the stage', async () => {
    const { controller } = pipeline(brokenNetwork());
    const state = controller.startIssue('My wifi keeps disconnecting');
    const { plan } = await controller.cycle(state);

    const attempt = await controller.applyManually(state, plan);

    expect(attempt.state.stage).toBe(1);
    expect(attempt.execution.verified).toBe(false);
    expect(attempt.failedCommands).toEqual([]);
  });
});
