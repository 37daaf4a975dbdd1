/**
 * Pipeline wiring
 *
 * Builds every component from a SupportPilotConfig. Policy, knowledge index
 * and configuration are read once here and shared read-only by every run.
 */

import type { SupportPilotConfig } from '../core/config.js';
import { ActionRunner } from '../agents/ActionRunner.js';
import { Classifier } from '../agents/Classifier.js';
import { DiagnosisAgent } from '../agents/DiagnosisAgent.js';
import { EvidenceAggregator } from '../agents/EvidenceAggregator.js';
import { ExecutorAgent } from '../agents/ExecutorAgent.js';
import { FixPlanner } from '../agents/FixPlanner.js';
import { Gatekeeper } from '../agents/Gatekeeper.js';
import { Summarizer } from '../agents/Summarizer.js';
import { CommandRunner } from '../execution/CommandRunner.js';
import { SessionTranscript, type TranscriptSink } from '../execution/SessionTranscript.js';
import { NodeShellExecutor, type ShellExecutor } from '../execution/ShellExecutor.js';
import { CsvKnowledgeBase } from '../knowledge/CsvKnowledgeBase.js';
import type { KnowledgeSearch } from '../knowledge/types.js';
import { PlaybookCatalog, getDefaultCatalog } from '../playbooks/PlaybookCatalog.js';
import { CommandFilter } from '../policy/CommandFilter.js';
import { ProviderFactory } from '../providers/ProviderFactory.js';
import { TextGenerator } from '../providers/TextGenerator.js';
import { DuckDuckGoSearch } from '../research/DuckDuckGoSearch.js';
import type { WebSearchProvider } from '../research/types.js';
import { PipelineController } from './PipelineController.js';

export interface PipelineComponents {
  filter: CommandFilter;
  runner: CommandRunner;
  generator: TextGenerator;
  catalog: PlaybookCatalog;
  knowledge: KnowledgeSearch | null;
  web: WebSearchProvider | null;
  diagnosis: DiagnosisAgent;
  planner: FixPlanner;
  executor: ExecutorAgent;
  controller: PipelineController;
}

/**
 * Collaborators that tests and embedders may swap for their own
 */
export interface PipelineOverrides {
  filter?: CommandFilter;
  shell?: ShellExecutor;
  generator?: TextGenerator;
  catalog?: PlaybookCatalog;
  knowledge?: KnowledgeSearch | null;
  web?: WebSearchProvider | null;
  transcript?: TranscriptSink;
  commandTimeoutMs?: number;
  skipWebForSystemInfo?: boolean;
}

/**
 * Assemble the agents around already-built collaborators
 */
export function assemblePipeline(
  parts: Required<Pick<PipelineOverrides, 'filter' | 'shell' | 'generator' | 'catalog'>> & PipelineOverrides
): PipelineComponents {
  const { filter, shell, generator, catalog } = parts;
  const knowledge = parts.knowledge ?? null;
  const web = parts.web ?? null;

  const runner = new CommandRunner(filter, shell, {
    timeoutMs: parts.commandTimeoutMs,
    transcript: parts.transcript
  });
  const gatekeeper = new Gatekeeper(generator);
  const diagnosis = new DiagnosisAgent(
    new Classifier(generator, catalog),
    new EvidenceAggregator(knowledge, web, { skipWebForSystemInfo: parts.skipWebForSystemInfo }),
    new ActionRunner(runner),
    new Summarizer(generator, catalog)
  );
  const planner = new FixPlanner(generator, catalog, gatekeeper);
  const executor = new ExecutorAgent(runner, catalog);

  return {
    filter,
    runner,
    generator,
    catalog,
    knowledge,
    web,
    diagnosis,
    planner,
    executor,
    controller: new PipelineController(diagnosis, planner, executor)
  };
}

export function createPipeline(config: SupportPilotConfig, overrides: PipelineOverrides = {}): PipelineComponents {
  const transcript = overrides.transcript ?? new SessionTranscript(config.logDir);
  const filter = overrides.filter ?? CommandFilter.fromFile(config.policyPath);
  if (filter.getPolicy().patterns.length === 0) {
    console.warn('[Pipeline] Deny-list is empty: every command the planner proposes may run');
  }

  const generator = overrides.generator ?? new TextGenerator(ProviderFactory.createClient(config.llm), transcript);

  return assemblePipeline({
    filter,
    shell: overrides.shell ?? new NodeShellExecutor(config.command.shell),
    generator,
    catalog: overrides.catalog ?? getDefaultCatalog(),
    knowledge: overrides.knowledge !== undefined
      ? overrides.knowledge
      : new CsvKnowledgeBase({
          csvPath: config.knowledge.csvPath,
          cachePath: config.knowledge.cachePath,
          requireCache: config.knowledge.requireCache
        }),
    web: overrides.web !== undefined
      ? overrides.web
      : new DuckDuckGoSearch({ enabled: config.webSearch.enabled, timeoutMs: config.webSearch.timeoutMs }),
    transcript,
    commandTimeoutMs: overrides.commandTimeoutMs ?? config.command.timeoutMs,
    skipWebForSystemInfo: overrides.skipWebForSystemInfo ?? config.webSearch.skipForSystemInfo
  });
}
