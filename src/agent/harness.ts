/**
 * Harness wiring: builds the reasoner, evidence registry, selection policy,
 * event bus and logger an investigation runs with, all from one config.
 */

import type { RootcauseConfig } from '../core/config.js';
import { createLlmClient, type LlmClient } from '../core/llm.js';
import { Logger } from '../core/logger.js';
import { InvestigationConfigError } from './errors.js';
import { InvestigationEventBus } from './events/bus.js';
import { createInvestigator } from './orchestrator/orchestrator.js';
import type { InvestigationContext } from './orchestrator/types.js';
import { HeuristicReasoner } from './reasoner/heuristic.js';
import { LlmReasoner } from './reasoner/llm-reasoner.js';
import type { Reasoner } from './reasoner/types.js';
import { createSelectionPolicy } from './selection/index.js';
import { registerEvidenceTools } from './tools/adapters/evidence-tools.js';
import { DEFAULT_FIXTURES_PATH, loadEvidenceFixtures, type EvidenceFixtures } from './tools/fixtures.js';
import { createToolRegistry, type AgentToolRegistry } from './tools/registry.js';

export interface HarnessOverrides {
  reasoner?: Reasoner;
  /** Explicit client; null forces the offline heuristic reasoner */
  llm?: LlmClient | null;
  fixtures?: EvidenceFixtures;
  registry?: AgentToolRegistry;
  events?: InvestigationEventBus;
  logger?: Logger;
}

export interface Harness {
  context: InvestigationContext;
  registry: AgentToolRegistry;
  events: InvestigationEventBus;
  logger: Logger;
  reasoner: Reasoner;
  iterationLimit: number;
  investigator: ReturnType<typeof createInvestigator>;
}

function loadFixtures(config: RootcauseConfig): EvidenceFixtures {
  const path = config.evidence.fixturesPath ?? DEFAULT_FIXTURES_PATH;
  try {
    return loadEvidenceFixtures(path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvestigationConfigError(`Cannot load evidence fixtures from ${path}: ${message}`);
  }
}

function buildReasoner(config: RootcauseConfig, overrides: HarnessOverrides, logger: Logger): Reasoner {
  if (overrides.reasoner) {
    return overrides.reasoner;
  }
  const llm = overrides.llm !== undefined ? overrides.llm : createLlmClient(config, logger);
  if (!llm) {
    return new HeuristicReasoner();
  }
  return new LlmReasoner(llm, {
    temperature: config.agent.temperature,
    maxTokens: config.agent.maxTokens,
    logger,
  });
}

export function buildHarness(config: RootcauseConfig, overrides: HarnessOverrides = {}): Harness {
  const logger = overrides.logger ?? new Logger(config.logging.level);
  const events = overrides.events ?? new InvestigationEventBus(logger);

  let registry = overrides.registry;
  if (!registry) {
    registry = createToolRegistry();
    registerEvidenceTools(registry, overrides.fixtures ?? loadFixtures(config), {
      latencyMs: config.evidence.latencyMs,
    });
  }

  const reasoner = buildReasoner(config, overrides, logger);
  const { investigation } = config;

  const context: InvestigationContext = {
    reasoner,
    toolRegistry: registry,
    selection: createSelectionPolicy(config.selection),
    thresholds: investigation.thresholds,
    stopAt: investigation.stopAt,
    windows: investigation.windows,
    toolTimeoutMs: investigation.toolTimeoutMs,
    events,
    logger,
  };

  return {
    context,
    registry,
    events,
    logger,
    reasoner,
    iterationLimit: investigation.maxIterations,
    investigator: createInvestigator(context),
  };
}
