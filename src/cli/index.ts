#!/usr/bin/env node
import 'dotenv/config';
/**
 * rootcause CLI
 *
 * Command-line interface for running confidence-gated incident investigations.
 */

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig, parseConfig, type RootcauseConfig } from '../core/config.js';
import { buildHarness } from '../agent/harness.js';
import { InvestigationConfigError } from '../agent/errors.js';
import { mergeThresholds } from '../agent/policy/confidence.js';
import { renderEvent, renderPolicy, renderSummary } from './render.js';

interface InvestigateOptions {
  config?: string;
  maxIterations?: string;
  provider?: string;
  stopAt?: string;
  fixtures?: string;
  json?: boolean;
}

/**
 * Apply command-line overrides on top of the loaded config and re-validate.
 */
function applyOverrides(base: RootcauseConfig, options: InvestigateOptions): RootcauseConfig {
  const config = parseConfig({
    ...base,
    agent: { ...base.agent, provider: options.provider ?? base.agent.provider },
    investigation: { ...base.investigation, stopAt: options.stopAt ?? base.investigation.stopAt },
    evidence: { ...base.evidence, fixturesPath: options.fixtures ?? base.evidence.fixturesPath },
  });

  if (options.maxIterations !== undefined) {
    const iterations = Number(options.maxIterations);
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new InvestigationConfigError(
        `--max-iterations must be an integer >= 1 (got ${options.maxIterations})`
      );
    }
    config.investigation.maxIterations = iterations;
  }

  return config;
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

const program = new Command();

program
  .name('rootcause')
  .description('Confidence-gated incident investigation harness')
  .version(VERSION);

// ============================================================================
// Investigate
// ============================================================================

program
  .command('investigate')
  .description('Investigate a problem until confidence crosses a threshold or the budget runs out')
  .argument('<subject...>', 'Description of the problem under investigation')
  .option('-c, --config <path>', 'Config file path')
  .option('-n, --max-iterations <number>', 'Iteration budget')
  .option('--provider <provider>', 'Reasoner provider: anthropic | openai | local | offline')
  .option('--stop-at <status>', 'Lowest status that ends the loop')
  .option('--fixtures <path>', 'Evidence fixtures JSON file')
  .option('--json', 'Print the final result as JSON instead of a live trace')
  .action(async (subjectParts: string[], options: InvestigateOptions) => {
    const subject = subjectParts.join(' ').trim();

    let config: RootcauseConfig;
    try {
      config = applyOverrides(loadConfig(options.config), options);
    } catch (error) {
      console.error(`Invalid configuration: ${describeError(error)}`);
      process.exitCode = 1;
      return;
    }

    try {
      const harness = buildHarness(config);
      if (!options.json) {
        harness.events.subscribe((event) => {
          const line = renderEvent(event);
          if (line !== null) console.log(line);
        });
      }

      const result = await harness.investigator.run(subject, {
        iterationLimit: harness.iterationLimit,
      });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      for (const line of renderSummary(result)) {
        console.log(line);
      }
    } catch (error) {
      if (error instanceof InvestigationConfigError) {
        console.error(`Cannot start investigation: ${error.message}`);
        process.exitCode = 2;
        return;
      }
      throw error;
    }
  });

// ============================================================================
// Policy
// ============================================================================

program
  .command('policy')
  .description('Show which action a confidence score maps to')
  .argument('<confidence>', 'Confidence score (0-100)')
  .option('-c, --config <path>', 'Config file path')
  .action((value: string, options: { config?: string }) => {
    const confidence = Number(value);
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 100) {
      console.error('Confidence must be a number between 0 and 100.');
      process.exitCode = 1;
      return;
    }
    const config = loadConfig(options.config);
    for (const line of renderPolicy(confidence, mergeThresholds(config.investigation.thresholds))) {
      console.log(line);
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
