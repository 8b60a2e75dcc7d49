/**
 * Evidence Tools Adapter
 *
 * Fixture-backed evidence sources: log search, active incidents, deployment
 * history and infrastructure metrics. Each tool reads from the fixtures object
 * it was built with; nothing is shared between registries.
 */

import { setTimeout as delay } from 'node:timers/promises';

import { z } from 'zod';

import type { EvidenceFixtures } from '../fixtures.js';
import type { AgentToolRegistry } from '../registry.js';
import type { ToolContext, ToolDefinition, ToolResult } from '../types.js';

export interface EvidenceToolOptions {
  /** Simulated latency per call in ms (0 = respond immediately) */
  latencyMs?: number;
  cacheTtlMs?: number;
}

const LogSearchInput = z.object({
  query: z.string().min(1),
  timeframe: z.string().default('1h'),
});

const DeploymentHistoryInput = z.object({
  repo: z.string().default('main-service'),
  limit: z.coerce.number().int().positive().default(5),
});

const InfraMetricsInput = z.object({
  service: z.string().min(1),
});

const ActiveIncidentsInput = z.object({}).passthrough();

async function simulateLatency(ms: number, ctx: ToolContext): Promise<void> {
  if (ms <= 0) return;
  await delay(ms, undefined, { signal: ctx.signal });
}

export function createLogSearchTool(
  fixtures: EvidenceFixtures,
  options: EvidenceToolOptions = {}
): ToolDefinition<z.infer<typeof LogSearchInput>> {
  return {
    name: 'log_search',
    description: 'Search application logs for errors and warnings around the incident window.',
    schema: LogSearchInput,
    execute: async (input, ctx): Promise<ToolResult> => {
      await simulateLatency(options.latencyMs ?? 0, ctx);
      return {
        success: true,
        data: { ...fixtures.logs, query: input.query, timeframe: input.timeframe },
      };
    },
    cacheTtlMs: options.cacheTtlMs ?? 0,
  };
}

export function createActiveIncidentsTool(
  fixtures: EvidenceFixtures,
  options: EvidenceToolOptions = {}
): ToolDefinition<z.infer<typeof ActiveIncidentsInput>> {
  return {
    name: 'active_incidents',
    description: 'List incidents currently open with the paging provider.',
    schema: ActiveIncidentsInput,
    execute: async (_input, ctx): Promise<ToolResult> => {
      await simulateLatency(options.latencyMs ?? 0, ctx);
      return { success: true, data: { active: fixtures.incidents.active } };
    },
    cacheTtlMs: options.cacheTtlMs ?? 0,
  };
}

export function createDeploymentHistoryTool(
  fixtures: EvidenceFixtures,
  options: EvidenceToolOptions = {}
): ToolDefinition<z.infer<typeof DeploymentHistoryInput>> {
  return {
    name: 'deployment_history',
    description: 'Get the most recent deployments, newest first, with the files they changed.',
    schema: DeploymentHistoryInput,
    execute: async (input, ctx): Promise<ToolResult> => {
      await simulateLatency(options.latencyMs ?? 0, ctx);
      return {
        success: true,
        data: { repo: input.repo, recent: fixtures.deployments.recent.slice(0, input.limit) },
      };
    },
    cacheTtlMs: options.cacheTtlMs ?? 0,
  };
}

export function createInfraMetricsTool(
  fixtures: EvidenceFixtures,
  options: EvidenceToolOptions = {}
): ToolDefinition<z.infer<typeof InfraMetricsInput>> {
  return {
    name: 'infra_metrics',
    description: 'Query current resource utilization for one service.',
    schema: InfraMetricsInput,
    execute: async (input, ctx): Promise<ToolResult> => {
      await simulateLatency(options.latencyMs ?? 0, ctx);
      const metrics = Object.hasOwn(fixtures.metrics, input.service)
        ? fixtures.metrics[input.service]
        : undefined;
      if (!metrics) {
        return { success: false, error: `No metrics recorded for service: ${input.service}` };
      }
      return { success: true, data: { service: input.service, ...metrics } };
    },
    cacheTtlMs: options.cacheTtlMs ?? 0,
  };
}

export const EVIDENCE_TOOL_NAMES = [
  'log_search',
  'active_incidents',
  'deployment_history',
  'infra_metrics',
] as const;

/**
 * Register every fixture-backed evidence source into a registry.
 */
export function registerEvidenceTools(
  registry: AgentToolRegistry,
  fixtures: EvidenceFixtures,
  options: EvidenceToolOptions = {}
): void {
  registry.register(createLogSearchTool(fixtures, options));
  registry.register(createActiveIncidentsTool(fixtures, options));
  registry.register(createDeploymentHistoryTool(fixtures, options));
  registry.register(createInfraMetricsTool(fixtures, options));
}
