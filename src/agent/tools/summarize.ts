/**
 * One-line summaries of raw evidence, chosen by result shape.
 */

import { z } from 'zod';

const LogSearchShape = z.object({
  results: z.array(z.unknown()),
  summary: z
    .object({
      total_errors: z.number().optional(),
      error_rate: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough()
    .optional(),
});

const DeploymentShape = z.object({
  recent: z.array(
    z
      .object({
        id: z.string().optional(),
        timestamp: z.string().optional(),
        files_changed: z.array(z.object({ path: z.string() }).passthrough()).optional(),
      })
      .passthrough()
  ),
});

const MetricsShape = z
  .object({
    service: z.string(),
    cpu_percent: z.number().optional(),
    memory_percent: z.number().optional(),
    active_connections: z.number().optional(),
    max_connections: z.number().optional(),
  })
  .passthrough();

const IncidentShape = z.object({
  active: z.array(z.unknown()),
});

function summarizeLogs(data: z.infer<typeof LogSearchShape>): string {
  let summary = `Found ${data.results.length} log entries`;
  if (data.summary) {
    summary += ` | ${data.summary.total_errors ?? 0} errors | Error rate: ${data.summary.error_rate ?? 'N/A'}`;
  }
  return summary;
}

function summarizeDeployments(data: z.infer<typeof DeploymentShape>): string {
  const latest = data.recent[0];
  let summary = `Found deployment ${latest?.id ?? 'N/A'} at ${latest?.timestamp ?? 'N/A'}`;
  const files = latest?.files_changed ?? [];
  if (files.length > 0) {
    summary += ` | Changed: ${files.map((f) => f.path).join(', ')}`;
  }
  return summary;
}

function summarizeMetrics(data: z.infer<typeof MetricsShape>): string {
  const parts = [data.service];
  if (data.cpu_percent !== undefined) parts.push(`CPU: ${data.cpu_percent}%`);
  if (data.memory_percent !== undefined) parts.push(`Mem: ${data.memory_percent}%`);
  if (data.active_connections !== undefined || data.max_connections !== undefined) {
    parts.push(`Connections: ${data.active_connections ?? 0}/${data.max_connections ?? 0}`);
  }
  return parts.join(' | ');
}

function countDataPoints(raw: unknown): number {
  if (Array.isArray(raw)) return raw.length;
  if (raw !== null && typeof raw === 'object') return Object.keys(raw).length;
  return raw === undefined || raw === null ? 0 : 1;
}

/**
 * Normalize a raw tool result into a single human-readable line.
 */
export function summarizeToolResult(raw: unknown): string {
  const logs = LogSearchShape.safeParse(raw);
  if (logs.success) return summarizeLogs(logs.data);

  const deployments = DeploymentShape.safeParse(raw);
  if (deployments.success) return summarizeDeployments(deployments.data);

  const metrics = MetricsShape.safeParse(raw);
  if (metrics.success) return summarizeMetrics(metrics.data);

  const incidents = IncidentShape.safeParse(raw);
  if (incidents.success) return `Found ${incidents.data.active.length} active incident(s)`;

  return `Retrieved ${countDataPoints(raw)} data points`;
}
