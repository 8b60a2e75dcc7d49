/**
 * Evidence fixtures: the recorded monitoring data behind the built-in
 * evidence sources. Loaded once and passed to the tools at construction.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const LogEntrySchema = z
  .object({
    timestamp: z.string(),
    level: z.string(),
    message: z.string(),
    service: z.string(),
  })
  .passthrough();

const DeploymentSchema = z
  .object({
    id: z.string(),
    timestamp: z.string(),
    environment: z.string().default('production'),
    status: z.string().default('success'),
    files_changed: z
      .array(z.object({ path: z.string(), changes: z.string().optional() }))
      .default([]),
  })
  .passthrough();

const IncidentSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    severity: z.string(),
    created_at: z.string(),
    status: z.string(),
  })
  .passthrough();

export const EvidenceFixturesSchema = z.object({
  logs: z.object({
    query: z.string(),
    results: z.array(LogEntrySchema),
    summary: z
      .object({
        total_errors: z.number().int().nonnegative(),
        error_rate: z.string(),
      })
      .passthrough(),
  }),
  deployments: z.object({
    recent: z.array(DeploymentSchema),
  }),
  metrics: z.record(z.string(), z.record(z.string(), z.number())),
  incidents: z.object({
    active: z.array(IncidentSchema),
  }),
});

export type EvidenceFixtures = z.infer<typeof EvidenceFixturesSchema>;

export const DEFAULT_FIXTURES_PATH = fileURLToPath(
  new URL('../../../fixtures/gateway-incident.json', import.meta.url)
);

export function parseEvidenceFixtures(raw: unknown): EvidenceFixtures {
  const parsed = EvidenceFixturesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid evidence fixtures: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadEvidenceFixtures(path: string = DEFAULT_FIXTURES_PATH): EvidenceFixtures {
  const text = readFileSync(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse evidence fixtures at ${path}: ${message}`);
  }
  return parseEvidenceFixtures(raw);
}
