import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

type Provider = 'anthropic' | 'openai' | 'local' | 'offline';

/**
 * Provider used when the config names none: the first hosted provider with an
 * API key in the environment, else offline.
 */
export function detectProvider(): Provider {
  if (process.env.ANTHROPIC_API_KEY) return 'anthropic';
  if (process.env.OPENAI_API_KEY) return 'openai';
  return 'offline';
}

const ThresholdSchema = z.number().min(0).max(100);

const ToolParametersSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const ToolCallSchema = z.object({
  tool: z.string().min(1),
  params: ToolParametersSchema.default({}),
});

const ConfigSchema = z.object({
  agent: z
    .object({
      provider: z.enum(['anthropic', 'openai', 'local', 'offline']).default(detectProvider),
      model: z.string().default('claude-sonnet-4-20250514'),
      openaiModel: z.string().default('gpt-4o'),
      fallbackModel: z.string().optional(),
      apiBaseUrl: z.string().optional(),
      localBaseUrl: z.string().optional(),
      useProxy: z.boolean().default(false),
      proxyBaseUrl: z.string().default('http://localhost:8317'),
      temperature: z.number().min(0).max(2).default(0.2),
      maxTokens: z.number().int().positive().default(1024),
      timeoutMs: z.number().int().nonnegative().default(60_000),
    })
    .default({}),
  investigation: z
    .object({
      maxIterations: z.number().int().min(1).default(5),
      thresholds: z
        .object({
          autoExecute: ThresholdSchema.default(95),
          executeReview: ThresholdSchema.default(85),
          requireApproval: ThresholdSchema.default(70),
        })
        .default({}),
      // Lowest status that ends the loop.
      stopAt: z
        .enum(['awaiting_approval', 'executing_with_review', 'auto_executing'])
        .default('awaiting_approval'),
      windows: z
        .object({
          thinkFindings: z.number().int().nonnegative().default(3),
          observeToolResults: z.number().int().nonnegative().default(4),
          observeHypotheses: z.number().int().nonnegative().default(3),
        })
        .default({}),
      toolTimeoutMs: z.number().int().nonnegative().default(30_000),
    })
    .default({}),
  selection: z
    .object({
      strategy: z.enum(['schedule', 'directed']).default('schedule'),
      schedule: z.array(z.array(ToolCallSchema).min(1)).min(1).optional(),
      routes: z
        .array(
          z.object({
            keywords: z.array(z.string().min(1)).min(1),
            call: ToolCallSchema,
          })
        )
        .optional(),
    })
    .default({}),
  evidence: z
    .object({
      fixturesPath: z.string().optional(),
      latencyMs: z.number().int().nonnegative().default(0),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    })
    .default({}),
});

export type RootcauseConfig = z.infer<typeof ConfigSchema>;
export type ConfiguredToolCall = z.infer<typeof ToolCallSchema>;

/**
 * Parse an already-loaded config object, applying defaults and env overrides.
 */
export function parseConfig(raw: unknown): RootcauseConfig {
  const cfg = ConfigSchema.parse(raw ?? {});

  const envLevel = process.env.ROOTCAUSE_LOG_LEVEL?.toLowerCase();
  if (envLevel === 'debug' || envLevel === 'info' || envLevel === 'warn' || envLevel === 'error') {
    cfg.logging.level = envLevel;
  }

  const envIterations = process.env.ROOTCAUSE_MAX_ITERATIONS;
  if (envIterations) {
    const iterations = Number(envIterations);
    if (Number.isInteger(iterations) && iterations >= 1) {
      cfg.investigation.maxIterations = iterations;
    }
  }

  if (cfg.evidence.fixturesPath) {
    cfg.evidence.fixturesPath = expandHome(cfg.evidence.fixturesPath);
  }

  return cfg;
}

export function loadConfig(configPath?: string): RootcauseConfig {
  const explicit = configPath ?? process.env.ROOTCAUSE_CONFIG_PATH;
  const path = explicit ? expandHome(explicit) : join(homedir(), '.rootcause', 'config.yaml');

  if (!explicit && !existsSync(path)) {
    return parseConfig({});
  }

  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = yaml.parse(raw) ?? {};

  return parseConfig(parsed);
}
