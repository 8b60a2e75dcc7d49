import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadConfig, parseConfig } from '../../src/core/config.js';

describe('parseConfig', () => {
  beforeEach(() => {
    vi.stubEnv('ROOTCAUSE_LOG_LEVEL', '');
    vi.stubEnv('ROOTCAUSE_MAX_ITERATIONS', '');
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('OPENAI_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills in defaults', () => {
    const config = parseConfig({});
    expect(config.agent.provider).toBe('offline');
    expect(config.investigation).toEqual({
      maxIterations: 5,
      thresholds: { autoExecute: 95, executeReview: 85, requireApproval: 70 },
      stopAt: 'awaiting_approval',
      windows: { thinkFindings: 3, observeToolResults: 4, observeHypotheses: 3 },
      toolTimeoutMs: 30_000,
    });
    expect(config.selection.strategy).toBe('schedule');
    expect(config.logging.level).toBe('warn');
  });

  it('picks the provider from the API keys present', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    expect(parseConfig({}).agent.provider).toBe('openai');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    expect(parseConfig({}).agent.provider).toBe('anthropic');
  });

  it('keeps an explicit provider over detected keys', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    expect(parseConfig({ agent: { provider: 'offline' } }).agent.provider).toBe('offline');
  });

  it('rejects thresholds outside the score range', () => {
    expect(() => parseConfig({ investigation: { thresholds: { autoExecute: 101 } } })).toThrow();
  });

  it('rejects an empty schedule stage', () => {
    expect(() => parseConfig({ selection: { schedule: [[]] } })).toThrow();
  });

  it('applies environment overrides', () => {
    vi.stubEnv('ROOTCAUSE_LOG_LEVEL', 'DEBUG');
    vi.stubEnv('ROOTCAUSE_MAX_ITERATIONS', '8');
    const config = parseConfig({});
    expect(config.logging.level).toBe('debug');
    expect(config.investigation.maxIterations).toBe(8);
  });

  it('ignores an invalid iteration override', () => {
    vi.stubEnv('ROOTCAUSE_MAX_ITERATIONS', 'many');
    expect(parseConfig({}).investigation.maxIterations).toBe(5);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rootcause-config-'));
    vi.stubEnv('ROOTCAUSE_LOG_LEVEL', '');
    vi.stubEnv('ROOTCAUSE_MAX_ITERATIONS', '');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
  });

  it('reads YAML from an explicit path', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(
      path,
      [
        'investigation:',
        '  maxIterations: 3',
        '  stopAt: auto_executing',
        'selection:',
        '  strategy: directed',
        'evidence:',
        '  latencyMs: 25',
      ].join('\n')
    );

    const config = loadConfig(path);
    expect(config.investigation.maxIterations).toBe(3);
    expect(config.investigation.stopAt).toBe('auto_executing');
    expect(config.selection.strategy).toBe('directed');
    expect(config.evidence.latencyMs).toBe(25);
  });

  it('treats an empty file as defaults', () => {
    const path = join(dir, 'empty.yaml');
    writeFileSync(path, '');
    expect(loadConfig(path).investigation.maxIterations).toBe(5);
  });

  it('uses the path from the environment', () => {
    const path = join(dir, 'env.yaml');
    writeFileSync(path, 'agent:\n  provider: local\n');
    vi.stubEnv('ROOTCAUSE_CONFIG_PATH', path);
    expect(loadConfig().agent.provider).toBe('local');
  });
});
