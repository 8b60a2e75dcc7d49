import { describe, expect, it } from 'vitest';

import { parseConfig } from '../../src/core/config.js';
import {
  DEFAULT_ROUTES,
  DEFAULT_SCHEDULE,
  DirectedSelectionPolicy,
  ScheduleSelectionPolicy,
  createSelectionPolicy,
} from '../../src/agent/selection/index.js';

describe('ScheduleSelectionPolicy', () => {
  const policy = new ScheduleSelectionPolicy();

  it('selects the stage for the iteration', () => {
    const decision = policy.select({ iteration: 1, nextActions: [] });
    expect(decision).toEqual({
      strategy: 'schedule',
      calls: [
        { tool: 'deployment_history', params: { repo: 'main-service', limit: 5 } },
        { tool: 'infra_metrics', params: { service: 'api-gateway' } },
      ],
      rationale: 'Schedule stage 2 of 3',
    });
  });

  it('reuses the last stage past the end of the schedule', () => {
    const decision = policy.select({ iteration: 7, nextActions: [] });
    expect(decision.calls).toEqual([{ tool: 'infra_metrics', params: { service: 'database' } }]);
    expect(decision.rationale).toBe('Schedule stage 3 of 3');
  });

  it('hands out copies', () => {
    const [first] = policy.select({ iteration: 0, nextActions: [] }).calls;
    if (first) first.params.query = 'mutated';
    expect(policy.select({ iteration: 0, nextActions: [] }).calls[0]?.params.query).toBe(
      'service:api-gateway level:error'
    );
  });

  it('rejects an empty schedule', () => {
    expect(() => new ScheduleSelectionPolicy([])).toThrow('Selection schedule needs at least one stage');
  });

  it('lists every referenced tool once', () => {
    expect(policy.referencedTools()).toEqual([
      'log_search',
      'active_incidents',
      'deployment_history',
      'infra_metrics',
    ]);
  });
});

describe('DirectedSelectionPolicy', () => {
  const policy = new DirectedSelectionPolicy(DEFAULT_ROUTES, new ScheduleSelectionPolicy(DEFAULT_SCHEDULE));

  it('routes actions by keyword at word starts', () => {
    expect(policy.route('Check recent deployments')).toEqual({
      tool: 'deployment_history',
      params: { repo: 'main-service', limit: 5 },
    });
    expect(policy.route('Inspect DB pool saturation')).toEqual({
      tool: 'infra_metrics',
      params: { service: 'database' },
    });
    expect(policy.route('Read the catalog')).toBeUndefined();
  });

  it('collapses duplicate calls', () => {
    const decision = policy.select({
      iteration: 0,
      nextActions: ['Search error logs', 'Look for exceptions', 'Check gateway memory', 'Ask a human'],
    });
    expect(decision).toEqual({
      strategy: 'directed',
      calls: [
        { tool: 'log_search', params: { query: 'service:api-gateway level:error', timeframe: '1h' } },
        { tool: 'infra_metrics', params: { service: 'api-gateway' } },
      ],
      rationale: 'Routed 3 of 4 next action(s)',
    });
  });

  it('falls back to the schedule when nothing matches', () => {
    const decision = policy.select({ iteration: 2, nextActions: ['Ask a human'] });
    expect(decision.strategy).toBe('schedule');
    expect(decision.calls).toEqual([{ tool: 'infra_metrics', params: { service: 'database' } }]);
    expect(decision.rationale).toBe('No next action matched a route; Schedule stage 3 of 3');
  });
});

describe('createSelectionPolicy', () => {
  it('builds the configured strategy', () => {
    expect(createSelectionPolicy(parseConfig({}).selection).name).toBe('schedule');
    const directed = createSelectionPolicy(parseConfig({ selection: { strategy: 'directed' } }).selection);
    expect(directed.name).toBe('directed');
  });

  it('uses a configured schedule', () => {
    const policy = createSelectionPolicy(
      parseConfig({ selection: { schedule: [[{ tool: 'log_search', params: { query: 'x' } }]] } }).selection
    );
    expect(policy.referencedTools()).toEqual(['log_search']);
  });
});
