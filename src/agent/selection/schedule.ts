/**
 * Schedule Selection
 *
 * Iteration-indexed lookup table. Iterations past the end of the table reuse
 * the last stage.
 */

import type { ToolCall } from '../tools/types.js';
import type { SelectionContext, SelectionDecision, SelectionPolicy } from './types.js';

export type SelectionSchedule = ReadonlyArray<ReadonlyArray<ToolCall>>;

export const DEFAULT_SCHEDULE: SelectionSchedule = [
  [
    { tool: 'log_search', params: { query: 'service:api-gateway level:error', timeframe: '1h' } },
    { tool: 'active_incidents', params: {} },
  ],
  [
    { tool: 'deployment_history', params: { repo: 'main-service', limit: 5 } },
    { tool: 'infra_metrics', params: { service: 'api-gateway' } },
  ],
  [{ tool: 'infra_metrics', params: { service: 'database' } }],
];

function copyCall(call: ToolCall): ToolCall {
  return { tool: call.tool, params: { ...call.params } };
}

export class ScheduleSelectionPolicy implements SelectionPolicy {
  readonly name = 'schedule';
  private stages: ToolCall[][];

  constructor(stages: SelectionSchedule = DEFAULT_SCHEDULE) {
    if (stages.length === 0) {
      throw new Error('Selection schedule needs at least one stage');
    }
    this.stages = stages.map((stage) => stage.map(copyCall));
  }

  select(context: SelectionContext): SelectionDecision {
    const index = Math.min(Math.max(context.iteration, 0), this.stages.length - 1);
    const stage = this.stages[index] ?? [];
    return {
      strategy: 'schedule',
      calls: stage.map(copyCall),
      rationale: `Schedule stage ${index + 1} of ${this.stages.length}`,
    };
  }

  referencedTools(): string[] {
    return [...new Set(this.stages.flatMap((stage) => stage.map((call) => call.tool)))];
  }
}
